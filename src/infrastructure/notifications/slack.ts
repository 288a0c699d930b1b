import type { Logger } from 'pino';
import type { DetectionContext, DetectionHandler } from '../../application/detection-handler.js';
import type { NotificationConfig } from './config.js';
import type { DetectionNotificationPayload } from './payload.js';
import { toNotificationPayload } from './payload.js';

const DEFAULT_SLACK_TIMEOUT_MS = 5000;

/**
 * POSTs a formatted message for a detection to a Slack webhook.
 *
 * Non-OK responses, network failures and requests running past
 * `timeoutMs` are logged, never thrown.
 */
export async function sendSlackNotification(
  config: NotificationConfig['slack'],
  log: Logger,
  payload: DetectionNotificationPayload,
  timeoutMs: number = DEFAULT_SLACK_TIMEOUT_MS,
): Promise<void> {
  if (!config.webhook_url) {
    log.warn('Slack enabled but webhook_url is empty, skipping');
    return;
  }

  const deadline = payload.stop_deadline === null ? '' : ` | Stops: ${payload.stop_deadline}`;

  try {
    const body = JSON.stringify({
      text: `*[${payload.source.toUpperCase()}]* Activity detected (${payload.outcome})\n>Metric: ${payload.metric} | Session: ${payload.session_state}${deadline}\nObserved: ${payload.observed_at}`,
    });

    const response = await fetch(config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (response.ok) {
      log.info({ source: payload.source, outcome: payload.outcome }, 'Slack notification sent');
    } else {
      log.warn(
        { status: response.status, source: payload.source },
        'Slack webhook returned non-OK status',
      );
    }
  } catch (err: unknown) {
    log.warn({ err, source: payload.source }, 'Failed to send Slack notification');
  }
}

export class SlackDetectionHandler implements DetectionHandler {
  readonly name = 'slack';

  constructor(
    private readonly config: NotificationConfig['slack'],
    private readonly log: Logger,
    private readonly timeoutMs: number = DEFAULT_SLACK_TIMEOUT_MS,
  ) {}

  handle(context: DetectionContext): Promise<void> {
    return sendSlackNotification(
      this.config,
      this.log,
      toNotificationPayload(context),
      this.timeoutMs,
    );
  }
}
