import type { Logger } from 'pino';
import type { DetectionEvent, RecordingSession, SessionOutcome } from '../domain/index.js';
import { withTimeout } from './timing.js';

export const DEFAULT_HANDLER_TIMEOUT_MS = 5000;

/** What a handler sees for each accepted detection. */
export interface DetectionContext {
  readonly event: DetectionEvent;
  readonly outcome: SessionOutcome;
  /** Session state after the detection was applied. */
  readonly session: RecordingSession;
}

/**
 * Extension point invoked on every accepted detection.
 * Handlers run in list order; a failing handler does not stop the others.
 */
export interface DetectionHandler {
  readonly name: string;
  handle(context: DetectionContext): void | Promise<void>;
}

/**
 * Runs every handler in order, awaiting each one for at most `timeoutMs`.
 * Errors and timeouts are logged per handler; a handler still running after
 * its timeout is left to finish on its own.
 */
export async function runDetectionHandlers(
  handlers: readonly DetectionHandler[],
  context: DetectionContext,
  log: Logger,
  timeoutMs: number = DEFAULT_HANDLER_TIMEOUT_MS,
): Promise<void> {
  for (const handler of handlers) {
    try {
      const result = await withTimeout(
        Promise.resolve().then(() => handler.handle(context)),
        timeoutMs,
        (err: unknown) =>
          log.warn(
            { err, handler: handler.name, source: context.event.source },
            'Detection handler failed after timeout',
          ),
      );
      if (!result.settled) {
        log.warn(
          { handler: handler.name, source: context.event.source, timeoutMs },
          'Detection handler timed out',
        );
      }
    } catch (err: unknown) {
      log.warn(
        { err, handler: handler.name, source: context.event.source },
        'Detection handler failed',
      );
    }
  }
}
