import type { DetectionContext } from '../../application/detection-handler.js';

/** Wire shape of a detection notification (Slack text, Redis message). */
export interface DetectionNotificationPayload {
  source: string;
  metric: number;
  observed_at: string; // ISO-8601
  outcome: string;
  session_state: string;
  stop_deadline: string | null; // ISO-8601
}

export function toNotificationPayload(context: DetectionContext): DetectionNotificationPayload {
  const { event, outcome, session } = context;
  return {
    source: event.source,
    metric: event.metric,
    observed_at: new Date(event.observedAt).toISOString(),
    outcome,
    session_state: session.state,
    stop_deadline: session.stopDeadline === null ? null : new Date(session.stopDeadline).toISOString(),
  };
}
