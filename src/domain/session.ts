import type { SourceKind } from './detection.js';

export type SessionState = 'idle' | 'recording' | 'stopping';

/**
 * What happens on a new accepted trigger while a session is recording.
 *
 * - `extend` pushes the stop deadline to `observedAt + recordingDuration`.
 * - `ignore` keeps the original deadline.
 */
export type RetriggerPolicy = 'extend' | 'ignore';

/**
 * Result of offering an accepted detection to the session manager.
 *
 * `start-failed` and `stopping` leave the cooldown unconsumed.
 */
export type SessionOutcome =
  | 'started'
  | 'start-failed'
  | 'extended'
  | 'ignored'
  | 'stopping';

/** Read-only view of the current recording session. */
export interface RecordingSession {
  readonly state: SessionState;
  readonly startedAt: number | null;
  readonly stopDeadline: number | null;
  readonly lastTrigger: SourceKind | null;
  /** File path OBS reported for the last finished recording. */
  readonly lastOutputPath: string | null;
}
