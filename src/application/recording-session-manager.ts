import type { Logger } from 'pino';
import type {
  DetectionEvent,
  RecordingSession,
  RetriggerPolicy,
  SessionOutcome,
  SessionState,
  SourceKind,
} from '../domain/index.js';
import { ConnectionError, RemoteBusyError } from '../domain/index.js';
import type { RecorderClient } from './recorder-client.js';
import { withTimeout } from './timing.js';

const DEFAULT_STOP_GRACE_MS = 10_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

export interface RecordingSessionManagerOptions {
  recorder: RecorderClient;
  recordingDurationMs: number;
  retriggerPolicy: RetriggerPolicy;
  /** How long to wait for the recorder to confirm a stop before forcing idle. */
  stopGraceMs?: number;
  /** Upper bound for the reconnect and start requests. */
  requestTimeoutMs?: number;
  log: Logger;
  /** Clock function — injectable for tests. */
  nowFn?: () => number;
}

/**
 * RecordingSessionManager — owns the single recording session.
 *
 *   idle      --accept-->         recording   (start succeeded)
 *   idle      --accept-->         idle        (start failed: busy / unreachable)
 *   recording --accept-->         recording   (extend or ignore per policy)
 *   recording --expire/stop-->    stopping
 *   stopping  --confirmed-->      idle
 *   stopping  --grace elapsed-->  idle        (forced, logged)
 *
 * There is no timer inside the manager: the consumer loop waits until
 * `nextDeadline()` and calls `expire()`, so every mutation happens on the
 * consumer's turn.
 */
export class RecordingSessionManager {
  private currentState: SessionState = 'idle';
  private startedAt: number | null = null;
  private stopDeadline: number | null = null;
  private lastTrigger: SourceKind | null = null;
  private lastOutputPath: string | null = null;
  private readonly recorder: RecorderClient;
  private readonly recordingDurationMs: number;
  private readonly retriggerPolicy: RetriggerPolicy;
  private readonly stopGraceMs: number;
  private readonly requestTimeoutMs: number;
  private readonly log: Logger;
  private readonly nowFn: () => number;

  constructor(options: RecordingSessionManagerOptions) {
    this.recorder = options.recorder;
    this.recordingDurationMs = options.recordingDurationMs;
    this.retriggerPolicy = options.retriggerPolicy;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.log = options.log;
    this.nowFn = options.nowFn ?? Date.now;
  }

  get state(): SessionState {
    return this.currentState;
  }

  snapshot(): RecordingSession {
    return {
      state: this.currentState,
      startedAt: this.startedAt,
      stopDeadline: this.stopDeadline,
      lastTrigger: this.lastTrigger,
      lastOutputPath: this.lastOutputPath,
    };
  }

  /** When the loop must next wake up for this session, or `null` if never. */
  nextDeadline(): number | null {
    return this.currentState === 'recording' ? this.stopDeadline : null;
  }

  /**
   * Offers an accepted detection to the session.
   * Never throws: recorder failures become a `start-failed` outcome.
   */
  async accept(event: DetectionEvent): Promise<SessionOutcome> {
    switch (this.currentState) {
      case 'idle':
        return this.startSession(event);
      case 'recording':
        return this.retrigger(event);
      case 'stopping':
        this.log.info(
          { source: event.source, observedAt: event.observedAt, state: this.currentState },
          'Detection arrived while stopping, not starting a new session',
        );
        return 'stopping';
    }
  }

  /**
   * Stops the session if its deadline has passed.
   * Returns true when a stop was carried out.
   */
  async expire(now: number = this.nowFn()): Promise<boolean> {
    if (this.currentState !== 'recording' || this.stopDeadline === null) return false;
    if (now < this.stopDeadline) return false;

    await this.stop('deadline');
    return true;
  }

  /**
   * Stops the active session and returns to idle.
   * Waits at most `stopGraceMs` for the recorder; the local state is idle
   * afterwards either way.
   */
  async stop(reason: string): Promise<void> {
    if (this.currentState !== 'recording') return;

    this.transitionTo('stopping', reason);

    try {
      const result = await withTimeout(
        this.recorder.stopRecording(),
        this.stopGraceMs,
        (err: unknown) => this.log.warn({ err }, 'Recorder stop failed after grace period'),
      );

      if (result.settled) {
        this.lastOutputPath = result.value;
        this.log.info({ reason, outputPath: result.value }, 'Recording stop confirmed');
      } else {
        this.log.warn(
          { reason, stopGraceMs: this.stopGraceMs },
          'Recorder did not confirm stop within grace period, forcing idle',
        );
      }
    } catch (err: unknown) {
      this.log.warn({ err, reason }, 'Recorder stop failed, forcing idle');
    }

    this.startedAt = null;
    this.stopDeadline = null;
    this.transitionTo('idle', reason);
  }

  private async startSession(event: DetectionEvent): Promise<SessionOutcome> {
    try {
      if (!this.recorder.connected) {
        this.log.info({ source: event.source }, 'Recorder disconnected, reconnecting before start');
        await this.bounded('connect', this.recorder.connect());
      }
      await this.bounded('startRecording', this.recorder.startRecording());
    } catch (err: unknown) {
      if (err instanceof RemoteBusyError) {
        this.log.warn(
          { err, source: event.source, state: this.currentState },
          'Recorder busy with an outside recording, session not started',
        );
      } else if (err instanceof ConnectionError) {
        this.log.error(
          { err, source: event.source, state: this.currentState },
          'Recorder unreachable, session not started',
        );
      } else {
        this.log.error(
          { err, source: event.source, state: this.currentState },
          'Failed to start recording',
        );
      }
      return 'start-failed';
    }

    this.startedAt = event.observedAt;
    this.stopDeadline = event.observedAt + this.recordingDurationMs;
    this.lastTrigger = event.source;
    this.transitionTo('recording', 'trigger', event.source);
    return 'started';
  }

  /** Awaits a recorder request; running past `requestTimeoutMs` is a ConnectionError. */
  private async bounded(request: string, promise: Promise<void>): Promise<void> {
    const result = await withTimeout(promise, this.requestTimeoutMs, (err: unknown) =>
      this.log.warn({ err, request }, 'Recorder request failed after timeout'),
    );
    if (!result.settled) {
      throw new ConnectionError(
        `Recorder ${request} timed out after ${this.requestTimeoutMs}ms`,
      );
    }
  }

  private retrigger(event: DetectionEvent): SessionOutcome {
    if (this.retriggerPolicy === 'ignore') {
      this.log.info(
        { source: event.source, stopDeadline: this.stopDeadline },
        'Retrigger ignored, keeping stop deadline',
      );
      return 'ignored';
    }

    const candidate = event.observedAt + this.recordingDurationMs;
    const previous = this.stopDeadline;
    this.stopDeadline = previous === null ? candidate : Math.max(previous, candidate);
    this.log.info(
      { source: event.source, previousDeadline: previous, stopDeadline: this.stopDeadline },
      'Recording extended',
    );
    return 'extended';
  }

  private transitionTo(next: SessionState, reason: string, source?: SourceKind): void {
    const from = this.currentState;
    this.currentState = next;
    this.log.info(
      {
        from,
        to: next,
        reason,
        source,
        startedAt: this.startedAt,
        stopDeadline: this.stopDeadline,
      },
      `Session ${from} -> ${next}`,
    );
  }
}
