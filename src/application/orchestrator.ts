import type { Logger } from 'pino';
import type { DetectionEvent, RecordingSession } from '../domain/index.js';
import type { CooldownGate } from './cooldown-gate.js';
import type { DetectionBus } from './detection-bus.js';
import type { DetectionHandler } from './detection-handler.js';
import { DEFAULT_HANDLER_TIMEOUT_MS, runDetectionHandlers } from './detection-handler.js';
import type { RecorderClient } from './recorder-client.js';
import type { RecordingSessionManager } from './recording-session-manager.js';
import type { SensorStats } from './sensor-port.js';
import { withTimeout } from './timing.js';

const DEFAULT_STATUS_INTERVAL_MS = 30_000;
const DEFAULT_RECORDER_TIMEOUT_MS = 10_000;

export const EXIT_OK = 0;
export const EXIT_RECORDER_UNREACHABLE = 1;

/** The part of SensorPort the orchestrator drives. */
export interface ManagedSensor {
  start(): void;
  stop(): Promise<void>;
  stats(): SensorStats;
}

export interface OrchestratorDeps {
  recorder: RecorderClient;
  session: RecordingSessionManager;
  sensors: readonly ManagedSensor[];
  bus: DetectionBus;
  gate: CooldownGate;
  handlers?: readonly DetectionHandler[];
  log: Logger;
  statusIntervalMs?: number;
  /** Upper bound for each detection handler. */
  handlerTimeoutMs?: number;
  /** Upper bound for the startup connect and the final close. */
  recorderTimeoutMs?: number;
  /** Clock function — injectable for tests. */
  nowFn?: () => number;
}

export interface OrchestratorStatus {
  readonly running: boolean;
  readonly recorderConnected: boolean;
  readonly session: RecordingSession;
  readonly cooldown: {
    readonly windowMs: number;
    readonly lastAcceptedAt: number | null;
  };
  readonly sensors: readonly SensorStats[];
  readonly queued: number;
  readonly accepted: number;
  readonly suppressed: number;
}

/**
 * Orchestrator — owns startup, the single consumer loop, and shutdown.
 *
 * Startup:  connect recorder (bounded, abortable) → start sensors → consume.
 * Loop:     one wait on the bus, bounded by the session's stop deadline and
 *           the next status heartbeat; expire → handle event → heartbeat.
 * Shutdown: stop sensors → drain bus → stop active session → close recorder.
 *
 * All cooldown and session mutations happen here, one event at a time.
 * Every recorder and handler call on this path is time-bounded.
 */
export class Orchestrator {
  private readonly deps: OrchestratorDeps;
  private readonly log: Logger;
  private readonly nowFn: () => number;
  private readonly statusIntervalMs: number;
  private readonly handlerTimeoutMs: number;
  private readonly recorderTimeoutMs: number;
  private running = false;
  private accepted = 0;
  private suppressed = 0;

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.log = deps.log;
    this.nowFn = deps.nowFn ?? Date.now;
    this.statusIntervalMs = deps.statusIntervalMs ?? DEFAULT_STATUS_INTERVAL_MS;
    this.handlerTimeoutMs = deps.handlerTimeoutMs ?? DEFAULT_HANDLER_TIMEOUT_MS;
    this.recorderTimeoutMs = deps.recorderTimeoutMs ?? DEFAULT_RECORDER_TIMEOUT_MS;
  }

  /**
   * Runs until `signal` aborts. Resolves with the process exit code.
   */
  async run(signal: AbortSignal): Promise<number> {
    const { recorder, sensors } = this.deps;

    try {
      const result = await withTimeout(
        recorder.connect(),
        this.recorderTimeoutMs,
        (err: unknown) => this.log.debug({ err }, 'Abandoned recorder connect failed'),
        signal,
      );
      if (!result.settled) {
        await this.closeRecorder();
        if (signal.aborted) {
          this.log.info('Shutdown requested before the recorder connected');
          return EXIT_OK;
        }
        this.log.fatal({ timeoutMs: this.recorderTimeoutMs }, 'Recorder connect timed out at startup');
        return EXIT_RECORDER_UNREACHABLE;
      }
    } catch (err: unknown) {
      this.log.fatal({ err }, 'Recorder unreachable at startup');
      return EXIT_RECORDER_UNREACHABLE;
    }

    this.running = true;
    for (const sensor of sensors) sensor.start();
    this.log.info({ sensors: sensors.length }, 'Monitoring for activity');

    try {
      await this.consume(signal);
    } finally {
      await this.shutdown();
      this.running = false;
    }

    return EXIT_OK;
  }

  /** Handles one detection: cooldown → session → handlers. */
  async handleEvent(event: DetectionEvent): Promise<void> {
    const { gate, session } = this.deps;

    const decision = gate.check(event);
    if (!decision.accepted) {
      this.suppressed++;
      this.log.info(
        {
          source: event.source,
          observedAt: event.observedAt,
          metric: event.metric,
          remainingMs: decision.remainingMs,
          state: session.state,
        },
        'Detection suppressed (cooldown)',
      );
      return;
    }

    const outcome = await session.accept(event);

    if (outcome === 'start-failed' || outcome === 'stopping') {
      this.log.info(
        { source: event.source, observedAt: event.observedAt, outcome, state: session.state },
        'Detection not applied, cooldown left open',
      );
      return;
    }

    gate.commit(event);
    this.accepted++;
    this.log.info(
      {
        source: event.source,
        observedAt: event.observedAt,
        metric: event.metric,
        outcome,
        state: session.state,
      },
      'Detection accepted',
    );

    await runDetectionHandlers(
      this.deps.handlers ?? [],
      { event, outcome, session: session.snapshot() },
      this.log,
      this.handlerTimeoutMs,
    );
  }

  status(): OrchestratorStatus {
    const { recorder, session, gate, sensors, bus } = this.deps;
    return {
      running: this.running,
      recorderConnected: recorder.connected,
      session: session.snapshot(),
      cooldown: { windowMs: gate.windowMs, lastAcceptedAt: gate.lastAcceptedAt },
      sensors: sensors.map((sensor) => sensor.stats()),
      queued: bus.size,
      accepted: this.accepted,
      suppressed: this.suppressed,
    };
  }

  private async consume(signal: AbortSignal): Promise<void> {
    const { bus, session } = this.deps;
    let nextStatusAt = this.nowFn() + this.statusIntervalMs;

    while (!signal.aborted) {
      await session.expire(this.nowFn());

      const deadline = session.nextDeadline();
      const wakeAt = deadline === null ? nextStatusAt : Math.min(deadline, nextStatusAt);
      const event = await bus.take({ timeoutMs: wakeAt - this.nowFn(), signal });

      if (event !== null) {
        await this.handleEvent(event);
      }

      const now = this.nowFn();
      if (now >= nextStatusAt) {
        this.logStatus();
        nextStatusAt = now + this.statusIntervalMs;
      }
    }
  }

  private async shutdown(): Promise<void> {
    const { sensors, bus, session } = this.deps;
    this.log.info('Shutting down...');

    await Promise.all(sensors.map((sensor) => sensor.stop()));

    const leftover = bus.drain();
    bus.close();
    if (leftover.length > 0) {
      this.log.info(
        { count: leftover.length, sources: leftover.map((e) => e.source) },
        'Discarded queued detections on shutdown',
      );
    }

    if (session.state === 'recording') {
      await session.stop('shutdown');
    }

    await this.closeRecorder();
    this.log.info('Shutdown complete');
  }

  private async closeRecorder(): Promise<void> {
    try {
      const result = await withTimeout(
        this.deps.recorder.close(),
        this.recorderTimeoutMs,
        (err: unknown) => this.log.warn({ err }, 'Failed to close recorder connection'),
      );
      if (!result.settled) {
        this.log.warn({ timeoutMs: this.recorderTimeoutMs }, 'Recorder close timed out');
      }
    } catch (err: unknown) {
      this.log.warn({ err }, 'Failed to close recorder connection');
    }
  }

  private logStatus(): void {
    const { session } = this.deps;
    const snapshot = session.snapshot();
    this.log.info(
      {
        state: snapshot.state,
        stopDeadline: snapshot.stopDeadline,
        accepted: this.accepted,
        suppressed: this.suppressed,
      },
      `Status: ${snapshot.state === 'idle' ? 'MONITORING' : 'RECORDING'}`,
    );
  }
}
