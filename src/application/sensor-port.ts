import type { Logger } from 'pino';
import type {
  DetectionEvent,
  RawSignalSource,
  SourceKind,
  ThresholdConfig,
} from '../domain/index.js';
import { SourceUnavailableError } from '../domain/index.js';
import type { DetectionBus } from './detection-bus.js';
import { sleep, untilAborted } from './timing.js';

export interface SensorPortOptions {
  source: SourceKind;
  signal: RawSignalSource;
  config: ThresholdConfig;
  bus: DetectionBus;
  log: Logger;
  /** Clock function — injectable for tests. */
  nowFn?: () => number;
}

export interface SensorStats {
  readonly source: SourceKind;
  readonly running: boolean;
  readonly threshold: number;
  readonly sampleIntervalMs: number;
  readonly samples: number;
  readonly failures: number;
  readonly emitted: number;
  readonly above: boolean;
}

/**
 * SensorPort — samples one raw signal on a fixed cadence and emits a
 * DetectionEvent on every below → at/above threshold transition.
 *
 * - Edge-triggered: sustained activity produces a single event.
 * - The state before the first sample counts as "below".
 * - A failed sample is logged and skipped; the edge state is left as it was.
 * - `start()` on a running port is a no-op. `stop()` waits for the loop to
 *   exit and is safe to call repeatedly. A sample still pending at stop()
 *   never touches the edge state or the counters.
 */
export class SensorPort {
  private readonly options: SensorPortOptions;
  private readonly log: Logger;
  private readonly nowFn: () => number;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  /** Bumped on stop(); samples that resolve under an older generation are discarded. */
  private generation = 0;
  private above = false;
  private samples = 0;
  private failures = 0;
  private emitted = 0;

  constructor(options: SensorPortOptions) {
    this.options = options;
    this.log = options.log;
    this.nowFn = options.nowFn ?? Date.now;
  }

  get source(): SourceKind {
    return this.options.source;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop !== null) {
      this.log.debug({ source: this.source }, 'Sensor already running');
      return;
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
    this.log.info(
      {
        source: this.source,
        threshold: this.options.config.threshold,
        sampleIntervalMs: this.options.config.sampleIntervalMs,
      },
      'Sensor started',
    );
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (loop === null) return;

    this.generation++;
    this.controller?.abort();
    await loop;
    this.loop = null;
    this.controller = null;
    this.log.info({ source: this.source, emitted: this.emitted }, 'Sensor stopped');
  }

  /**
   * Takes one sample and applies the edge comparator.
   * Returns the rising-edge event, or `null` when there is none or the
   * sample failed.
   */
  async sampleOnce(): Promise<DetectionEvent | null> {
    const generation = this.generation;
    let value: number;
    try {
      value = await this.options.signal.sample();
    } catch (err: unknown) {
      if (generation !== this.generation) return null;
      this.failures++;
      if (err instanceof SourceUnavailableError) {
        this.log.debug({ source: this.source, err }, 'Sample unavailable, retrying next tick');
      } else {
        this.log.warn({ source: this.source, err }, 'Sample failed, retrying next tick');
      }
      return null;
    }

    if (generation !== this.generation) {
      this.log.debug({ source: this.source, value }, 'Discarding sample that completed after stop');
      return null;
    }

    if (!Number.isFinite(value)) {
      this.failures++;
      this.log.warn({ source: this.source, value }, 'Ignoring non-finite sample');
      return null;
    }

    this.samples++;
    const wasAbove = this.above;
    this.above = value >= this.options.config.threshold;

    if (!this.above || wasAbove) return null;

    return {
      source: this.source,
      observedAt: this.nowFn(),
      metric: value,
    };
  }

  stats(): SensorStats {
    return {
      source: this.source,
      running: this.running,
      threshold: this.options.config.threshold,
      sampleIntervalMs: this.options.config.sampleIntervalMs,
      samples: this.samples,
      failures: this.failures,
      emitted: this.emitted,
      above: this.above,
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      // A hung source must not hold up stop(); the pending sample is abandoned.
      const event = await untilAborted(this.sampleOnce(), signal);

      if (event !== null && !signal.aborted) {
        const enqueued = await this.options.bus.push(event, signal);
        if (enqueued) {
          this.emitted++;
          this.log.debug({ source: event.source, metric: event.metric }, 'Detection emitted');
        } else {
          this.log.debug({ source: event.source }, 'Detection dropped during shutdown');
        }
      }

      await sleep(this.options.config.sampleIntervalMs, signal);
    }
  }
}
