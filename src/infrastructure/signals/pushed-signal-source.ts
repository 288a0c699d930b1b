import type { RawSignalSource, SourceKind } from '../../domain/index.js';
import { SourceUnavailableError } from '../../domain/index.js';

export interface PushedReading {
  readonly value: number;
  readonly receivedAt: number;
}

/**
 * RawSignalSource fed by an external detector process.
 *
 * The detector pushes its latest metric (motion area, audio level); the
 * sensor samples whatever is current. Nothing pushed yet, or a value older
 * than `staleAfterMs`, is a SourceUnavailableError.
 */
export class PushedSignalSource implements RawSignalSource {
  private latest: PushedReading | null = null;
  private readonly kind: SourceKind;
  private readonly staleAfterMs: number;
  private readonly nowFn: () => number;

  constructor(kind: SourceKind, staleAfterMs: number, nowFn: () => number = Date.now) {
    this.kind = kind;
    this.staleAfterMs = staleAfterMs;
    this.nowFn = nowFn;
  }

  update(value: number): void {
    this.latest = { value, receivedAt: this.nowFn() };
  }

  sample(): number {
    const reading = this.latest;
    if (reading === null) {
      throw new SourceUnavailableError(`No ${this.kind} signal received yet`);
    }

    const age = this.nowFn() - reading.receivedAt;
    if (age > this.staleAfterMs) {
      throw new SourceUnavailableError(`${this.kind} signal is stale (${age}ms old)`);
    }

    return reading.value;
  }

  get lastReading(): PushedReading | null {
    return this.latest;
  }
}
