import type { DetectionEvent } from '../domain/index.js';

export interface CooldownDecision {
  readonly accepted: boolean;
  /** Time left before the next event can be accepted (0 when accepted). */
  readonly remainingMs: number;
}

/**
 * CooldownGate — debounces detections against the last *accepted* one.
 *
 * An event is accepted iff nothing was accepted yet or
 * `observedAt - lastAcceptedAt >= cooldownMs`. Rejected events never move
 * the window, so a burst during cooldown does not extend it.
 *
 * Checking and committing are separate: the consumer commits only once the
 * event has actually been used, so a failed recording start leaves the gate
 * armed for the next detection.
 */
export class CooldownGate {
  private lastAccepted: number | null = null;
  private readonly cooldownMs: number;

  constructor(cooldownMs: number) {
    if (!Number.isFinite(cooldownMs) || cooldownMs < 0) {
      throw new RangeError(`Cooldown must be a non-negative number of ms, got ${cooldownMs}`);
    }
    this.cooldownMs = cooldownMs;
  }

  check(event: DetectionEvent): CooldownDecision {
    if (this.lastAccepted === null || this.cooldownMs === 0) {
      return { accepted: true, remainingMs: 0 };
    }

    const elapsed = event.observedAt - this.lastAccepted;
    if (elapsed >= this.cooldownMs) {
      return { accepted: true, remainingMs: 0 };
    }

    return { accepted: false, remainingMs: this.cooldownMs - elapsed };
  }

  /** Marks `event` as accepted. `lastAcceptedAt` never moves backwards. */
  commit(event: DetectionEvent): void {
    if (this.lastAccepted === null || event.observedAt > this.lastAccepted) {
      this.lastAccepted = event.observedAt;
    }
  }

  get lastAcceptedAt(): number | null {
    return this.lastAccepted;
  }

  get windowMs(): number {
    return this.cooldownMs;
  }
}
