import type { DetectionEvent } from '../domain/index.js';

const DEFAULT_CAPACITY = 16;

interface PendingPush {
  readonly event: DetectionEvent;
  readonly resolve: (enqueued: boolean) => void;
}

interface Waiter {
  readonly resolve: (event: DetectionEvent | null) => void;
}

export interface TakeOptions {
  /** Resolve `null` after this many ms with no event. Omit to wait indefinitely. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * DetectionBus — bounded fan-in queue between sensors and the consumer loop.
 *
 * - Any number of producers, exactly one consumer.
 * - `push()` waits while the queue is full (backpressure). Waiting pushes are
 *   admitted in arrival order, so each producer's own order is preserved.
 * - No cross-source ordering beyond arrival order.
 */
export class DetectionBus {
  private readonly queue: DetectionEvent[] = [];
  private readonly pending: PendingPush[] = [];
  private waiter: Waiter | null = null;
  private closed = false;
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`DetectionBus capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  /**
   * Enqueues an event. Resolves `true` once queued (or handed to the
   * consumer), `false` if the bus is closed or `signal` aborts first.
   */
  push(event: DetectionEvent, signal?: AbortSignal): Promise<boolean> {
    if (this.closed || signal?.aborted) return Promise.resolve(false);

    if (this.waiter !== null) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter.resolve(event);
      return Promise.resolve(true);
    }

    if (this.queue.length < this.capacity) {
      this.queue.push(event);
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const entry: PendingPush = {
        event,
        resolve: (enqueued) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(enqueued);
        },
      };
      const onAbort = (): void => {
        const index = this.pending.indexOf(entry);
        if (index !== -1) {
          this.pending.splice(index, 1);
          resolve(false);
        }
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.pending.push(entry);
    });
  }

  /**
   * Waits for the next event. Resolves `null` on timeout, abort or close.
   */
  take(options: TakeOptions = {}): Promise<DetectionEvent | null> {
    const next = this.queue.shift();
    if (next !== undefined) {
      this.admitPending();
      return Promise.resolve(next);
    }

    if (this.closed || options.signal?.aborted) return Promise.resolve(null);

    if (this.waiter !== null) {
      return Promise.reject(new Error('DetectionBus supports a single consumer'));
    }

    return new Promise<DetectionEvent | null>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const { signal, timeoutMs } = options;

      const settle = (event: DetectionEvent | null): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiter === waiter) this.waiter = null;
        resolve(event);
      };
      const onAbort = (): void => settle(null);
      const waiter: Waiter = { resolve: settle };

      this.waiter = waiter;
      signal?.addEventListener('abort', onAbort, { once: true });
      if (timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => settle(null), Math.max(0, timeoutMs));
      }
    });
  }

  /** Removes and returns every queued event, oldest first. */
  drain(): DetectionEvent[] {
    const drained = this.queue.splice(0, this.queue.length);
    while (this.pending.length > 0) {
      this.admitPending();
      drained.push(...this.queue.splice(0, this.queue.length));
    }
    return drained;
  }

  /** Rejects further pushes, releases blocked producers and wakes the consumer. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const entry of this.pending.splice(0, this.pending.length)) {
      entry.resolve(false);
    }
    if (this.waiter !== null) {
      this.waiter.resolve(null);
    }
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private admitPending(): void {
    if (this.queue.length >= this.capacity) return;
    const entry = this.pending.shift();
    if (entry === undefined) return;
    this.queue.push(entry.event);
    entry.resolve(true);
  }
}
