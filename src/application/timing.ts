/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type TimeoutResult<T> =
  | { readonly settled: true; readonly value: T }
  | { readonly settled: false };

/**
 * Waits for `promise` at most `ms`, or until `signal` aborts.
 *
 * Rejections of `promise` propagate when they arrive in time. A rejection
 * after the timeout (or abort) goes to `onLateRejection` instead.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onLateRejection: (err: unknown) => void = () => undefined,
  signal?: AbortSignal,
): Promise<TimeoutResult<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const timeout = new Promise<TimeoutResult<T>>((resolve) => {
    if (signal?.aborted) {
      resolve({ settled: false });
      return;
    }
    onAbort = () => resolve({ settled: false });
    signal?.addEventListener('abort', onAbort, { once: true });
    timer = setTimeout(() => resolve({ settled: false }), Math.max(0, ms));
  });

  const result = promise.then((value): TimeoutResult<T> => ({ settled: true, value }));

  try {
    const winner = await Promise.race([result, timeout]);
    if (!winner.settled) {
      result.catch(onLateRejection);
    }
    return winner;
  } finally {
    clearTimeout(timer);
    if (onAbort !== undefined) signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Resolves with `promise`'s value, or `null` as soon as `signal` aborts.
 * `promise` must not reject.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | null> {
  if (signal.aborted) return Promise.resolve(null);

  return new Promise<T | null>((resolve) => {
    const onAbort = (): void => resolve(null);
    signal.addEventListener('abort', onAbort, { once: true });
    void promise.then((value) => {
      signal.removeEventListener('abort', onAbort);
      resolve(value);
    });
  });
}
