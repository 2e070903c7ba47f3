/**
 * Async primitives
 *
 * @module @stitchview/kernel/async
 */

// ============================================================================
// Deferred
// ============================================================================

/**
 * A promise together with the functions that settle it. Used as a one-shot
 * reply slot for mailbox requests.
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
  readonly settled: boolean;
}

export function createDeferred<T>(): Deferred<T> {
  let settled = false;
  let resolveFn: (value: T) => void = () => {};
  let rejectFn: (error: unknown) => void = () => {};

  const promise = new Promise<T>((resolve, reject) => {
    resolveFn = resolve;
    rejectFn = reject;
  });

  return {
    promise,
    resolve(value) {
      if (settled) return;
      settled = true;
      resolveFn(value);
    },
    reject(error) {
      if (settled) return;
      settled = true;
      rejectFn(error);
    },
    get settled() {
      return settled;
    },
  };
}

// ============================================================================
// Timeouts
// ============================================================================

export type TimeoutResult<T> = { timedOut: false; value: T } | { timedOut: true };

/**
 * Race a promise against a timer. The timer is always cleared, and the
 * promise keeps running when the timer wins.
 */
export async function raceTimeout<T>(promise: Promise<T>, ms: number): Promise<TimeoutResult<T>> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<TimeoutResult<T>>((resolve) => {
    timer = setTimeout(() => resolve({ timedOut: true }), ms);
  });

  try {
    return await Promise.race([
      promise.then((value): TimeoutResult<T> => ({ timedOut: false, value })),
      timeout,
    ]);
  } finally {
    clearTimeout(timer);
  }
}
