/**
 * Kernel Testing Utilities
 *
 * Polling and stream helpers shared by the package test suites.
 *
 * @example
 * ```typescript
 * import { waitFor, take } from "@stitchview/kernel";
 *
 * await waitFor(() => socket.sent.length > 0);
 * const [first, second] = await take(subscription, 2);
 * ```
 *
 * @module @stitchview/kernel/testing
 */

/**
 * Sleep for a specified duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Wait for a condition to become true.
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  options: {
    timeout?: number;
    interval?: number;
    message?: string;
  } = {},
): Promise<void> {
  const { timeout = 2000, interval = 5, message = "Condition not met" } = options;
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await sleep(interval);
  }

  throw new Error(`${message} after ${timeout}ms`);
}

/**
 * Pull the next `count` values from an async iterator.
 */
export async function take<T>(source: AsyncIterator<T>, count: number): Promise<T[]> {
  const values: T[] = [];
  while (values.length < count) {
    const result = await source.next();
    if (result.done) break;
    values.push(result.value);
  }
  return values;
}
