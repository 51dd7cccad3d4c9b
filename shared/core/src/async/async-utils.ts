/**
 * Shared Async Utilities
 *
 * Timeout and bounded-concurrency helpers used by the analyzer's
 * data source, enhancement stage and alert dispatch.
 */

import { TimeoutError } from '@mev-sentinel/types';

export { TimeoutError };

/**
 * Race a promise against a timer.
 *
 * @param operationName - Used in the TimeoutError message
 * @throws TimeoutError if the promise does not settle within timeoutMs
 *
 * @example
 * ```typescript
 * const snapshots = await withTimeout(source.fetch(pools), 5000, 'snapshot fetch');
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operationName?: string
): Promise<T> {
  if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
    throw new TypeError(`withTimeout: timeoutMs must be a non-negative finite number, got ${timeoutMs}`);
  }

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operationName || 'operation', timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Map over items with at most `concurrency` calls in flight.
 * Results keep the input order.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    // Claim the index before awaiting; the event loop is single threaded
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await fn(items[index], index);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
