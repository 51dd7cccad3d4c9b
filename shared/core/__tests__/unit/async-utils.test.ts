/**
 * Async Utilities Tests
 */

import { describe, it, expect } from '@jest/globals';
import { delay } from '@mev-sentinel/test-utils';
import { TimeoutError, mapConcurrent, withTimeout } from '../../src/async';

describe('withTimeout', () => {
  it('should resolve with the promise value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve('snapshot'), 100, 'fetch')).resolves.toBe('snapshot');
  });

  it('should reject with TimeoutError when the promise is too slow', async () => {
    const slow = delay(200).then(() => 'late');

    const error = await withTimeout(slow, 10, 'snapshot fetch').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ operation: 'snapshot fetch', timeoutMs: 10 });
  });

  it('should propagate the original rejection', async () => {
    await expect(withTimeout(Promise.reject(new Error('redis down')), 100)).rejects.toThrow('redis down');
  });

  it('should reject invalid timeouts', async () => {
    await expect(withTimeout(Promise.resolve(1), -1)).rejects.toThrow(TypeError);
    await expect(withTimeout(Promise.resolve(1), Number.NaN)).rejects.toThrow(TypeError);
  });
});

describe('mapConcurrent', () => {
  it('should preserve input order', async () => {
    const results = await mapConcurrent(
      [30, 10, 20],
      async (ms, index) => {
        await delay(ms);
        return `pool-${index}`;
      },
      3
    );

    expect(results).toEqual(['pool-0', 'pool-1', 'pool-2']);
  });

  it('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapConcurrent(
      [1, 2, 3, 4, 5, 6],
      async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await delay(5);
        inFlight--;
      },
      2
    );

    expect(peak).toBe(2);
  });

  it('should return an empty array for no items', async () => {
    await expect(mapConcurrent([], async (item: number) => item, 4)).resolves.toEqual([]);
  });
});
