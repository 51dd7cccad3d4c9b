/**
 * SnapshotCache Tests
 */

import { describe, it, expect } from '@jest/globals';
import { createSnapshot } from '@mev-sentinel/test-utils';
import type { MarketSnapshot } from '@mev-sentinel/types';
import { SnapshotCache } from '../../src/snapshot-cache';

describe('SnapshotCache', () => {
  const first = createSnapshot({ volatility: 0.2 });
  const second = createSnapshot({ volatility: 0.3 });

  it('stores fresh snapshots and serves them as not stale', () => {
    const cache = new SnapshotCache();

    const result = cache.resolve(['pool-a'], new Map([['pool-a', first]]), 1000);

    expect(result).toEqual({
      snapshots: [{ poolId: 'pool-a', snapshot: first, observedAt: 1000, stale: false }],
      skipped: []
    });
    expect(cache.get('pool-a')?.snapshot).toBe(first);
  });

  it('falls back to cached snapshots when the fetch failed', () => {
    const cache = new SnapshotCache();
    cache.resolve(['pool-a'], new Map([['pool-a', first]]), 1000);

    const result = cache.resolve(['pool-a', 'pool-b'], null, 2000);

    expect(result.snapshots).toEqual([{ poolId: 'pool-a', snapshot: first, observedAt: 1000, stale: true }]);
    expect(result.skipped).toEqual(['pool-b']);
  });

  it('falls back per pool when a successful fetch omits one', () => {
    const cache = new SnapshotCache();
    cache.put('pool-a', first, 1000);
    cache.put('pool-b', first, 1000);

    const fetched = new Map<string, MarketSnapshot>([['pool-b', second]]);
    const result = cache.resolve(['pool-a', 'pool-b'], fetched, 2000);

    expect(result.snapshots.map(s => [s.poolId, s.stale, s.observedAt])).toEqual([
      ['pool-a', true, 1000],
      ['pool-b', false, 2000]
    ]);
    expect(cache.get('pool-b')?.snapshot).toBe(second);
  });

  it('skips pools that were never seen', () => {
    const cache = new SnapshotCache();
    expect(cache.resolve(['pool-x'], new Map(), 1000)).toEqual({ snapshots: [], skipped: ['pool-x'] });
    expect(cache.size()).toBe(0);
  });
});
