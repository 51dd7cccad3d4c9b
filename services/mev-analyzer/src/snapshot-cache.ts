/**
 * Snapshot Cache
 *
 * Latest snapshot per pool. When a fetch fails, or succeeds without a pool,
 * the pool is served from here and marked stale. Pools never seen are
 * skipped for the cycle.
 */

import type { CachedSnapshot, MarketSnapshot } from '@mev-sentinel/types';

interface CacheEntry {
  snapshot: MarketSnapshot;
  observedAt: number;
}

export interface SnapshotResolution {
  /** In the order the pools were requested */
  snapshots: CachedSnapshot[];
  /** Pools with neither fresh nor cached data */
  skipped: string[];
}

export class SnapshotCache {
  private readonly entries = new Map<string, CacheEntry>();

  put(poolId: string, snapshot: MarketSnapshot, observedAt: number): void {
    this.entries.set(poolId, { snapshot, observedAt });
  }

  get(poolId: string): CachedSnapshot | undefined {
    const entry = this.entries.get(poolId);
    return entry ? { poolId, ...entry, stale: false } : undefined;
  }

  /**
   * Merge a fetch result into the cache and decide what each pool is evaluated on.
   *
   * @param fetched - Fresh snapshots, or null when the fetch failed
   */
  resolve(
    pools: readonly string[],
    fetched: ReadonlyMap<string, MarketSnapshot> | null,
    now: number
  ): SnapshotResolution {
    const snapshots: CachedSnapshot[] = [];
    const skipped: string[] = [];

    for (const poolId of pools) {
      const fresh = fetched?.get(poolId);
      if (fresh) {
        this.put(poolId, fresh, now);
        snapshots.push({ poolId, snapshot: fresh, observedAt: now, stale: false });
        continue;
      }

      const cached = this.entries.get(poolId);
      if (cached) {
        snapshots.push({ poolId, snapshot: cached.snapshot, observedAt: cached.observedAt, stale: true });
      } else {
        skipped.push(poolId);
      }
    }

    return { snapshots, skipped };
  }

  size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
