/**
 * Redis Market Data Source
 *
 * Reads one hash per pool at `<keyPrefix><poolId>` with the MarketSnapshot
 * fields. A missing or invalid hash leaves the pool out of the result (the
 * cycle then falls back to its cached snapshot); a Redis error fails the
 * whole fetch with a DataSourceError.
 */

import { DataSourceError, type MarketDataSource, type MarketSnapshot } from '@mev-sentinel/types';
import { MarketSnapshotSchema } from '@mev-sentinel/config';
import { getErrorMessage, mapConcurrent, toError, type ILogger } from '@mev-sentinel/core';

/**
 * Subset of the ioredis client used here.
 */
export interface SnapshotStore {
  hgetall(key: string): Promise<Record<string, string>>;
}

export interface RedisMarketDataSourceOptions {
  keyPrefix: string;
  logger: ILogger;
  /** Parallel HGETALL calls (default: 10) */
  concurrency?: number;
}

export class RedisMarketDataSource implements MarketDataSource {
  readonly name = 'redis';
  private readonly keyPrefix: string;
  private readonly logger: ILogger;
  private readonly concurrency: number;

  constructor(
    private readonly store: SnapshotStore,
    options: RedisMarketDataSourceOptions
  ) {
    this.keyPrefix = options.keyPrefix;
    this.logger = options.logger;
    this.concurrency = options.concurrency ?? 10;
  }

  snapshotKey(poolId: string): string {
    return `${this.keyPrefix}${poolId}`;
  }

  async fetchSnapshots(pools: readonly string[]): Promise<Map<string, MarketSnapshot>> {
    const results = await mapConcurrent(pools, pool => this.readSnapshot(pool), this.concurrency);

    const snapshots = new Map<string, MarketSnapshot>();
    pools.forEach((pool, index) => {
      const snapshot = results[index];
      if (snapshot) snapshots.set(pool, snapshot);
    });
    return snapshots;
  }

  private async readSnapshot(poolId: string): Promise<MarketSnapshot | null> {
    const key = this.snapshotKey(poolId);

    let hash: Record<string, string>;
    try {
      hash = await this.store.hgetall(key);
    } catch (error) {
      throw new DataSourceError(`Failed to read snapshot for ${poolId}: ${getErrorMessage(error)}`, this.name, {
        cause: toError(error),
        context: { poolId, key }
      });
    }

    if (Object.keys(hash).length === 0) {
      return null;
    }

    const parsed = MarketSnapshotSchema.safeParse(hash);
    if (!parsed.success) {
      this.logger.warn('Invalid market snapshot in store, treating pool as missing', {
        poolId,
        key,
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      });
      return null;
    }

    return parsed.data;
  }
}
