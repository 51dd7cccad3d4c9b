/**
 * Test Data Builder for MarketSnapshot
 *
 * Defaults describe a quiet pool: the price ratio sits on the 2000 reference,
 * impact and volatility are low, so no detector fires until a test says so.
 *
 * @example
 * const snapshot = marketSnapshot()
 *   .withPrices(2100, 1)
 *   .withLiquidity(500_000)
 *   .build();
 */

import type { MarketSnapshot } from '@mev-sentinel/types';

const QUIET_SNAPSHOT: MarketSnapshot = {
  token0Price: 2000,
  token1Price: 1,
  volume24h: 1_000_000,
  liquidity: 5_000_000,
  priceImpact: 0.05,
  volatility: 0.1
};

export class MarketSnapshotBuilder {
  private snapshot: MarketSnapshot = { ...QUIET_SNAPSHOT };

  withPrices(token0Price: number, token1Price: number): this {
    this.snapshot = { ...this.snapshot, token0Price, token1Price };
    return this;
  }

  withVolume(volume24h: number): this {
    this.snapshot = { ...this.snapshot, volume24h };
    return this;
  }

  withLiquidity(liquidity: number): this {
    this.snapshot = { ...this.snapshot, liquidity };
    return this;
  }

  withPriceImpact(priceImpact: number): this {
    this.snapshot = { ...this.snapshot, priceImpact };
    return this;
  }

  withVolatility(volatility: number): this {
    this.snapshot = { ...this.snapshot, volatility };
    return this;
  }

  build(): MarketSnapshot {
    return { ...this.snapshot };
  }

  /**
   * Snapshot as a Redis hash (string fields).
   */
  buildHash(): Record<string, string> {
    const hash: Record<string, string> = {};
    for (const [field, value] of Object.entries(this.snapshot)) {
      hash[field] = String(value);
    }
    return hash;
  }
}

export function marketSnapshot(): MarketSnapshotBuilder {
  return new MarketSnapshotBuilder();
}

/**
 * Shorthand for a quiet snapshot with a few fields overridden.
 */
export function createSnapshot(overrides: Partial<MarketSnapshot> = {}): MarketSnapshot {
  return { ...QUIET_SNAPSHOT, ...overrides };
}
