/**
 * Detector Tests
 *
 * Thresholds are strict inequalities, values are capped per kind and risk
 * scores stay in [0, 1].
 */

import { describe, it, expect } from '@jest/globals';
import { DEFAULT_ANALYZER_CONFIG } from '@mev-sentinel/config';
import { RecordingLogger } from '@mev-sentinel/core';
import { createSnapshot } from '@mev-sentinel/test-utils';
import type { CachedSnapshot, MarketSnapshot } from '@mev-sentinel/types';
import {
  DetectorSet,
  capValue,
  clampUnit,
  detectArbitrage,
  detectLiquidation,
  detectSandwich,
  priceRatioDeviation,
  type DetectionInput
} from '../../src/detectors';

const policy = DEFAULT_ANALYZER_CONFIG.detection;
const NOW = 1_700_000_000_000;

function input(snapshot: MarketSnapshot, poolId = 'pool-a'): DetectionInput {
  return { poolId, snapshot, blockReference: 100, detectedAt: NOW };
}

function cached(poolId: string, snapshot: MarketSnapshot): CachedSnapshot {
  return { poolId, snapshot, observedAt: NOW, stale: false };
}

describe('scoring helpers', () => {
  it('capValue clamps into [0, cap] and maps NaN to 0', () => {
    expect(capValue(4, 10)).toBe(4);
    expect(capValue(25, 10)).toBe(10);
    expect(capValue(-3, 10)).toBe(0);
    expect(capValue(Infinity, 10)).toBe(10);
    expect(capValue(0 * Infinity, 10)).toBe(0);
  });

  it('clampUnit caps at 1', () => {
    expect(clampUnit(1.7)).toBe(1);
    expect(clampUnit(0.42)).toBe(0.42);
  });
});

describe('detectArbitrage', () => {
  it('ignores a pool trading at the reference ratio', () => {
    expect(detectArbitrage(input(createSnapshot()), policy.arbitrage)).toBeNull();
  });

  it('does not fire when the deviation equals the threshold', () => {
    // 2020 / 1 deviates from 2000 by exactly 0.01
    const snapshot = createSnapshot({ token0Price: 2020, token1Price: 1 });
    expect(priceRatioDeviation(2020, 1, 2000)).toBe(0.01);
    expect(detectArbitrage(input(snapshot), policy.arbitrage)).toBeNull();
  });

  it('scores a deviation above the threshold', () => {
    const snapshot = createSnapshot({ token0Price: 2100, token1Price: 1, liquidity: 50 });

    const result = detectArbitrage(input(snapshot), policy.arbitrage);

    expect(result).not.toBeNull();
    expect(result?.id).toBe('pool-a:arbitrage:100:1700000000000');
    expect(result?.kind).toBe('arbitrage');
    expect(result?.source).toBe('detector');
    expect(result?.estimatedValue).toBeCloseTo(0.25, 10);
    expect(result?.riskScore).toBeCloseTo(0.5, 10);
    expect(result?.confidence).toBe(0.85);
    expect(result?.blockReference).toBe(100);
    expect(result?.detectedAt).toBe(NOW);
  });

  it('fires on deviations below the reference as well', () => {
    const snapshot = createSnapshot({ token0Price: 1900, token1Price: 1, liquidity: 50 });
    expect(detectArbitrage(input(snapshot), policy.arbitrage)?.riskScore).toBeCloseTo(0.5, 10);
  });

  it('caps value at 10 and risk at 1', () => {
    const snapshot = createSnapshot({ token0Price: 3000, token1Price: 1, liquidity: 5_000_000 });

    const result = detectArbitrage(input(snapshot), policy.arbitrage);

    expect(result?.estimatedValue).toBe(10);
    expect(result?.riskScore).toBe(1);
  });

  it('returns null when token1 has no price', () => {
    const snapshot = createSnapshot({ token0Price: 2000, token1Price: 0 });
    expect(detectArbitrage(input(snapshot), policy.arbitrage)).toBeNull();
  });
});

describe('detectSandwich', () => {
  it('requires price impact strictly above 0.3', () => {
    const snapshot = createSnapshot({ priceImpact: 0.3, liquidity: 500_000 });
    expect(detectSandwich(input(snapshot), policy.sandwich)).toBeNull();
  });

  it('requires liquidity strictly below 1,000,000', () => {
    const snapshot = createSnapshot({ priceImpact: 0.31, liquidity: 1_000_000 });
    expect(detectSandwich(input(snapshot), policy.sandwich)).toBeNull();
  });

  it('scores a shallow, high-impact pool', () => {
    const snapshot = createSnapshot({ priceImpact: 0.31, liquidity: 999_999, volume24h: 10_000 });

    const result = detectSandwich(input(snapshot), policy.sandwich);

    expect(result?.kind).toBe('sandwich');
    expect(result?.estimatedValue).toBeCloseTo(3.1, 10);
    expect(result?.riskScore).toBeCloseTo(0.60500005, 10);
    expect(result?.confidence).toBe(0.75);
  });

  it('caps value at 5 and risk at 1', () => {
    const snapshot = createSnapshot({ priceImpact: 1.5, liquidity: 0, volume24h: 1_000_000 });

    const result = detectSandwich(input(snapshot), policy.sandwich);

    expect(result?.estimatedValue).toBe(5);
    expect(result?.riskScore).toBe(1);
  });
});

describe('detectLiquidation', () => {
  it('does not fire at exactly 0.6 volatility', () => {
    expect(detectLiquidation(input(createSnapshot({ volatility: 0.6 })), policy.liquidation)).toBeNull();
  });

  it('scores volatility above the threshold', () => {
    const result = detectLiquidation(input(createSnapshot({ volatility: 0.61 })), policy.liquidation);

    expect(result?.kind).toBe('liquidation');
    expect(result?.estimatedValue).toBeCloseTo(1.22, 10);
    expect(result?.riskScore).toBe(0.61);
    expect(result?.confidence).toBe(0.65);
  });

  it('caps value at 3 and risk at 1', () => {
    const result = detectLiquidation(input(createSnapshot({ volatility: 2 })), policy.liquidation);

    expect(result?.estimatedValue).toBe(3);
    expect(result?.riskScore).toBe(1);
  });
});

describe('DetectorSet', () => {
  const hotSnapshot = createSnapshot({
    token0Price: 2100,
    token1Price: 1,
    priceImpact: 0.5,
    liquidity: 100_000,
    volatility: 0.9
  });

  it('orders results by pool, then arbitrage, sandwich, liquidation', () => {
    const detectors = new DetectorSet(policy, new RecordingLogger());

    const { opportunities, failures } = detectors.detectAll(
      [
        cached('pool-b', hotSnapshot),
        cached('pool-a', createSnapshot({ token0Price: 2100, token1Price: 1 }))
      ],
      100,
      NOW
    );

    expect(failures).toEqual([]);
    expect(opportunities.map(o => `${o.poolId}:${o.kind}`)).toEqual([
      'pool-a:arbitrage',
      'pool-b:arbitrage',
      'pool-b:sandwich',
      'pool-b:liquidation'
    ]);
  });

  it('isolates a pool whose snapshot fails validation', () => {
    const logger = new RecordingLogger();
    const detectors = new DetectorSet(policy, logger);

    const { opportunities, failures } = detectors.detectAll(
      [
        cached('pool-c', createSnapshot({ liquidity: Number.NaN })),
        cached('pool-b', hotSnapshot)
      ],
      100,
      NOW
    );

    expect(opportunities).toHaveLength(3);
    expect(failures).toHaveLength(1);
    expect(failures[0].poolId).toBe('pool-c');
    expect(failures[0].error.name).toBe('ValidationError');
    expect(logger.hasLogWithMeta('warn', { poolId: 'pool-c' })).toBe(true);
  });

  it('flags detections made from a stale snapshot', () => {
    const detectors = new DetectorSet(policy, new RecordingLogger());

    const { opportunities } = detectors.detectAll(
      [
        { ...cached('pool-b', hotSnapshot), stale: true },
        cached('pool-a', createSnapshot({ token0Price: 2100, token1Price: 1 }))
      ],
      100,
      NOW
    );

    expect(opportunities.map(o => [`${o.poolId}:${o.kind}`, o.staleSnapshot])).toEqual([
      ['pool-a:arbitrage', undefined],
      ['pool-b:arbitrage', true],
      ['pool-b:sandwich', true],
      ['pool-b:liquidation', true]
    ]);
  });

  it('returns nothing for quiet pools', () => {
    const detectors = new DetectorSet(policy, new RecordingLogger());
    const result = detectors.detectAll([cached('pool-a', createSnapshot())], 100, NOW);
    expect(result).toEqual({ opportunities: [], failures: [] });
  });
});
