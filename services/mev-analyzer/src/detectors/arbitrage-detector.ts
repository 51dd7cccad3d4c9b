/**
 * Arbitrage Detector
 *
 * Flags pools whose token0/token1 price ratio has drifted from the reference
 * ratio by more than the deviation threshold.
 *
 * deviation      = |ratio - referenceRatio| / referenceRatio
 * estimatedValue = min(liquidity * deviation * valueFactor, valueCap)
 * riskScore      = min(deviation * riskMultiplier, 1)
 */

import type { Opportunity } from '@mev-sentinel/types';
import type { ArbitragePolicy } from '@mev-sentinel/config';
import { capValue, clampUnit, createDetectedOpportunity, type DetectionInput } from './scoring';

/**
 * Relative deviation of the pool's price ratio, or null when the ratio is undefined.
 */
export function priceRatioDeviation(
  token0Price: number,
  token1Price: number,
  referenceRatio: number
): number | null {
  if (token1Price <= 0) return null;

  const ratio = token0Price / token1Price;
  if (!Number.isFinite(ratio)) return null;

  return Math.abs(ratio - referenceRatio) / referenceRatio;
}

export function detectArbitrage(input: DetectionInput, policy: ArbitragePolicy): Opportunity | null {
  const { token0Price, token1Price, liquidity } = input.snapshot;

  const deviation = priceRatioDeviation(token0Price, token1Price, policy.referenceRatio);
  // Strict: a deviation exactly on the threshold does not fire
  if (deviation === null || !(deviation > policy.deviationThreshold)) {
    return null;
  }

  return createDetectedOpportunity(input, 'arbitrage', {
    estimatedValue: capValue(liquidity * deviation * policy.valueFactor, policy.valueCap),
    riskScore: clampUnit(deviation * policy.riskMultiplier),
    confidence: policy.confidence
  });
}
