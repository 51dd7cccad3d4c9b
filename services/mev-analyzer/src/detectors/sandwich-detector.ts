/**
 * Sandwich Detector
 *
 * High price impact in a shallow pool makes a front-run/back-run pair
 * profitable. Both conditions are strict inequalities.
 *
 * estimatedValue = min(volume24h * volumeFactor * priceImpact, valueCap)
 * riskScore      = min((priceImpact + (1 - liquidity / liquidityNorm)) / 2, 1)
 */

import type { Opportunity } from '@mev-sentinel/types';
import type { SandwichPolicy } from '@mev-sentinel/config';
import { capValue, clampUnit, createDetectedOpportunity, type DetectionInput } from './scoring';

export function detectSandwich(input: DetectionInput, policy: SandwichPolicy): Opportunity | null {
  const { priceImpact, liquidity, volume24h } = input.snapshot;

  if (!(priceImpact > policy.priceImpactThreshold && liquidity < policy.liquidityThreshold)) {
    return null;
  }

  const liquidityRisk = 1 - liquidity / policy.liquidityNorm;

  return createDetectedOpportunity(input, 'sandwich', {
    estimatedValue: capValue(volume24h * policy.volumeFactor * priceImpact, policy.valueCap),
    riskScore: clampUnit((priceImpact + liquidityRisk) / 2),
    confidence: policy.confidence
  });
}
