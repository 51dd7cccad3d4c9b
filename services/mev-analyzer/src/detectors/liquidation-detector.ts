/**
 * Liquidation Detector
 *
 * Volatility above the threshold pushes leveraged positions on the pool's
 * assets toward liquidation.
 */

import type { Opportunity } from '@mev-sentinel/types';
import type { LiquidationPolicy } from '@mev-sentinel/config';
import { capValue, clampUnit, createDetectedOpportunity, type DetectionInput } from './scoring';

export function detectLiquidation(input: DetectionInput, policy: LiquidationPolicy): Opportunity | null {
  const { volatility } = input.snapshot;

  if (!(volatility > policy.volatilityThreshold)) {
    return null;
  }

  return createDetectedOpportunity(input, 'liquidation', {
    estimatedValue: capValue(volatility * policy.volatilityMultiplier, policy.valueCap),
    riskScore: clampUnit(volatility),
    confidence: policy.confidence
  });
}
