/**
 * Scoring helpers shared by the detectors and external alert synthesis.
 */

import {
  buildOpportunityId,
  type MarketSnapshot,
  type Opportunity,
  type OpportunityKind
} from '@mev-sentinel/types';

/**
 * What every detector receives for one pool.
 */
export interface DetectionInput {
  poolId: string;
  snapshot: MarketSnapshot;
  blockReference: number;
  /** Cycle time (ms epoch) */
  detectedAt: number;
}

/**
 * Clamp into [0, cap]. NaN (e.g. 0 * Infinity) becomes 0.
 */
export function capValue(value: number, cap: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(value, 0), cap);
}

export function clampUnit(value: number): number {
  return capValue(value, 1);
}

export function createDetectedOpportunity(
  input: DetectionInput,
  kind: OpportunityKind,
  scores: { estimatedValue: number; riskScore: number; confidence: number }
): Opportunity {
  return {
    id: buildOpportunityId(input.poolId, kind, input.blockReference, input.detectedAt),
    poolId: input.poolId,
    kind,
    estimatedValue: scores.estimatedValue,
    riskScore: scores.riskScore,
    confidence: scores.confidence,
    detectedAt: input.detectedAt,
    blockReference: input.blockReference,
    source: 'detector'
  };
}
