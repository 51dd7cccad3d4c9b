/**
 * Correlation Enhancer
 *
 * Default ScoreEnhancer. Two rules, applied in order:
 *
 * 1. High-value, low-risk arbitrage is more trustworthy:
 *    confidence += confidenceBoost (capped at 1).
 * 2. A pool with more than triggerCount entries in the correlation window is
 *    under repeated attack: riskScore += riskBoost (capped at 1).
 *
 * Rule 1 looks at the detector's values, so rule 2 cannot influence it.
 */

import type { Opportunity, ScoreEnhancer } from '@mev-sentinel/types';
import type { CorrelationPolicy } from '@mev-sentinel/config';

export class CorrelationEnhancer implements ScoreEnhancer {
  readonly name = 'correlation';

  constructor(private readonly policy: CorrelationPolicy) {}

  async enhance(candidate: Opportunity, history: readonly Opportunity[]): Promise<Opportunity> {
    const { highValueThreshold, lowRiskThreshold, confidenceBoost, triggerCount, riskBoost } = this.policy;

    let { confidence, riskScore } = candidate;

    if (
      candidate.kind === 'arbitrage' &&
      candidate.estimatedValue > highValueThreshold &&
      candidate.riskScore < lowRiskThreshold
    ) {
      confidence = Math.min(confidence + confidenceBoost, 1);
    }

    if (history.length > triggerCount) {
      riskScore = Math.min(riskScore + riskBoost, 1);
    }

    return { ...candidate, confidence, riskScore };
  }
}
