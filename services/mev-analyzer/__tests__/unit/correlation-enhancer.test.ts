/**
 * CorrelationEnhancer Tests
 */

import { describe, it, expect } from '@jest/globals';
import { DEFAULT_ANALYZER_CONFIG } from '@mev-sentinel/config';
import { createOpportunity } from '@mev-sentinel/test-utils';
import { CorrelationEnhancer } from '../../src/correlation-enhancer';

const enhancer = new CorrelationEnhancer(DEFAULT_ANALYZER_CONFIG.correlation);
const history = (count: number) => Array.from({ length: count }, (_, i) => createOpportunity({ detectedAt: i }));

describe('CorrelationEnhancer', () => {
  it('boosts confidence for high-value, low-risk arbitrage', async () => {
    const candidate = createOpportunity({ kind: 'arbitrage', estimatedValue: 2.5, riskScore: 0.4, confidence: 0.85 });

    const result = await enhancer.enhance(candidate, []);

    expect(result.confidence).toBeCloseTo(0.95, 10);
    expect(result.riskScore).toBe(0.4);
  });

  it('leaves confidence alone at the value and risk boundaries', async () => {
    const atValue = createOpportunity({ kind: 'arbitrage', estimatedValue: 2.0, riskScore: 0.4, confidence: 0.85 });
    const atRisk = createOpportunity({ kind: 'arbitrage', estimatedValue: 2.5, riskScore: 0.5, confidence: 0.85 });

    expect((await enhancer.enhance(atValue, [])).confidence).toBe(0.85);
    expect((await enhancer.enhance(atRisk, [])).confidence).toBe(0.85);
  });

  it('only applies the confidence rule to arbitrage', async () => {
    const candidate = createOpportunity({ kind: 'sandwich', estimatedValue: 4, riskScore: 0.1, confidence: 0.75 });
    expect((await enhancer.enhance(candidate, [])).confidence).toBe(0.75);
  });

  it('caps boosted confidence at 1', async () => {
    const candidate = createOpportunity({ kind: 'arbitrage', estimatedValue: 5, riskScore: 0.1, confidence: 0.95 });
    expect((await enhancer.enhance(candidate, [])).confidence).toBe(1);
  });

  it('raises risk only when history holds more than two entries', async () => {
    const candidate = createOpportunity({ kind: 'liquidation', riskScore: 0.61 });

    expect((await enhancer.enhance(candidate, history(2))).riskScore).toBe(0.61);
    expect((await enhancer.enhance(candidate, history(3))).riskScore).toBeCloseTo(0.81, 10);
  });

  it('caps raised risk at 1', async () => {
    const candidate = createOpportunity({ riskScore: 0.9 });
    expect((await enhancer.enhance(candidate, history(3))).riskScore).toBe(1);
  });

  it('evaluates the confidence rule on the detector risk, before the risk boost', async () => {
    // 0.4 + 0.2 would cross the low-risk threshold, but rule 1 sees 0.4
    const candidate = createOpportunity({ kind: 'arbitrage', estimatedValue: 3, riskScore: 0.4, confidence: 0.85 });

    const result = await enhancer.enhance(candidate, history(3));

    expect(result.confidence).toBeCloseTo(0.95, 10);
    expect(result.riskScore).toBeCloseTo(0.6, 10);
  });

  it('does not mutate the candidate', async () => {
    const candidate = createOpportunity({ riskScore: 0.5 });
    await enhancer.enhance(candidate, history(5));
    expect(candidate.riskScore).toBe(0.5);
  });
});
