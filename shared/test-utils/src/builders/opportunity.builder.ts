/**
 * Test Data Builders for Opportunity and ExternalAlert
 */

import {
  buildOpportunityId,
  type ExternalAlert,
  type Opportunity,
  type OpportunityKind
} from '@mev-sentinel/types';

const BASE_TIME = 1_700_000_000_000;

export class OpportunityBuilder {
  private opportunity: Omit<Opportunity, 'id'> & { id?: string } = {
    poolId: 'pool-a',
    kind: 'arbitrage',
    estimatedValue: 1,
    riskScore: 0.3,
    confidence: 0.85,
    detectedAt: BASE_TIME,
    blockReference: 19_000_000,
    source: 'detector'
  };

  withId(id: string): this {
    this.opportunity.id = id;
    return this;
  }

  forPool(poolId: string): this {
    this.opportunity.poolId = poolId;
    return this;
  }

  ofKind(kind: OpportunityKind): this {
    this.opportunity.kind = kind;
    return this;
  }

  withValue(estimatedValue: number): this {
    this.opportunity.estimatedValue = estimatedValue;
    return this;
  }

  withRisk(riskScore: number): this {
    this.opportunity.riskScore = riskScore;
    return this;
  }

  withConfidence(confidence: number): this {
    this.opportunity.confidence = confidence;
    return this;
  }

  detectedAt(detectedAt: number): this {
    this.opportunity.detectedAt = detectedAt;
    return this;
  }

  atBlock(blockReference: number): this {
    this.opportunity.blockReference = blockReference;
    return this;
  }

  fromExternal(): this {
    this.opportunity.source = 'external';
    return this;
  }

  withTransaction(transactionRef: string): this {
    this.opportunity.transactionRef = transactionRef;
    return this;
  }

  /**
   * Build; the id defaults to the canonical pool:kind:block:time form.
   */
  build(): Opportunity {
    const { id, ...rest } = this.opportunity;
    return {
      ...rest,
      id: id ?? buildOpportunityId(rest.poolId, rest.kind, rest.blockReference, rest.detectedAt)
    };
  }

  /**
   * Build `count` opportunities spaced `stepMs` apart, oldest first.
   */
  buildSeries(count: number, stepMs: number): Opportunity[] {
    const start = this.opportunity.detectedAt;
    return Array.from({ length: count }, (_, i) => this.detectedAt(start + i * stepMs).build());
  }
}

export function opportunity(): OpportunityBuilder {
  return new OpportunityBuilder();
}

export function createOpportunity(overrides: Partial<Opportunity> = {}): Opportunity {
  const base = new OpportunityBuilder().build();
  const merged = { ...base, ...overrides };
  return overrides.id !== undefined
    ? merged
    : { ...merged, id: buildOpportunityId(merged.poolId, merged.kind, merged.blockReference, merged.detectedAt) };
}

export function createExternalAlert(overrides: Partial<ExternalAlert> = {}): ExternalAlert {
  return {
    poolId: 'pool-a',
    kind: 'sandwich',
    estimatedValue: 1.5,
    riskScore: 0.75,
    blockReference: 19_000_010,
    ...overrides
  };
}
