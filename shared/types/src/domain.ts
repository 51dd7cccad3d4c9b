// Domain types for the MEV analyzer

/**
 * Exploit pattern a detection is classified as.
 */
export type OpportunityKind = 'arbitrage' | 'sandwich' | 'liquidation';

/**
 * Canonical kind order. Cycle results are sorted by pool, then by this order.
 */
export const OPPORTUNITY_KINDS: readonly OpportunityKind[] = ['arbitrage', 'sandwich', 'liquidation'];

/**
 * Where an opportunity came from.
 * - detector: produced by the detector set during a cycle
 * - external: ingested from a peer alert
 */
export type OpportunitySource = 'detector' | 'external';

/**
 * Per-pool market metrics observed in one cycle.
 * Superseded by the next cycle's snapshot for the same pool.
 */
export interface MarketSnapshot {
  /** Price of token0 in USD */
  readonly token0Price: number;
  /** Price of token1 in USD */
  readonly token1Price: number;
  /** 24-hour trading volume */
  readonly volume24h: number;
  /** Total liquidity in the pool */
  readonly liquidity: number;
  /** Estimated price impact for large trades (fraction) */
  readonly priceImpact: number;
  /** Recent price volatility (fraction) */
  readonly volatility: number;
}

/**
 * A snapshot as handed to the detectors, with its provenance.
 */
export interface CachedSnapshot {
  poolId: string;
  snapshot: MarketSnapshot;
  /** When the snapshot was fetched (ms epoch) */
  observedAt: number;
  /** True when served from cache because the fresh fetch failed or omitted the pool */
  stale: boolean;
}

/**
 * A detected (or externally reported) MEV opportunity.
 *
 * Invariants: 0 <= riskScore <= 1, 0 <= confidence <= 1,
 * 0 <= estimatedValue <= cap(kind) at creation.
 */
export interface Opportunity {
  id: string;
  poolId: string;
  kind: OpportunityKind;
  /** Estimated value in currency units, clamped to the kind's cap */
  estimatedValue: number;
  riskScore: number;
  confidence: number;
  /** Detection time (ms epoch) */
  detectedAt: number;
  /** Block the detection refers to (monotonically non-decreasing) */
  blockReference: number;
  transactionRef?: string;
  source: OpportunitySource;
  /** Set when the detection ran on a cached snapshot after a failed fetch */
  staleSnapshot?: boolean;
}

/**
 * Alert received from a peer analyzer or external system.
 */
export interface ExternalAlert {
  poolId: string;
  kind: OpportunityKind;
  estimatedValue: number;
  riskScore: number;
  blockReference: number;
  transactionRef?: string;
}

/**
 * Stats query response.
 */
export interface AnalyzerStats {
  opportunitiesDetectedTotal: number;
  alertsSentTotal: number;
  uptimeHours: number;
  activeOpportunityCount: number;
  cycleIntervalSeconds: number;
}

/**
 * Extended process-wide counters, exposed on the health endpoint.
 */
export interface AnalyzerCounters {
  opportunitiesDetectedTotal: number;
  alertsSentTotal: number;
  cyclesCompleted: number;
  cyclesSkipped: number;
  cyclesFailed: number;
  staleSnapshotsServed: number;
  poolsSkipped: number;
  detectorFailures: number;
  enhancementFailures: number;
  dispatchFailures: number;
  externalAlertsIngested: number;
  lastCycleAt: number | null;
  lastCycleDurationMs: number | null;
  lastCycleStatus: 'completed' | 'failed' | null;
}

/**
 * Build the identifier used in logs and stream payloads.
 */
export function buildOpportunityId(
  poolId: string,
  kind: OpportunityKind,
  blockReference: number,
  detectedAt: number
): string {
  return `${poolId}:${kind}:${blockReference}:${detectedAt}`;
}
