/**
 * Collaborator Interfaces
 *
 * The analyzer depends on these capabilities only. Production adapters live in
 * the service (Redis, ethers); tests use the in-memory fakes in test-utils.
 */

import type { MarketSnapshot, Opportunity } from './domain';

/**
 * Supplies the latest market snapshot for each requested pool.
 * Pools the source has no data for are simply absent from the result.
 */
export interface MarketDataSource {
  readonly name: string;
  fetchSnapshots(pools: readonly string[]): Promise<Map<string, MarketSnapshot>>;
}

/**
 * Supplies the current chain height used as an opportunity's block reference.
 */
export interface BlockSource {
  currentBlock(): Promise<number>;
}

/**
 * Receives every opportunity whose risk reaches the alert threshold.
 */
export interface AlertSink {
  readonly name: string;
  send(opportunity: Opportunity): Promise<void>;
}

/**
 * Adjusts a fresh candidate's risk and confidence using prior same-pool
 * detections. Only riskScore and confidence of the result are kept.
 */
export interface ScoreEnhancer {
  readonly name: string;
  enhance(candidate: Opportunity, history: readonly Opportunity[]): Promise<Opportunity>;
}
