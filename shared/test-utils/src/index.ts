/**
 * Test Utilities for the MEV Analyzer
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *   // Mocks
 *   RedisMock,
 *
 *   // Builders
 *   marketSnapshot, createSnapshot, opportunity, createOpportunity, createExternalAlert,
 *
 *   // Fakes for the analyzer's collaborators
 *   StaticMarketDataSource, InMemoryAlertSink, StubBlockSource, ScriptedEnhancer,
 *
 *   // Async helpers
 *   delay, createDeferred
 * } from '@mev-sentinel/test-utils';
 * ```
 */

export { RedisMock } from './mocks/redis.mock';
export type { RedisMockOptions, RedisOperation, StreamEntry } from './mocks/redis.mock';

export {
  MarketSnapshotBuilder,
  marketSnapshot,
  createSnapshot
} from './builders/market-snapshot.builder';
export {
  OpportunityBuilder,
  opportunity,
  createOpportunity,
  createExternalAlert
} from './builders/opportunity.builder';

export {
  StaticMarketDataSource,
  StubBlockSource,
  InMemoryAlertSink,
  ScriptedEnhancer,
  FailingEnhancer,
  HangingEnhancer
} from './fakes/collaborators';

export { delay, createDeferred } from './helpers/async-helpers';
export type { Deferred } from './helpers/async-helpers';
