/**
 * MEV Analyzer Service Entry Point
 *
 * Wires the analyzer to Redis (snapshot hashes in, alert stream out), an
 * optional JSON-RPC node for block references, the cycle scheduler and the
 * HTTP server.
 *
 * Environment Variables: see .env.example. An invalid value is fatal and
 * the scheduler never starts.
 */

import * as dotenv from 'dotenv';
import type { JsonRpcProvider } from 'ethers';
import { loadAnalyzerConfig } from '@mev-sentinel/config';
import {
  closeHealthServer,
  createLogger,
  createRedisConnection,
  disconnectRedis,
  runServiceMain,
  setupServiceShutdown
} from '@mev-sentinel/core';
import type { BlockSource } from '@mev-sentinel/types';
import { MevAnalyzer } from './mev-analyzer';
import { CycleScheduler } from './cycle-scheduler';
import { createAnalyzerServer } from './http/analyzer-server';
import { RedisMarketDataSource } from './sources/redis-market-data-source';
import { createRpcBlockSource } from './sources/rpc-block-source';
import { RedisStreamAlertSink } from './sinks/redis-stream-alert-sink';

export { MevAnalyzer } from './mev-analyzer';
export type { MevAnalyzerDeps } from './mev-analyzer';
export { CycleScheduler } from './cycle-scheduler';
export type { TickResult, StopResult, SkipReason } from './cycle-scheduler';
export type { CycleReport } from './cycle-report';
export { CorrelationEnhancer } from './correlation-enhancer';
export { createAnalyzerServer } from './http/analyzer-server';

dotenv.config();

const bootstrapLogger = createLogger('mev-analyzer:main');

async function main(): Promise<void> {
  const config = loadAnalyzerConfig(process.env);
  const logger = createLogger({ name: config.serviceName });

  if (config.pools.length === 0) {
    logger.warn('No pools configured (MEV_POOLS); cycles will only process external alerts');
  }

  const redis = createRedisConnection({ url: config.redis.url, logger });
  await redis.connect();

  let provider: JsonRpcProvider | null = null;
  let blockSource: BlockSource | null = null;
  if (config.rpcUrl) {
    const rpc = createRpcBlockSource(config.rpcUrl);
    provider = rpc.provider;
    blockSource = rpc.source;
  }

  const analyzer = new MevAnalyzer({
    config,
    dataSource: new RedisMarketDataSource(redis, {
      keyPrefix: config.redis.snapshotKeyPrefix,
      logger: logger.child({ component: 'market-data' })
    }),
    alertSink: new RedisStreamAlertSink(redis, {
      stream: config.redis.alertStream,
      maxLen: config.redis.alertStreamMaxLen
    }),
    blockSource,
    logger
  });

  const scheduler = new CycleScheduler(analyzer, {
    intervalMs: config.cycleIntervalMs,
    logger: logger.child({ component: 'scheduler' }),
    stats: analyzer.getStatsTracker()
  });

  const server = createAnalyzerServer({
    port: config.healthCheckPort,
    serviceName: config.serviceName,
    logger: logger.child({ component: 'http' }),
    analyzer,
    scheduler
  });

  scheduler.start();
  logger.info('MEV analyzer started', {
    pools: config.pools.length,
    cycleIntervalMs: config.cycleIntervalMs,
    alertThreshold: config.alertThreshold,
    blockSource: blockSource ? 'rpc' : 'none',
    port: config.healthCheckPort
  });

  setupServiceShutdown({
    logger,
    serviceName: config.serviceName,
    shutdownTimeoutMs: config.shutdownTimeoutMs + 2000,
    onShutdown: async () => {
      const { hadInFlightCycle, drained } = await scheduler.stop(config.shutdownTimeoutMs);
      if (hadInFlightCycle && !drained) {
        logger.warn('Shutting down with an analysis cycle still in flight');
      }
      await closeHealthServer(server);
      await disconnectRedis(redis, logger);
      provider?.destroy();
    }
  });
}

runServiceMain({ main, serviceName: 'MEV Analyzer', logger: bootstrapLogger });
