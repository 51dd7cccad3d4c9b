/**
 * Redis Connection
 *
 * Builds the ioredis client shared by the snapshot source and the alert
 * stream sink: bounded reconnect retries, lazy connect, and error/connect
 * events routed to the logger.
 */

import Redis, { RedisOptions } from 'ioredis';
import type { ILogger } from '../logging';
import { withTimeout } from '../async';
import { getErrorMessage } from '../error-handling';

/**
 * The part of the client needed to shut it down.
 */
export interface ClosableRedis {
  quit(): Promise<unknown>;
  disconnect(): void;
  removeAllListeners(): unknown;
}

export interface RedisConnectionConfig {
  url: string;
  logger: ILogger;
  /** Reconnect attempts before giving up (default: 3) */
  maxRetries?: number;
}

/**
 * Backoff for reconnect attempt `times`, or null to stop retrying.
 */
export function redisRetryDelay(times: number, maxRetries = 3): number | null {
  if (times > maxRetries) {
    return null;
  }
  return Math.min(times * 100, 3000);
}

export function createRedisConnection(config: RedisConnectionConfig): Redis {
  const { url, logger, maxRetries = 3 } = config;

  const options: RedisOptions = {
    retryStrategy: (times: number) => {
      const delay = redisRetryDelay(times, maxRetries);
      if (delay === null) {
        logger.error(`Redis connection failed after ${maxRetries} retries`);
      }
      return delay;
    },
    maxRetriesPerRequest: 3,
    lazyConnect: true
  };

  const client = new Redis(url, options);

  client.on('error', (err: Error) => {
    logger.error('Redis client error', { error: err.message });
  });

  client.on('connect', () => {
    logger.info('Redis client connected');
  });

  return client;
}

/**
 * QUIT gracefully, falling back to a hard disconnect after timeoutMs.
 */
export async function disconnectRedis(client: ClosableRedis, logger: ILogger, timeoutMs = 2000): Promise<void> {
  try {
    await withTimeout(client.quit(), timeoutMs, 'redis quit');
  } catch (error) {
    logger.warn('Redis quit failed, forcing disconnect', { error: getErrorMessage(error) });
    client.disconnect();
  }
  client.removeAllListeners();
  logger.info('Redis client disconnected');
}
