/**
 * @mev-sentinel/core - Core Library
 *
 * Infrastructure shared by analyzer services: logging, async primitives,
 * interval management, error helpers, Redis connection and service lifecycle.
 *
 * @module @mev-sentinel/core
 */

// =============================================================================
// Logging
// =============================================================================

export {
  createLogger,
  formatLogObject,
  resetLoggerCache,
  RecordingLogger,
  NullLogger
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

// =============================================================================
// Async
// =============================================================================

export {
  AsyncMutex,
  TimeoutError,
  withTimeout,
  mapConcurrent
} from './async';
export type { MutexStats } from './async';

export { IntervalManager } from './interval-manager';
export type { IntervalManagerOptions } from './interval-manager';

// =============================================================================
// Errors
// =============================================================================

export {
  toError,
  getErrorMessage,
  formatErrorForResponse
} from './error-handling';

// =============================================================================
// Redis
// =============================================================================

export { createRedisConnection, disconnectRedis, redisRetryDelay } from './redis';
export type { ClosableRedis, RedisConnectionConfig } from './redis';

// =============================================================================
// Service Lifecycle
// =============================================================================

export {
  setupServiceShutdown,
  createSimpleHealthServer,
  runServiceMain,
  closeHealthServer,
  readJsonBody,
  sendJson
} from './service-lifecycle';
export type {
  ServiceShutdownConfig,
  ServiceShutdownCleanup,
  SimpleHealthServerConfig,
  HealthCheckResult,
  RouteHandler,
  RunServiceMainConfig
} from './service-lifecycle';
