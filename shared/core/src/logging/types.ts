/**
 * Logger Type Definitions
 *
 * ILogger decouples the analyzer from the logging library. Services take an
 * ILogger in their constructor; production passes a Pino-backed logger and
 * tests pass a RecordingLogger or NullLogger.
 */

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Structured fields attached to a log entry.
 */
export type LogMeta = Record<string, unknown>;

/**
 * Core logger interface.
 *
 * @example
 * ```typescript
 * class SnapshotCache {
 *   constructor(private readonly logger: ILogger) {}
 * }
 *
 * new SnapshotCache(createLogger('snapshot-cache'));  // production
 * new SnapshotCache(new RecordingLogger());           // test
 * ```
 */
export interface ILogger {
  fatal(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  debug(msg: string, meta?: LogMeta): void;
  trace?(msg: string, meta?: LogMeta): void;

  /**
   * Create a child logger whose entries all carry `bindings`.
   *
   * @example
   * ```typescript
   * const cycleLogger = logger.child({ cycleId: 42 });
   * cycleLogger.info('Cycle completed'); // { cycleId: 42, msg: 'Cycle completed' }
   * ```
   */
  child(bindings: LogMeta): ILogger;

  isLevelEnabled?(level: LogLevel): boolean;
}

export interface LoggerConfig {
  /** Service or component name, used as the cache key */
  name: string;
  /** @default process.env.LOG_LEVEL ?? 'info' */
  level?: LogLevel;
  /** @default NODE_ENV === 'development' && LOG_FORMAT !== 'json' */
  pretty?: boolean;
  bindings?: LogMeta;
}
