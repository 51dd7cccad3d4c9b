/**
 * Pino Logger Implementation
 *
 * - One cached logger per name, child loggers for per-cycle context
 * - JSON output in production, pino-pretty in development
 * - BigInt values (ethers block data) are stringified before serialization
 * - Connection strings and credentials are redacted
 */

import pino, { Logger as PinoInstance, LoggerOptions } from 'pino';
import type { ILogger, LoggerConfig, LogLevel, LogMeta } from './types';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'];

const MAX_FORMAT_DEPTH = 8;

const loggerCache = new Map<string, ILogger>();

/**
 * Drop every cached logger. Used by tests and on shutdown.
 */
export function resetLoggerCache(): void {
  loggerCache.clear();
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}

function containsBigInt(value: unknown, depth: number): boolean {
  if (typeof value === 'bigint') return true;
  if (value === null || typeof value !== 'object' || depth >= MAX_FORMAT_DEPTH) return false;
  return Object.values(value).some(entry => containsBigInt(entry, depth + 1));
}

function formatValue(value: unknown, depth: number): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value === null || typeof value !== 'object') return value;
  if (depth >= MAX_FORMAT_DEPTH) return '[Max Depth]';
  if (value instanceof Date || value instanceof Error) return value;
  if (Array.isArray(value)) return value.map(entry => formatValue(entry, depth + 1));

  const formatted: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    formatted[key] = formatValue(entry, depth + 1);
  }
  return formatted;
}

/**
 * Convert BigInt values in a log object to strings. Returns the input
 * unchanged when it holds none.
 */
export function formatLogObject(obj: Record<string, unknown>): Record<string, unknown> {
  if (!containsBigInt(obj, 0)) return obj;

  const formatted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    formatted[key] = formatValue(value, 1);
  }
  return formatted;
}

class PinoLoggerWrapper implements ILogger {
  constructor(private readonly pino: PinoInstance) {}

  fatal(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.fatal(meta, msg);
    else this.pino.fatal(msg);
  }

  error(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.error(meta, msg);
    else this.pino.error(msg);
  }

  warn(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.warn(meta, msg);
    else this.pino.warn(msg);
  }

  info(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.info(meta, msg);
    else this.pino.info(msg);
  }

  debug(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.debug(meta, msg);
    else this.pino.debug(msg);
  }

  trace(msg: string, meta?: LogMeta): void {
    if (meta) this.pino.trace(meta, msg);
    else this.pino.trace(msg);
  }

  child(bindings: LogMeta): ILogger {
    return new PinoLoggerWrapper(this.pino.child(bindings));
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

function buildOptions(name: string, level: LogLevel, pretty: boolean): LoggerOptions {
  const options: LoggerOptions = {
    name,
    level,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    formatters: {
      log: formatLogObject,
      level(label: string) {
        return { level: label };
      },
    },
    base: {
      service: name,
      pid: process.pid,
    },
    redact: {
      paths: [
        'url', '*.url',
        'redisUrl', '*.redisUrl',
        'rpcUrl', '*.rpcUrl',
        'password', '*.password',
        'secret', '*.secret',
        'token', '*.token',
        'authorization', '*.authorization',
      ],
      censor: '[REDACTED]',
    },
  };

  if (pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,service',
      },
    };
  }

  return options;
}

/**
 * Create (or fetch the cached) logger for a service or component.
 *
 * @example
 * ```typescript
 * const logger = createLogger('mev-analyzer');
 * const debugLogger = createLogger({ name: 'scheduler', level: 'debug' });
 * ```
 */
export function createLogger(config: string | LoggerConfig): ILogger {
  const { name, level, pretty, bindings }: LoggerConfig =
    typeof config === 'string' ? { name: config } : config;

  let logger = loggerCache.get(name);
  if (!logger) {
    const envLevel = process.env.LOG_LEVEL;
    const resolvedLevel = level ?? (isLogLevel(envLevel) ? envLevel : 'info');
    const usePretty = pretty ?? (process.env.LOG_FORMAT !== 'json' && process.env.NODE_ENV === 'development');

    logger = new PinoLoggerWrapper(pino(buildOptions(name, resolvedLevel, usePretty)));
    loggerCache.set(name, logger);
  }

  return bindings ? logger.child(bindings) : logger;
}
