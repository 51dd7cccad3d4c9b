/**
 * Service Bootstrap Utilities
 *
 * Shutdown handling, the HTTP health server and the entry point wrapper
 * shared by analyzer services.
 */

import { createServer, IncomingMessage, ServerResponse, Server } from 'http';
import { ValidationError } from '@mev-sentinel/types';
import type { ILogger } from '../logging';
import { getErrorMessage } from '../error-handling';

// =============================================================================
// Types
// =============================================================================

export interface ServiceShutdownConfig {
  logger: ILogger;

  /** Stop schedulers, drain in-flight work, close connections */
  onShutdown: () => Promise<void>;

  serviceName: string;

  /** Force-exit after this long if onShutdown has not settled (default: 10000) */
  shutdownTimeoutMs?: number;
}

/**
 * Removes every process handler registered by setupServiceShutdown.
 */
export type ServiceShutdownCleanup = () => void;

export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void | Promise<void>;

export interface SimpleHealthServerConfig {
  /** Port to listen on; 0 picks a free port */
  port: number;

  /** Interface to bind (default: all interfaces) */
  host?: string;

  serviceName: string;

  logger: ILogger;

  description?: string;

  /**
   * Returns { status, statusCode?, ...data }. Without statusCode, 'healthy'
   * and 'degraded' map to 200 and anything else to 503.
   */
  healthCheck: () => HealthCheckResult | Promise<HealthCheckResult>;

  /** Defaults to always ready */
  readyCheck?: () => boolean;

  /**
   * Extra routes keyed by path (query string ignored). Handlers check the
   * method themselves.
   */
  additionalRoutes?: Record<string, RouteHandler>;
}

export interface HealthCheckResult {
  status: string;
  statusCode?: number;
  [key: string]: unknown;
}

export interface RunServiceMainConfig {
  main: () => Promise<void>;
  serviceName: string;
  logger?: ILogger;
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

/**
 * Register SIGTERM, SIGINT, uncaughtException and unhandledRejection
 * handlers. A second signal during shutdown is ignored.
 *
 * @returns Cleanup function that removes the handlers (used by tests)
 */
export function setupServiceShutdown(config: ServiceShutdownConfig): ServiceShutdownCleanup {
  const { logger, onShutdown, serviceName, shutdownTimeoutMs = 10000 } = config;

  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Already shutting down ${serviceName}, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;

    logger.info(`Received ${signal}, shutting down ${serviceName} gracefully`);

    const forceExitTimer = setTimeout(() => {
      logger.error(`${serviceName} shutdown timed out after ${shutdownTimeoutMs}ms, forcing exit`);
      process.exit(1);
    }, shutdownTimeoutMs);
    forceExitTimer.unref();

    try {
      await onShutdown();
      clearTimeout(forceExitTimer);
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error(`Error during ${serviceName} shutdown`, {
        error: getErrorMessage(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      process.exit(1);
    }
  };

  const sigtermHandler = (): void => {
    void shutdown('SIGTERM');
  };
  const sigintHandler = (): void => {
    void shutdown('SIGINT');
  };
  const uncaughtHandler = (error: Error): void => {
    logger.error(`Uncaught exception in ${serviceName}`, {
      error: error.message,
      stack: error.stack,
    });
    void shutdown('uncaughtException');
  };
  const rejectionHandler = (reason: unknown): void => {
    logger.error(`Unhandled rejection in ${serviceName}`, { reason: getErrorMessage(reason) });
  };

  process.on('SIGTERM', sigtermHandler);
  process.on('SIGINT', sigintHandler);
  process.on('uncaughtException', uncaughtHandler);
  process.on('unhandledRejection', rejectionHandler);

  return () => {
    process.off('SIGTERM', sigtermHandler);
    process.off('SIGINT', sigintHandler);
    process.off('uncaughtException', uncaughtHandler);
    process.off('unhandledRejection', rejectionHandler);
  };
}

// =============================================================================
// HTTP Helpers
// =============================================================================

export function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Read and parse a JSON request body.
 *
 * An oversized body is still read to the end before rejecting, so the
 * caller can answer with a 400 on an intact connection.
 *
 * @throws ValidationError when the body exceeds maxBytes or is not valid JSON
 */
export function readJsonBody(req: IncomingMessage, maxBytes = 64 * 1024): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer | string) => {
      if (tooLarge) {
        return;
      }
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      size += buffer.length;
      if (size > maxBytes) {
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(buffer);
    });

    req.on('error', reject);

    req.on('end', () => {
      if (tooLarge) {
        reject(new ValidationError(`Request body exceeds ${maxBytes} bytes`, { field: 'body' }));
        return;
      }
      try {
        resolve(JSON.parse(Buffer.concat(chunks).toString('utf8')));
      } catch {
        reject(new ValidationError('Request body is not valid JSON', { field: 'body' }));
      }
    });
  });
}

// =============================================================================
// Simple Health Server
// =============================================================================

/**
 * HTTP server with:
 * - GET /health - liveness, with whatever data healthCheck returns
 * - GET /ready - readiness
 * - GET / - service info and endpoint list
 * - additionalRoutes
 */
export function createSimpleHealthServer(config: SimpleHealthServerConfig): Server {
  const { port, host, serviceName, logger, description, healthCheck, readyCheck, additionalRoutes } = config;

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const path = (req.url ?? '').split('?')[0];

    const route = additionalRoutes?.[path];
    if (route) {
      try {
        await route(req, res);
      } catch (error) {
        logger.error('Route handler error', { path, error: getErrorMessage(error) });
        if (!res.headersSent) {
          sendJson(res, 500, { error: 'Internal server error' });
        }
      }
      return;
    }

    if (path === '/health') {
      try {
        const { statusCode, ...data } = await healthCheck();
        const code = statusCode ??
          (data.status === 'healthy' || data.status === 'degraded' ? 200 : 503);
        sendJson(res, code, { service: serviceName, ...data, timestamp: Date.now() });
      } catch (error) {
        logger.error('Health check failed', { error: getErrorMessage(error) });
        sendJson(res, 500, {
          service: serviceName,
          status: 'error',
          error: 'Internal health check failed',
        });
      }
    } else if (path === '/ready') {
      const ready = readyCheck ? readyCheck() : true;
      sendJson(res, ready ? 200 : 503, { service: serviceName, ready });
    } else if (path === '/') {
      sendJson(res, 200, {
        service: serviceName,
        description: description ?? `${serviceName} Service`,
        endpoints: ['/health', '/ready', ...Object.keys(additionalRoutes ?? {})],
      });
    } else {
      sendJson(res, 404, { error: 'Not found' });
    }
  };

  const server = createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      logger.error('Unhandled request error', { error: getErrorMessage(error) });
    });
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.error('Health server port already in use', {
        port,
        service: serviceName,
        error: error.message,
      });
      process.exit(1);
    } else {
      logger.error('Health server error', {
        service: serviceName,
        code: error.code,
        error: error.message,
      });
    }
  });

  server.listen(port, host, () => {
    logger.debug(`${serviceName} health server listening on port ${port}`);
  });

  return server;
}

// =============================================================================
// Service Runner
// =============================================================================

/**
 * Run main() with a top-level catch that logs and exits 1.
 * Skipped under Jest (JEST_WORKER_ID set) so importing the entry point is safe.
 */
export function runServiceMain(config: RunServiceMainConfig): void {
  const { main, serviceName, logger } = config;

  if (process.env.JEST_WORKER_ID) {
    return;
  }

  main().catch((error: unknown) => {
    const message = `Unhandled error in ${serviceName}`;
    if (logger) {
      logger.error(message, { error: getErrorMessage(error) });
    } else {
      console.error(`${message}:`, error);
    }
    process.exit(1);
  });
}

/**
 * Close an HTTP server, resolving after the close callback or the timeout,
 * whichever comes first.
 */
export async function closeHealthServer(server: Server | null, timeoutMs = 5000): Promise<void> {
  if (!server) {
    return;
  }

  await new Promise<void>((resolve) => {
    let resolved = false;
    const safeResolve = (): void => {
      if (!resolved) {
        resolved = true;
        resolve();
      }
    };

    const timer = setTimeout(safeResolve, timeoutMs);

    server.close(() => {
      clearTimeout(timer);
      safeResolve();
    });
  });
}
