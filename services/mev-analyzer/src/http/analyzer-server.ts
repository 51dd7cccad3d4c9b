/**
 * Analyzer HTTP Server
 *
 * GET  /health  status, scheduler state and counters
 * GET  /ready   200 once the scheduler is running
 * GET  /stats   AnalyzerStats
 * POST /alerts  ingest an ExternalAlert (202 with the recorded opportunity, 400 when invalid)
 */

import type { IncomingMessage, Server, ServerResponse } from 'http';
import { ValidationError } from '@mev-sentinel/types';
import {
  createSimpleHealthServer,
  formatErrorForResponse,
  readJsonBody,
  sendJson,
  type ILogger
} from '@mev-sentinel/core';
import type { MevAnalyzer } from '../mev-analyzer';
import type { CycleScheduler } from '../cycle-scheduler';

export interface AnalyzerServerConfig {
  port: number;
  host?: string;
  serviceName: string;
  logger: ILogger;
  analyzer: Pick<MevAnalyzer, 'getStats' | 'getCounters' | 'ingestExternal'>;
  scheduler: Pick<CycleScheduler, 'isStarted' | 'getState'>;
}

function methodNotAllowed(res: ServerResponse, allowed: string): void {
  res.setHeader('Allow', allowed);
  sendJson(res, 405, { error: 'Method not allowed' });
}

export function createAnalyzerServer(config: AnalyzerServerConfig): Server {
  const { analyzer, scheduler, logger } = config;

  const handleStats = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (req.method !== 'GET') {
      methodNotAllowed(res, 'GET');
      return;
    }
    sendJson(res, 200, await analyzer.getStats());
  };

  const handleAlert = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (req.method !== 'POST') {
      methodNotAllowed(res, 'POST');
      return;
    }

    try {
      const body = await readJsonBody(req);
      const opportunity = await analyzer.ingestExternal(body);
      sendJson(res, 202, { opportunity });
    } catch (error) {
      if (error instanceof ValidationError) {
        logger.warn('Rejected external alert', { error: error.message });
        sendJson(res, 400, formatErrorForResponse(error));
        return;
      }
      throw error;
    }
  };

  return createSimpleHealthServer({
    port: config.port,
    host: config.host,
    serviceName: config.serviceName,
    logger,
    description: 'MEV opportunity detection and risk scoring',
    healthCheck: () => {
      const counters = analyzer.getCounters();
      return {
        status: counters.lastCycleStatus === 'failed' ? 'degraded' : 'healthy',
        scheduler: scheduler.getState(),
        counters
      };
    },
    readyCheck: () => scheduler.isStarted(),
    additionalRoutes: {
      '/stats': handleStats,
      '/alerts': handleAlert
    }
  });
}
