/**
 * Analyzer HTTP Server Tests
 *
 * Routes exercised over a real socket on 127.0.0.1 with an ephemeral port.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import http from 'http';
import { loadAnalyzerConfig } from '@mev-sentinel/config';
import { RecordingLogger, closeHealthServer } from '@mev-sentinel/core';
import {
  InMemoryAlertSink,
  StaticMarketDataSource,
  createExternalAlert,
  createSnapshot
} from '@mev-sentinel/test-utils';
import { ErrorCode } from '@mev-sentinel/types';
import { MevAnalyzer } from '../../src/mev-analyzer';
import { CycleScheduler } from '../../src/cycle-scheduler';
import { createAnalyzerServer } from '../../src/http/analyzer-server';

function request(
  port: number,
  path: string,
  options: { method?: string; body?: string } = {}
): Promise<{ statusCode: number; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      { hostname: '127.0.0.1', port, path, method: options.method ?? 'GET' },
      (res) => {
        let body = '';
        res.on('data', (chunk: Buffer) => { body += chunk.toString(); });
        res.on('end', () => resolve({ statusCode: res.statusCode ?? 0, body }));
      }
    );
    req.on('error', reject);
    if (options.body !== undefined) {
      req.write(options.body);
    }
    req.end();
  });
}

describe('createAnalyzerServer', () => {
  let server: http.Server | null = null;
  let analyzer: MevAnalyzer;
  let scheduler: CycleScheduler;
  let sink: InMemoryAlertSink;
  let port: number;

  beforeEach(async () => {
    const logger = new RecordingLogger();
    sink = new InMemoryAlertSink();
    analyzer = new MevAnalyzer({
      config: loadAnalyzerConfig({}, { pools: ['pool-a'] }),
      dataSource: new StaticMarketDataSource({ 'pool-a': createSnapshot({ volatility: 0.9 }) }),
      alertSink: sink,
      logger
    });
    scheduler = new CycleScheduler(analyzer, {
      intervalMs: 60_000,
      logger,
      stats: analyzer.getStatsTracker()
    });

    const listening = createAnalyzerServer({
      port: 0,
      host: '127.0.0.1',
      serviceName: 'mev-analyzer',
      logger,
      analyzer,
      scheduler
    });
    server = listening;
    await new Promise<void>((resolve) => listening.on('listening', resolve));

    const addr = listening.address();
    if (typeof addr !== 'object' || addr === null) {
      throw new Error('Server did not bind to a port');
    }
    port = addr.port;
  });

  afterEach(async () => {
    await scheduler.stop(100);
    await closeHealthServer(server);
    server = null;
  });

  it('reports health with scheduler state and counters', async () => {
    await analyzer.runCycle();

    const res = await request(port, '/health');
    const body = JSON.parse(res.body);

    expect(res.statusCode).toBe(200);
    expect(body.status).toBe('healthy');
    expect(body.scheduler.state).toBe('idle');
    expect(body.counters.cyclesCompleted).toBe(1);
    expect(body.counters.opportunitiesDetectedTotal).toBe(1);
  });

  it('is ready only once the scheduler is started', async () => {
    expect((await request(port, '/ready')).statusCode).toBe(503);

    scheduler.start();

    expect((await request(port, '/ready')).statusCode).toBe(200);
  });

  it('answers the stats query', async () => {
    await analyzer.runCycle();

    const res = await request(port, '/stats');
    const body = JSON.parse(res.body);

    expect(res.statusCode).toBe(200);
    expect(body.opportunitiesDetectedTotal).toBe(1);
    expect(body.alertsSentTotal).toBe(1);
    expect(body.activeOpportunityCount).toBe(1);
    expect(body.cycleIntervalSeconds).toBe(1);
  });

  it('rejects non-GET stats requests', async () => {
    const res = await request(port, '/stats', { method: 'POST', body: '{}' });
    expect(res.statusCode).toBe(405);
  });

  it('accepts a valid external alert', async () => {
    const alert = createExternalAlert({ poolId: 'pool-z', riskScore: 0.9 });

    const res = await request(port, '/alerts', { method: 'POST', body: JSON.stringify(alert) });
    const body = JSON.parse(res.body);

    expect(res.statusCode).toBe(202);
    expect(body.opportunity.poolId).toBe('pool-z');
    expect(body.opportunity.source).toBe('external');
    expect(body.opportunity.confidence).toBe(0.8);
    expect(sink.sent).toHaveLength(1);
  });

  it('answers 400 for an invalid alert', async () => {
    const res = await request(port, '/alerts', {
      method: 'POST',
      body: JSON.stringify({ poolId: 'pool-z', kind: 'sandwich' })
    });
    const body = JSON.parse(res.body);

    expect(res.statusCode).toBe(400);
    expect(body.code).toBe(ErrorCode.VALIDATION_FAILED);
    expect(body.message).toMatch(/^Invalid external alert: estimatedValue: Required/);
  });

  it('answers 400 for a malformed body', async () => {
    const res = await request(port, '/alerts', { method: 'POST', body: '{oops' });

    expect(res.statusCode).toBe(400);
    expect(JSON.parse(res.body).message).toBe('Request body is not valid JSON');
  });

  it('rejects non-POST alert requests', async () => {
    expect((await request(port, '/alerts')).statusCode).toBe(405);
  });
});
