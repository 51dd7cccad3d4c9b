/**
 * Logging Module Tests
 *
 * Covers the Pino factory cache, BigInt formatting and the testing loggers.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  NullLogger,
  RecordingLogger,
  createLogger,
  formatLogObject,
  resetLoggerCache
} from '../../src/logging';

describe('createLogger', () => {
  beforeEach(() => {
    resetLoggerCache();
  });

  afterEach(() => {
    resetLoggerCache();
  });

  it('should return the cached instance for the same name', () => {
    const first = createLogger('scheduler');
    const second = createLogger('scheduler');
    expect(second).toBe(first);
  });

  it('should create a fresh instance after the cache is reset', () => {
    const first = createLogger('scheduler');
    resetLoggerCache();
    expect(createLogger('scheduler')).not.toBe(first);
  });

  it('should honour an explicit level', () => {
    const logger = createLogger({ name: 'quiet-component', level: 'warn', pretty: false });
    expect(logger.isLevelEnabled?.('warn')).toBe(true);
    expect(logger.isLevelEnabled?.('info')).toBe(false);
  });

  it('should return a child logger when bindings are given', () => {
    const parent = createLogger({ name: 'mev-analyzer', level: 'error', pretty: false });
    const child = createLogger({ name: 'mev-analyzer', bindings: { cycleId: 1 } });
    expect(child).not.toBe(parent);
  });
});

describe('formatLogObject', () => {
  it('should return the same object when no BigInt is present', () => {
    const meta = { poolId: 'pool-a', nested: { riskScore: 0.4 } };
    expect(formatLogObject(meta)).toBe(meta);
  });

  it('should stringify nested BigInt values', () => {
    const formatted = formatLogObject({
      blockNumber: 19000000n,
      block: { gasUsed: 21000n, hashes: ['0xabc', 5n] },
    });

    expect(formatted).toEqual({
      blockNumber: '19000000',
      block: { gasUsed: '21000', hashes: ['0xabc', '5'] },
    });
  });
});

describe('RecordingLogger', () => {
  let logger: RecordingLogger;

  beforeEach(() => {
    logger = new RecordingLogger();
  });

  it('should capture entries by level', () => {
    logger.info('Cycle completed', { cycleId: 3 });
    logger.warn('Snapshot stale', { poolId: 'pool-a' });

    expect(logger.getLogs('info')).toHaveLength(1);
    expect(logger.getWarnings()[0].msg).toBe('Snapshot stale');
    expect(logger.countAt('error')).toBe(0);
  });

  it('should match messages and metadata', () => {
    logger.error('Alert dispatch failed', { opportunityId: 'opp-1', attempt: 1 });

    expect(logger.hasLogMatching('error', /dispatch failed/)).toBe(true);
    expect(logger.hasLogMatching('error', 'Alert')).toBe(true);
    expect(logger.hasLogWithMeta('error', { opportunityId: 'opp-1' })).toBe(true);
    expect(logger.hasLogWithMeta('error', { opportunityId: 'opp-2' })).toBe(false);
  });

  it('should share entries with child loggers and record their bindings', () => {
    const child = logger.child({ component: 'ledger' });
    child.debug('Entry appended');

    const entry = logger.getLastLogAt('debug');
    expect(entry?.msg).toBe('Entry appended');
    expect(entry?.bindings).toEqual({ component: 'ledger' });
  });

  it('should clear all entries', () => {
    logger.info('one');
    logger.clear();
    expect(logger.getAllLogs()).toHaveLength(0);
  });
});

describe('NullLogger', () => {
  it('should discard entries and return itself as child', () => {
    const logger = new NullLogger();
    logger.info('ignored');
    expect(logger.child({ a: 1 })).toBe(logger);
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});
