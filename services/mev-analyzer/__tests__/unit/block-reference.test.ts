/**
 * Block Reference Tests
 *
 * RpcBlockSource error mapping and the monotonic BlockReferenceTracker.
 */

import { describe, it, expect } from '@jest/globals';
import { RecordingLogger } from '@mev-sentinel/core';
import { StubBlockSource } from '@mev-sentinel/test-utils';
import { DataSourceError, ErrorCode, type BlockSource } from '@mev-sentinel/types';
import { BlockReferenceTracker } from '../../src/block-reference';
import { RpcBlockSource } from '../../src/sources/rpc-block-source';

describe('RpcBlockSource', () => {
  it('returns the provider block number', async () => {
    const source = new RpcBlockSource({ getBlockNumber: async () => 19_000_123 });
    await expect(source.currentBlock()).resolves.toBe(19_000_123);
  });

  it('wraps provider failures in a DataSourceError', async () => {
    const source = new RpcBlockSource({
      getBlockNumber: async () => {
        throw new Error('connection refused');
      }
    });

    const error = await source.currentBlock().then(
      () => null,
      (reason: unknown) => reason
    );

    expect(error).toBeInstanceOf(DataSourceError);
    expect(error instanceof DataSourceError ? [error.code, error.source, error.message] : []).toEqual([
      ErrorCode.BLOCK_SOURCE_FAILED,
      'rpc',
      'RPC block number request failed: connection refused'
    ]);
  });
});

describe('BlockReferenceTracker', () => {
  it('keeps the highest block seen', async () => {
    const source = new StubBlockSource(100);
    const tracker = new BlockReferenceTracker(source, { timeoutMs: 1000, logger: new RecordingLogger() });

    expect(await tracker.refresh()).toBe(100);
    source.setBlock(90);
    expect(await tracker.refresh()).toBe(100);
    expect(tracker.observe(120)).toBe(120);
    expect(tracker.observe(110)).toBe(120);
  });

  it('logs and keeps the last block when the source fails', async () => {
    const logger = new RecordingLogger();
    const source = new StubBlockSource(100);
    const tracker = new BlockReferenceTracker(source, { timeoutMs: 1000, logger });
    await tracker.refresh();

    source.failWith(new Error('rpc unreachable'));

    expect(await tracker.refresh()).toBe(100);
    expect(tracker.getFailureCount()).toBe(1);
    expect(logger.hasLogWithMeta('warn', {
      code: ErrorCode.BLOCK_SOURCE_FAILED,
      error: 'Block reference fetch failed: rpc unreachable',
      lastSeen: 100
    })).toBe(true);
  });

  it('treats a timed out source as a data source timeout', async () => {
    const logger = new RecordingLogger();
    const hanging: BlockSource = { currentBlock: () => new Promise<number>(() => undefined) };
    const tracker = new BlockReferenceTracker(hanging, { timeoutMs: 20, logger, initialBlock: 7 });

    expect(await tracker.refresh()).toBe(7);
    expect(logger.hasLogWithMeta('warn', { code: ErrorCode.DATA_SOURCE_TIMEOUT })).toBe(true);
  });

  it('rejects a non-integer height', async () => {
    const tracker = new BlockReferenceTracker(new StubBlockSource(1.5), {
      timeoutMs: 1000,
      logger: new RecordingLogger()
    });

    expect(await tracker.refresh()).toBe(0);
    expect(tracker.getFailureCount()).toBe(1);
  });

  it('returns the last seen block without a source', async () => {
    const tracker = new BlockReferenceTracker(null, { timeoutMs: 1000, logger: new RecordingLogger() });
    tracker.observe(55);
    expect(await tracker.refresh()).toBe(55);
  });
});
