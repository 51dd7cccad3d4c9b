/**
 * Block Reference Tracker
 *
 * Keeps the block reference stamped on opportunities monotonically
 * non-decreasing. Without a block source, or when it fails, the highest
 * reference seen so far is used; external alerts advance it through observe().
 */

import {
  DataSourceError,
  ErrorCode,
  TimeoutError,
  type BlockSource
} from '@mev-sentinel/types';
import { getErrorMessage, toError, withTimeout, type ILogger } from '@mev-sentinel/core';

export interface BlockReferenceOptions {
  timeoutMs: number;
  logger: ILogger;
  initialBlock?: number;
}

export class BlockReferenceTracker {
  private lastSeen: number;
  private failures = 0;
  private readonly timeoutMs: number;
  private readonly logger: ILogger;

  constructor(
    private readonly source: BlockSource | null,
    options: BlockReferenceOptions
  ) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.lastSeen = options.initialBlock ?? 0;
  }

  /**
   * Fold a reported block into the reference.
   *
   * @returns The reference after the update (never lower than before)
   */
  observe(block: number): number {
    if (Number.isInteger(block) && block > this.lastSeen) {
      this.lastSeen = block;
    }
    return this.lastSeen;
  }

  /**
   * Ask the block source for the chain height. Failures are logged and
   * the last seen reference is returned.
   */
  async refresh(): Promise<number> {
    if (!this.source) {
      return this.lastSeen;
    }

    try {
      const block = await withTimeout(this.source.currentBlock(), this.timeoutMs, 'block reference fetch');
      if (!Number.isInteger(block) || block < 0) {
        throw new DataSourceError(`Block source returned an invalid height: ${block}`, 'block-source', {
          code: ErrorCode.BLOCK_SOURCE_FAILED
        });
      }
      return this.observe(block);
    } catch (error) {
      const failure = error instanceof DataSourceError
        ? error
        : new DataSourceError(`Block reference fetch failed: ${getErrorMessage(error)}`, 'block-source', {
          code: error instanceof TimeoutError ? ErrorCode.DATA_SOURCE_TIMEOUT : ErrorCode.BLOCK_SOURCE_FAILED,
          cause: toError(error)
        });

      this.failures++;
      this.logger.warn('Block reference unavailable, keeping last seen block', {
        code: failure.code,
        error: failure.message,
        lastSeen: this.lastSeen
      });
      return this.lastSeen;
    }
  }

  getFailureCount(): number {
    return this.failures;
  }
}
