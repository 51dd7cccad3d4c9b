/**
 * Opportunity Ledger
 *
 * Bounded, append-only record of recent opportunities. Oldest entries are
 * evicted first once capacity is exceeded. Every access goes through one
 * AsyncMutex: runExclusive() hands a LedgerView to callers that need several
 * reads and writes to happen as one step (a cycle's correlation lookups and
 * appends), the async wrappers cover single operations.
 */

import { ValidationError, type Opportunity } from '@mev-sentinel/types';
import { AsyncMutex, type MutexStats } from '@mev-sentinel/core';

/**
 * Unlocked access to the ledger. Only valid inside runExclusive().
 */
export interface LedgerView {
  /** @returns Number of entries appended */
  append(opportunities: readonly Opportunity[]): number;
  /** Same-pool entries with now - windowMs <= detectedAt <= now, oldest first */
  historyFor(poolId: string, now: number, windowMs: number): Opportunity[];
  size(): number;
  list(): Opportunity[];
}

export class OpportunityLedger {
  private entries: Opportunity[] = [];
  private evicted = 0;
  private readonly mutex = new AsyncMutex();
  private readonly view: LedgerView;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new ValidationError(`Ledger capacity must be a positive integer, got ${capacity}`, {
        field: 'ledgerCapacity'
      });
    }

    this.view = {
      append: opportunities => this.appendUnlocked(opportunities),
      historyFor: (poolId, now, windowMs) => this.entries.filter(entry =>
        entry.poolId === poolId &&
        entry.detectedAt >= now - windowMs &&
        entry.detectedAt <= now
      ),
      size: () => this.entries.length,
      list: () => [...this.entries]
    };
  }

  runExclusive<T>(fn: (view: LedgerView) => Promise<T> | T): Promise<T> {
    return this.mutex.runExclusive(() => fn(this.view));
  }

  append(opportunities: readonly Opportunity[]): Promise<number> {
    return this.runExclusive(view => view.append(opportunities));
  }

  historyFor(poolId: string, now: number, windowMs: number): Promise<Opportunity[]> {
    return this.runExclusive(view => view.historyFor(poolId, now, windowMs));
  }

  size(): Promise<number> {
    return this.runExclusive(view => view.size());
  }

  list(): Promise<Opportunity[]> {
    return this.runExclusive(view => view.list());
  }

  getEvictedCount(): number {
    return this.evicted;
  }

  getLockStats(): MutexStats {
    return this.mutex.getStats();
  }

  private appendUnlocked(opportunities: readonly Opportunity[]): number {
    for (const opportunity of opportunities) {
      this.entries.push(Object.freeze({ ...opportunity }));
    }

    const overflow = this.entries.length - this.capacity;
    if (overflow > 0) {
      this.entries.splice(0, overflow);
      this.evicted += overflow;
    }

    return opportunities.length;
  }
}
