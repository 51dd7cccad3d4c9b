/**
 * AsyncMutex
 *
 * Mutual exclusion for async critical sections. The opportunity ledger holds
 * one so a cycle's read-modify-write and an external ingest never interleave.
 *
 * Release hands the lock directly to the next waiter, so a new caller cannot
 * slip in between a release and the waiter waking up.
 *
 * @example
 * ```ts
 * const mutex = new AsyncMutex();
 * await mutex.runExclusive(async () => {
 *   const history = ledger.historyFor(poolId);
 *   ledger.append(entry);
 * });
 * ```
 */

export interface MutexStats {
  acquireCount: number;
  /** Acquisitions that had to wait */
  contentionCount: number;
  totalWaitTimeMs: number;
  isLocked: boolean;
  waitingCount: number;
}

export class AsyncMutex {
  private locked = false;
  private readonly waitQueue: Array<() => void> = [];
  private stats: MutexStats = {
    acquireCount: 0,
    contentionCount: 0,
    totalWaitTimeMs: 0,
    isLocked: false,
    waitingCount: 0
  };

  /**
   * Acquire the mutex, waiting if it is held.
   *
   * @returns A release function that MUST be called exactly once
   */
  async acquire(): Promise<() => void> {
    const startTime = Date.now();

    if (this.locked) {
      this.stats.contentionCount++;
      this.stats.waitingCount++;

      await new Promise<void>(resolve => {
        this.waitQueue.push(resolve);
      });

      this.stats.waitingCount--;
      this.stats.totalWaitTimeMs += Date.now() - startTime;
    }

    return this.take();
  }

  /**
   * Run `fn` while holding the mutex. Released on success and on error.
   */
  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  getStats(): MutexStats {
    return { ...this.stats };
  }

  private take(): () => void {
    this.locked = true;
    this.stats.isLocked = true;
    this.stats.acquireCount++;

    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waitQueue.shift();
      if (next) {
        // Lock stays held during handoff; setImmediate keeps long queues off the stack
        setImmediate(next);
      } else {
        this.locked = false;
        this.stats.isLocked = false;
      }
    };
  }
}
