/**
 * In-Memory Collaborators
 *
 * Fakes for the analyzer's ports. Each one records what it received and can
 * be told to fail or stall, so cycle behaviour can be driven without Redis
 * or an RPC node.
 */

import type {
  AlertSink,
  BlockSource,
  MarketDataSource,
  MarketSnapshot,
  Opportunity,
  ScoreEnhancer
} from '@mev-sentinel/types';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// =============================================================================
// Market Data
// =============================================================================

export class StaticMarketDataSource implements MarketDataSource {
  readonly name = 'static';
  private snapshots = new Map<string, MarketSnapshot>();
  private failure: Error | null = null;
  private latencyMs = 0;
  readonly requests: string[][] = [];

  constructor(initial: Record<string, MarketSnapshot> = {}) {
    this.setSnapshots(initial);
  }

  setSnapshots(snapshots: Record<string, MarketSnapshot>): void {
    this.snapshots = new Map(Object.entries(snapshots));
  }

  setSnapshot(poolId: string, snapshot: MarketSnapshot): void {
    this.snapshots.set(poolId, snapshot);
  }

  removeSnapshot(poolId: string): void {
    this.snapshots.delete(poolId);
  }

  /** Pass null to recover */
  failWith(error: Error | null): void {
    this.failure = error;
  }

  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  async fetchSnapshots(pools: readonly string[]): Promise<Map<string, MarketSnapshot>> {
    this.requests.push([...pools]);
    if (this.latencyMs > 0) await delay(this.latencyMs);
    if (this.failure) throw this.failure;

    const result = new Map<string, MarketSnapshot>();
    for (const pool of pools) {
      const snapshot = this.snapshots.get(pool);
      if (snapshot) result.set(pool, snapshot);
    }
    return result;
  }
}

// =============================================================================
// Block Height
// =============================================================================

export class StubBlockSource implements BlockSource {
  private failure: Error | null = null;
  calls = 0;

  constructor(private block = 19_000_000) {}

  setBlock(block: number): void {
    this.block = block;
  }

  failWith(error: Error | null): void {
    this.failure = error;
  }

  async currentBlock(): Promise<number> {
    this.calls++;
    if (this.failure) throw this.failure;
    return this.block;
  }
}

// =============================================================================
// Alerts
// =============================================================================

export class InMemoryAlertSink implements AlertSink {
  readonly name = 'in-memory';
  readonly sent: Opportunity[] = [];
  readonly attempted: Opportunity[] = [];
  private shouldFail: (opportunity: Opportunity) => boolean = () => false;
  private latencyMs = 0;

  /** Fail every send the predicate matches */
  failWhen(predicate: (opportunity: Opportunity) => boolean): void {
    this.shouldFail = predicate;
  }

  setLatency(ms: number): void {
    this.latencyMs = ms;
  }

  async send(opportunity: Opportunity): Promise<void> {
    this.attempted.push(opportunity);
    if (this.latencyMs > 0) await delay(this.latencyMs);
    if (this.shouldFail(opportunity)) {
      throw new Error(`Sink rejected ${opportunity.id}`);
    }
    this.sent.push(opportunity);
  }
}

// =============================================================================
// Enhancers
// =============================================================================

/**
 * Enhancer whose behaviour is a plain function; records each call's history.
 */
export class ScriptedEnhancer implements ScoreEnhancer {
  readonly name = 'scripted';
  readonly calls: Array<{ candidate: Opportunity; history: readonly Opportunity[] }> = [];

  constructor(
    private readonly script: (candidate: Opportunity, history: readonly Opportunity[]) => Opportunity | Promise<Opportunity> =
      candidate => candidate
  ) {}

  async enhance(candidate: Opportunity, history: readonly Opportunity[]): Promise<Opportunity> {
    this.calls.push({ candidate, history: [...history] });
    return this.script(candidate, history);
  }
}

export class FailingEnhancer implements ScoreEnhancer {
  readonly name = 'failing';
  calls = 0;

  constructor(private readonly error: Error = new Error('reasoning engine unavailable')) {}

  async enhance(): Promise<Opportunity> {
    this.calls++;
    throw this.error;
  }
}

/**
 * Never settles; exercises the enhancement timeout.
 */
export class HangingEnhancer implements ScoreEnhancer {
  readonly name = 'hanging';

  enhance(): Promise<Opportunity> {
    return new Promise<Opportunity>(() => undefined);
  }
}
