/**
 * In-Process Redis Mock
 *
 * Covers the commands the analyzer uses: hashes for market snapshots and
 * streams for dispatched alerts. Supports failure injection (all commands or
 * a single command), artificial latency and operation tracking.
 */

export interface RedisMockOptions {
  /** Every command throws */
  simulateFailures?: boolean;
  /** Artificial latency per command (ms) */
  latencyMs?: number;
  /** Record every command for assertions */
  trackOperations?: boolean;
}

export interface RedisOperation {
  command: string;
  args: unknown[];
  timestamp: number;
}

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
}

export class RedisMock {
  private readonly hashes = new Map<string, Record<string, string>>();
  private readonly streams = new Map<string, StreamEntry[]>();
  private readonly streamSequences = new Map<string, number>();
  private readonly failingCommands = new Set<string>();
  private readonly options: RedisMockOptions;
  private operations: RedisOperation[] = [];
  private connected = true;

  constructor(options: RedisMockOptions = {}) {
    this.options = { ...options };
  }

  // =========================================================================
  // Hash Operations
  // =========================================================================

  async hset(key: string, ...fieldValues: string[]): Promise<number> {
    await this.beforeCommand('hset', [key, ...fieldValues]);
    const hash = this.hashes.get(key) ?? {};
    let newFields = 0;

    for (let i = 0; i + 1 < fieldValues.length; i += 2) {
      const field = fieldValues[i];
      if (!(field in hash)) newFields++;
      hash[field] = fieldValues[i + 1];
    }

    this.hashes.set(key, hash);
    return newFields;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    await this.beforeCommand('hgetall', [key]);
    // Redis answers an empty object for a missing key
    return { ...(this.hashes.get(key) ?? {}) };
  }

  async del(...keys: string[]): Promise<number> {
    await this.beforeCommand('del', keys);
    let deleted = 0;
    for (const key of keys) {
      if (this.hashes.delete(key) || this.streams.delete(key)) deleted++;
    }
    return deleted;
  }

  // =========================================================================
  // Stream Operations
  // =========================================================================

  /**
   * XADD key [MAXLEN [~|=] count] id field value [field value ...]
   */
  async xadd(stream: string, ...args: string[]): Promise<string | null> {
    await this.beforeCommand('xadd', [stream, ...args]);

    let index = 0;
    let maxLen: number | undefined;
    if (args[index]?.toUpperCase() === 'MAXLEN') {
      index++;
      if (args[index] === '~' || args[index] === '=') index++;
      maxLen = Number(args[index]);
      index++;
    }

    const id = args[index];
    const fieldValues = args.slice(index + 1);
    if (id === undefined || fieldValues.length === 0 || fieldValues.length % 2 !== 0) {
      throw new Error("ERR wrong number of arguments for 'xadd' command");
    }

    let messageId = id;
    if (id === '*') {
      const sequence = (this.streamSequences.get(stream) ?? 0) + 1;
      this.streamSequences.set(stream, sequence);
      messageId = `${Date.now()}-${sequence}`;
    }

    const fields: Record<string, string> = {};
    for (let i = 0; i < fieldValues.length; i += 2) {
      fields[fieldValues[i]] = fieldValues[i + 1];
    }

    const entries = this.streams.get(stream) ?? [];
    entries.push({ id: messageId, fields });
    if (maxLen !== undefined && entries.length > maxLen) {
      entries.splice(0, entries.length - maxLen);
    }
    this.streams.set(stream, entries);
    return messageId;
  }

  async xlen(stream: string): Promise<number> {
    await this.beforeCommand('xlen', [stream]);
    return this.streams.get(stream)?.length ?? 0;
  }

  // =========================================================================
  // Connection Lifecycle
  // =========================================================================

  async quit(): Promise<'OK'> {
    this.trackOperation('quit', []);
    this.connected = false;
    return 'OK';
  }

  disconnect(): void {
    this.trackOperation('disconnect', []);
    this.connected = false;
  }

  removeAllListeners(): this {
    return this;
  }

  // =========================================================================
  // Test Helpers
  // =========================================================================

  /** Seed a hash without recording an operation */
  seedHash(key: string, fields: Record<string, string | number>): void {
    const hash: Record<string, string> = {};
    for (const [field, value] of Object.entries(fields)) {
      hash[field] = String(value);
    }
    this.hashes.set(key, hash);
  }

  getStreamMessages(stream: string): StreamEntry[] {
    return [...(this.streams.get(stream) ?? [])];
  }

  getOperations(): RedisOperation[] {
    return [...this.operations];
  }

  getOperationsForCommand(command: string): RedisOperation[] {
    return this.operations.filter(op => op.command === command);
  }

  isConnected(): boolean {
    return this.connected;
  }

  /** Fail every command */
  setFailure(enabled: boolean): void {
    this.options.simulateFailures = enabled;
  }

  /** Fail one command only */
  failCommand(command: string, enabled = true): void {
    if (enabled) this.failingCommands.add(command);
    else this.failingCommands.delete(command);
  }

  setLatency(ms: number): void {
    this.options.latencyMs = ms;
  }

  clear(): void {
    this.hashes.clear();
    this.streams.clear();
    this.streamSequences.clear();
    this.failingCommands.clear();
    this.operations = [];
    this.connected = true;
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private async beforeCommand(command: string, args: unknown[]): Promise<void> {
    if (this.options.latencyMs) {
      const latency = this.options.latencyMs;
      await new Promise(resolve => setTimeout(resolve, latency));
    }
    this.trackOperation(command, args);
    if (this.options.simulateFailures || this.failingCommands.has(command)) {
      throw new Error(`Simulated Redis failure on ${command}`);
    }
    if (!this.connected) {
      throw new Error('Redis client is not connected');
    }
  }

  private trackOperation(command: string, args: unknown[]): void {
    if (this.options.trackOperations) {
      this.operations.push({ command, args, timestamp: Date.now() });
    }
  }
}
