/**
 * Cycle Scheduler
 *
 * Drives the analyzer on a fixed interval with at most one cycle in flight.
 *
 * State machine: idle → running → idle. A tick while running, or sooner
 * than intervalMs after the last successful cycle start, is skipped and
 * counted. A failed cycle does not advance lastCycleStart, so the next tick
 * retries immediately. Cycle errors never reach the timer.
 */

import { AnalyzerError, ErrorCode, TimeoutError } from '@mev-sentinel/types';
import { IntervalManager, getErrorMessage, withTimeout, type ILogger } from '@mev-sentinel/core';
import type { SkippedCycleRecorder } from './analyzer-stats';
import { failedCycleReport, type CycleReport } from './cycle-report';

export interface CycleRunner {
  runCycle(now: number): Promise<CycleReport>;
}

export type SchedulerState = 'idle' | 'running';

export type SkipReason = 'stopped' | 'in-flight' | 'too-soon';

export type TickResult =
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'executed'; report: CycleReport };

export interface StopResult {
  hadInFlightCycle: boolean;
  /** False when the in-flight cycle outlived the deadline */
  drained: boolean;
}

export interface CycleSchedulerOptions {
  intervalMs: number;
  logger: ILogger;
  stats: SkippedCycleRecorder;
  intervals?: IntervalManager;
  clock?: () => number;
}

export interface SchedulerSnapshot {
  state: SchedulerState;
  started: boolean;
  stopping: boolean;
  lastCycleStart: number | null;
  intervalMs: number;
}

const INTERVAL_NAME = 'analysis-cycle';

export class CycleScheduler {
  private readonly intervalMs: number;
  private readonly logger: ILogger;
  private readonly stats: SkippedCycleRecorder;
  private readonly intervals: IntervalManager;
  private readonly clock: () => number;

  private state: SchedulerState = 'idle';
  private lastCycleStart: number | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private started = false;
  private stopping = false;

  constructor(
    private readonly runner: CycleRunner,
    options: CycleSchedulerOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.logger = options.logger;
    this.stats = options.stats;
    this.clock = options.clock ?? Date.now;
    this.intervals = options.intervals ?? new IntervalManager({
      onError: (name, error) => {
        this.logger.error('Scheduler interval callback failed', { interval: name, error: getErrorMessage(error) });
      }
    });
  }

  async tick(now: number = this.clock()): Promise<TickResult> {
    if (this.stopping) {
      return { status: 'skipped', reason: 'stopped' };
    }

    if (this.state === 'running') {
      this.stats.recordSkippedCycle();
      this.logger.debug('Previous cycle still in flight, skipping tick');
      return { status: 'skipped', reason: 'in-flight' };
    }

    if (this.lastCycleStart !== null && now - this.lastCycleStart < this.intervalMs) {
      this.stats.recordSkippedCycle();
      return { status: 'skipped', reason: 'too-soon' };
    }

    this.state = 'running';
    const run = this.execute(now);
    this.inFlight = run;

    try {
      return { status: 'executed', report: await run };
    } finally {
      this.state = 'idle';
      this.inFlight = null;
    }
  }

  private async execute(now: number): Promise<CycleReport> {
    try {
      const report = await this.runner.runCycle(now);
      if (report.status === 'completed') {
        this.lastCycleStart = now;
      }
      return report;
    } catch (error) {
      this.logger.error('Cycle runner threw', { error: getErrorMessage(error) });
      // The runner never got to assign an id
      return failedCycleReport(0, now, Math.max(0, this.clock() - now), getErrorMessage(error));
    }
  }

  /**
   * Start ticking every intervalMs.
   *
   * @throws AnalyzerError (SERVICE_ALREADY_RUNNING) when already started
   */
  start(): void {
    if (this.started) {
      throw new AnalyzerError('Cycle scheduler is already started', ErrorCode.SERVICE_ALREADY_RUNNING);
    }
    this.started = true;
    this.stopping = false;

    this.intervals.set(INTERVAL_NAME, () => this.tick(this.clock()), this.intervalMs);
    this.logger.info('Cycle scheduler started', { intervalMs: this.intervalMs });
  }

  /**
   * Stop ticking and wait up to deadlineMs for an in-flight cycle.
   */
  async stop(deadlineMs: number): Promise<StopResult> {
    this.stopping = true;
    this.started = false;
    this.intervals.clear(INTERVAL_NAME);

    const inFlight = this.inFlight;
    if (!inFlight) {
      this.logger.info('Cycle scheduler stopped');
      return { hadInFlightCycle: false, drained: true };
    }

    try {
      await withTimeout(inFlight, deadlineMs, 'in-flight cycle drain');
      this.logger.info('Cycle scheduler stopped after draining in-flight cycle');
      return { hadInFlightCycle: true, drained: true };
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn('In-flight cycle did not finish before the shutdown deadline', { deadlineMs });
        return { hadInFlightCycle: true, drained: false };
      }
      throw error;
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  getState(): SchedulerSnapshot {
    return {
      state: this.state,
      started: this.started,
      stopping: this.stopping,
      lastCycleStart: this.lastCycleStart,
      intervalMs: this.intervalMs
    };
  }
}
