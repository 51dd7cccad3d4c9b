/**
 * CycleScheduler Tests
 *
 * At most one cycle in flight, interval gating, retry after failure,
 * idempotent start and bounded stop.
 */

import { jest, describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { AnalyzerError, ErrorCode } from '@mev-sentinel/types';
import { RecordingLogger } from '@mev-sentinel/core';
import { createDeferred, type Deferred } from '@mev-sentinel/test-utils';
import { AnalyzerStatsTracker } from '../../src/analyzer-stats';
import { emptyProgress, type CycleReport } from '../../src/cycle-report';
import { CycleScheduler, type CycleRunner } from '../../src/cycle-scheduler';

function report(status: CycleReport['status'], startedAt: number): CycleReport {
  return { cycleId: 1, status, startedAt, durationMs: 0, ...emptyProgress() };
}

class ControlledRunner implements CycleRunner {
  readonly starts: number[] = [];
  private pending: Deferred<CycleReport> | null = null;
  nextStatus: CycleReport['status'] = 'completed';
  hold = false;

  async runCycle(now: number): Promise<CycleReport> {
    this.starts.push(now);
    if (this.hold) {
      this.pending = createDeferred<CycleReport>();
      return this.pending.promise;
    }
    return report(this.nextStatus, now);
  }

  release(status: CycleReport['status'] = 'completed'): void {
    const start = this.starts[this.starts.length - 1] ?? 0;
    this.pending?.resolve(report(status, start));
    this.pending = null;
  }
}

describe('CycleScheduler', () => {
  let runner: ControlledRunner;
  let stats: AnalyzerStatsTracker;
  let logger: RecordingLogger;
  let scheduler: CycleScheduler;

  beforeEach(() => {
    runner = new ControlledRunner();
    stats = new AnalyzerStatsTracker();
    logger = new RecordingLogger();
    scheduler = new CycleScheduler(runner, { intervalMs: 1000, logger, stats });
  });

  afterEach(async () => {
    runner.release();
    await scheduler.stop(100);
  });

  describe('tick', () => {
    it('runs the first cycle immediately', async () => {
      const result = await scheduler.tick(5000);

      expect(result.status).toBe('executed');
      expect(runner.starts).toEqual([5000]);
      expect(scheduler.getState().lastCycleStart).toBe(5000);
    });

    it('skips ticks sooner than the interval after the last cycle start', async () => {
      await scheduler.tick(5000);

      expect(await scheduler.tick(5999)).toEqual({ status: 'skipped', reason: 'too-soon' });
      expect((await scheduler.tick(6000)).status).toBe('executed');
      expect(stats.getCounters().cyclesSkipped).toBe(1);
    });

    it('skips ticks while a cycle is in flight', async () => {
      runner.hold = true;
      const first = scheduler.tick(5000);

      expect(scheduler.getState().state).toBe('running');
      expect(await scheduler.tick(7000)).toEqual({ status: 'skipped', reason: 'in-flight' });

      runner.release();
      await first;

      expect(scheduler.getState().state).toBe('idle');
      expect(runner.starts).toEqual([5000]);
      expect(stats.getCounters().cyclesSkipped).toBe(1);
    });

    it('retries on the next tick after a failed cycle', async () => {
      runner.nextStatus = 'failed';
      await scheduler.tick(5000);

      expect(scheduler.getState().lastCycleStart).toBeNull();

      runner.nextStatus = 'completed';
      expect((await scheduler.tick(5001)).status).toBe('executed');
      expect(scheduler.getState().lastCycleStart).toBe(5001);
    });

    it('turns a throwing runner into a failed report', async () => {
      const throwing: CycleRunner = {
        runCycle: async () => {
          throw new Error('runner exploded');
        }
      };
      const guarded = new CycleScheduler(throwing, { intervalMs: 1000, logger, stats });

      const result = await guarded.tick(5000);

      expect(result).toEqual({
        status: 'executed',
        report: expect.objectContaining({ status: 'failed', error: 'runner exploded', startedAt: 5000 })
      });
      expect(logger.hasLogMatching('error', 'Cycle runner threw')).toBe(true);
    });
  });

  describe('start/stop', () => {
    it('refuses to start twice', () => {
      scheduler.start();

      let caught: unknown;
      try {
        scheduler.start();
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AnalyzerError);
      expect(caught instanceof AnalyzerError ? caught.code : undefined).toBe(ErrorCode.SERVICE_ALREADY_RUNNING);
    });

    it('ticks on the interval once started', async () => {
      jest.useFakeTimers();
      try {
        let clock = 10_000;
        const timed = new CycleScheduler(runner, { intervalMs: 1000, logger, stats, clock: () => clock });

        timed.start();
        clock = 11_000;
        await jest.advanceTimersByTimeAsync(1000);
        clock = 12_000;
        await jest.advanceTimersByTimeAsync(1000);

        expect(runner.starts).toEqual([11_000, 12_000]);
        await timed.stop(100);
      } finally {
        jest.useRealTimers();
      }
    });

    it('rejects ticks after stop', async () => {
      scheduler.start();
      await scheduler.stop(100);

      expect(await scheduler.tick(5000)).toEqual({ status: 'skipped', reason: 'stopped' });
      expect(scheduler.isStarted()).toBe(false);
    });

    it('reports no in-flight cycle when idle', async () => {
      scheduler.start();
      expect(await scheduler.stop(100)).toEqual({ hadInFlightCycle: false, drained: true });
    });

    it('waits for the in-flight cycle within the deadline', async () => {
      runner.hold = true;
      const tick = scheduler.tick(5000);

      const stopping = scheduler.stop(1000);
      runner.release();

      expect(await stopping).toEqual({ hadInFlightCycle: true, drained: true });
      await tick;
    });

    it('gives up on the in-flight cycle at the deadline', async () => {
      runner.hold = true;
      const tick = scheduler.tick(5000);

      expect(await scheduler.stop(20)).toEqual({ hadInFlightCycle: true, drained: false });
      expect(logger.hasLogMatching('warn', 'did not finish before the shutdown deadline')).toBe(true);

      runner.release();
      await tick;
    });
  });
});
