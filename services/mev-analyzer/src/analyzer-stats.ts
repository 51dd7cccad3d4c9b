/**
 * Analyzer Stats Tracker
 *
 * Process-wide counters. Owned by the analyzer and shared by reference with
 * the scheduler, enhancement stage and dispatcher so every component records
 * into the same place.
 */

import type { AnalyzerCounters } from '@mev-sentinel/types';

export type CycleStatus = 'completed' | 'failed';

/**
 * The slice of the tracker the scheduler needs.
 */
export interface SkippedCycleRecorder {
  recordSkippedCycle(): void;
}

export class AnalyzerStatsTracker implements SkippedCycleRecorder {
  private counters: AnalyzerCounters = AnalyzerStatsTracker.initialCounters();

  private static initialCounters(): AnalyzerCounters {
    return {
      opportunitiesDetectedTotal: 0,
      alertsSentTotal: 0,
      cyclesCompleted: 0,
      cyclesSkipped: 0,
      cyclesFailed: 0,
      staleSnapshotsServed: 0,
      poolsSkipped: 0,
      detectorFailures: 0,
      enhancementFailures: 0,
      dispatchFailures: 0,
      externalAlertsIngested: 0,
      lastCycleAt: null,
      lastCycleDurationMs: null,
      lastCycleStatus: null
    };
  }

  recordDetected(count: number): void {
    this.counters.opportunitiesDetectedTotal += count;
  }

  recordAlertSent(): void {
    this.counters.alertsSentTotal++;
  }

  recordDispatchFailure(): void {
    this.counters.dispatchFailures++;
  }

  recordEnhancementFailure(): void {
    this.counters.enhancementFailures++;
  }

  recordDetectorFailures(count: number): void {
    this.counters.detectorFailures += count;
  }

  recordSnapshotResolution(staleServed: number, poolsSkipped: number): void {
    this.counters.staleSnapshotsServed += staleServed;
    this.counters.poolsSkipped += poolsSkipped;
  }

  recordSkippedCycle(): void {
    this.counters.cyclesSkipped++;
  }

  recordExternalAlert(): void {
    this.counters.externalAlertsIngested++;
  }

  recordCycle(status: CycleStatus, startedAt: number, durationMs: number): void {
    if (status === 'completed') {
      this.counters.cyclesCompleted++;
    } else {
      this.counters.cyclesFailed++;
    }
    this.counters.lastCycleAt = startedAt;
    this.counters.lastCycleDurationMs = durationMs;
    this.counters.lastCycleStatus = status;
  }

  getCounters(): AnalyzerCounters {
    return { ...this.counters };
  }
}
