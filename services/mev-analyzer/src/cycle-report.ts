import type { Opportunity } from '@mev-sentinel/types';

/**
 * Outcome of one analysis cycle.
 *
 * A failed report still carries the progress made before the failure,
 * in particular how many opportunities were already appended to the ledger.
 */
export interface CycleReport {
  cycleId: number;
  status: 'completed' | 'failed';
  startedAt: number;
  durationMs: number;
  poolsEvaluated: number;
  poolsSkipped: number;
  staleSnapshots: number;
  /** Final (post-enhancement) opportunities */
  opportunities: Opportunity[];
  alertsSent: number;
  dispatchFailures: number;
  appended: number;
  error?: string;
}

export type CycleProgress = Omit<CycleReport, 'cycleId' | 'status' | 'startedAt' | 'durationMs' | 'error'>;

export function emptyProgress(): CycleProgress {
  return {
    poolsEvaluated: 0,
    poolsSkipped: 0,
    staleSnapshots: 0,
    opportunities: [],
    alertsSent: 0,
    dispatchFailures: 0,
    appended: 0
  };
}

export function failedCycleReport(
  cycleId: number,
  startedAt: number,
  durationMs: number,
  error: string,
  progress: CycleProgress = emptyProgress()
): CycleReport {
  return { cycleId, status: 'failed', startedAt, durationMs, ...progress, error };
}
