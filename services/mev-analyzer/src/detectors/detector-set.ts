/**
 * Detector Set
 *
 * Runs every detector over every pool's snapshot for one cycle. A pool whose
 * snapshot fails validation, or whose detectors throw, is reported as a
 * failure; the other pools are unaffected.
 *
 * Output order is deterministic: by poolId, then arbitrage, sandwich,
 * liquidation. Detections from a stale cached snapshot carry staleSnapshot.
 */

import {
  OPPORTUNITY_KINDS,
  ValidationError,
  type CachedSnapshot,
  type Opportunity,
  type OpportunityKind
} from '@mev-sentinel/types';
import { MarketSnapshotSchema, type DetectionPolicy } from '@mev-sentinel/config';
import { getErrorMessage, type ILogger } from '@mev-sentinel/core';
import { detectArbitrage } from './arbitrage-detector';
import { detectSandwich } from './sandwich-detector';
import { detectLiquidation } from './liquidation-detector';
import type { DetectionInput } from './scoring';

type Detector = (input: DetectionInput, policy: DetectionPolicy) => Opportunity | null;

const DETECTORS: Record<OpportunityKind, Detector> = {
  arbitrage: (input, policy) => detectArbitrage(input, policy.arbitrage),
  sandwich: (input, policy) => detectSandwich(input, policy.sandwich),
  liquidation: (input, policy) => detectLiquidation(input, policy.liquidation)
};

export interface DetectionFailure {
  poolId: string;
  error: Error;
}

export interface DetectionResult {
  opportunities: Opportunity[];
  failures: DetectionFailure[];
}

export class DetectorSet {
  constructor(
    private readonly policy: DetectionPolicy,
    private readonly logger: ILogger
  ) {}

  detectAll(snapshots: readonly CachedSnapshot[], blockReference: number, now: number): DetectionResult {
    const opportunities: Opportunity[] = [];
    const failures: DetectionFailure[] = [];

    const ordered = [...snapshots].sort((a, b) => compareStrings(a.poolId, b.poolId));

    for (const cached of ordered) {
      try {
        opportunities.push(...this.detectPool(cached, blockReference, now));
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(getErrorMessage(error));
        failures.push({ poolId: cached.poolId, error: failure });
        this.logger.warn('Detection failed for pool, skipping it this cycle', {
          poolId: cached.poolId,
          error: failure.message
        });
      }
    }

    return { opportunities, failures };
  }

  private detectPool(cached: CachedSnapshot, blockReference: number, now: number): Opportunity[] {
    const parsed = MarketSnapshotSchema.safeParse(cached.snapshot);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid snapshot for pool ${cached.poolId}: ${issues.join('; ')}`, {
        field: 'snapshot',
        context: { poolId: cached.poolId, issues }
      });
    }

    const input: DetectionInput = {
      poolId: cached.poolId,
      snapshot: parsed.data,
      blockReference,
      detectedAt: now
    };

    const found: Opportunity[] = [];
    for (const kind of OPPORTUNITY_KINDS) {
      const opportunity = DETECTORS[kind](input, this.policy);
      if (opportunity) {
        found.push(cached.stale ? { ...opportunity, staleSnapshot: true } : opportunity);
      }
    }
    return found;
  }
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
