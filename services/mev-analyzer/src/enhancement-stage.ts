/**
 * Enhancement Stage
 *
 * Runs a ScoreEnhancer under a timeout and keeps only the riskScore and
 * confidence it returns. Any failure (throw, timeout, a result for another
 * opportunity or with scores outside [0, 1]) is logged as an EnhancementError
 * and the detector's candidate passes through unchanged.
 */

import {
  EnhancementError,
  ErrorCode,
  TimeoutError,
  type Opportunity,
  type ScoreEnhancer
} from '@mev-sentinel/types';
import { getErrorMessage, toError, withTimeout, type ILogger } from '@mev-sentinel/core';

export interface EnhancementStageOptions {
  /** When false, candidates are returned as-is and the enhancer is never called */
  enabled: boolean;
  timeoutMs: number;
  logger: ILogger;
  stats: { recordEnhancementFailure(): void };
}

export class EnhancementStage {
  private readonly enabled: boolean;
  private readonly timeoutMs: number;
  private readonly logger: ILogger;
  private readonly stats: { recordEnhancementFailure(): void };

  constructor(
    private readonly enhancer: ScoreEnhancer,
    options: EnhancementStageOptions
  ) {
    this.enabled = options.enabled;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.stats = options.stats;
  }

  async apply(candidate: Opportunity, history: readonly Opportunity[]): Promise<Opportunity> {
    if (!this.enabled) {
      return candidate;
    }

    try {
      const result = await withTimeout(
        Promise.resolve().then(() => this.enhancer.enhance(candidate, history)),
        this.timeoutMs,
        `${this.enhancer.name} enhancement`
      );
      this.assertValidResult(candidate, result);
      return { ...candidate, riskScore: result.riskScore, confidence: result.confidence };
    } catch (error) {
      const failure = error instanceof EnhancementError
        ? error
        : new EnhancementError(`Score enhancement failed: ${getErrorMessage(error)}`, {
          opportunityId: candidate.id,
          cause: toError(error),
          context: { enhancer: this.enhancer.name, timedOut: error instanceof TimeoutError }
        });

      this.stats.recordEnhancementFailure();
      this.logger.warn('Score enhancement failed, keeping detector scores', {
        opportunityId: candidate.id,
        enhancer: this.enhancer.name,
        code: failure.code,
        error: failure.message
      });
      return candidate;
    }
  }

  private assertValidResult(candidate: Opportunity, result: Opportunity): void {
    const problems: string[] = [];

    if (result.id !== candidate.id || result.poolId !== candidate.poolId || result.kind !== candidate.kind) {
      problems.push('result does not describe the candidate');
    }
    if (!isUnitInterval(result.riskScore)) {
      problems.push(`riskScore ${result.riskScore} outside [0, 1]`);
    }
    if (!isUnitInterval(result.confidence)) {
      problems.push(`confidence ${result.confidence} outside [0, 1]`);
    }

    if (problems.length > 0) {
      throw new EnhancementError(`Invalid enhancement result: ${problems.join('; ')}`, {
        code: ErrorCode.ENHANCEMENT_INVALID_RESULT,
        opportunityId: candidate.id,
        context: { enhancer: this.enhancer.name }
      });
    }
  }
}

function isUnitInterval(value: number): boolean {
  return Number.isFinite(value) && value >= 0 && value <= 1;
}
