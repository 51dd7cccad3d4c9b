/**
 * MEV Analyzer
 *
 * Owns the cycle's state (snapshot cache, opportunity ledger, counters) and
 * exposes the three entry points:
 *
 * - runCycle(): fetch → block reference → detect → enhance and append under
 *   the ledger lock → dispatch. Never throws; failures come back in the report.
 * - ingestExternal(): validate a peer alert, append it, dispatch if it qualifies.
 * - getStats(): the stats query response.
 *
 * The ledger lock covers the correlation read and the append only. Alerts are
 * sent after it is released so a slow sink cannot block external ingestion.
 */

import {
  DataSourceError,
  ErrorCode,
  TimeoutError,
  ValidationError,
  buildOpportunityId,
  type AlertSink,
  type AnalyzerCounters,
  type AnalyzerStats,
  type BlockSource,
  type MarketDataSource,
  type MarketSnapshot,
  type Opportunity,
  type OpportunityKind,
  type ScoreEnhancer
} from '@mev-sentinel/types';
import { ExternalAlertSchema, type AnalyzerConfig } from '@mev-sentinel/config';
import {
  createLogger,
  getErrorMessage,
  toError,
  withTimeout,
  type ILogger
} from '@mev-sentinel/core';
import { AlertDispatcher } from './alert-dispatcher';
import { AnalyzerStatsTracker } from './analyzer-stats';
import { BlockReferenceTracker } from './block-reference';
import { CorrelationEnhancer } from './correlation-enhancer';
import { emptyProgress, failedCycleReport, type CycleReport } from './cycle-report';
import { DetectorSet, capValue, clampUnit } from './detectors';
import { EnhancementStage } from './enhancement-stage';
import { OpportunityLedger } from './opportunity-ledger';
import { SnapshotCache } from './snapshot-cache';

export interface MevAnalyzerDeps {
  config: AnalyzerConfig;
  dataSource: MarketDataSource;
  alertSink: AlertSink;
  /** Omit to derive block references from external alerts only */
  blockSource?: BlockSource | null;
  /** Defaults to CorrelationEnhancer with the configured policy */
  enhancer?: ScoreEnhancer;
  logger?: ILogger;
  clock?: () => number;
}

const MS_PER_HOUR = 3_600_000;

export class MevAnalyzer {
  private readonly config: AnalyzerConfig;
  private readonly dataSource: MarketDataSource;
  private readonly logger: ILogger;
  private readonly clock: () => number;
  private readonly startedAt: number;

  private readonly stats = new AnalyzerStatsTracker();
  private readonly cache = new SnapshotCache();
  private readonly ledger: OpportunityLedger;
  private readonly detectors: DetectorSet;
  private readonly blockReference: BlockReferenceTracker;
  private readonly enhancement: EnhancementStage;
  private readonly dispatcher: AlertDispatcher;

  private cycleCount = 0;

  constructor(deps: MevAnalyzerDeps) {
    this.config = deps.config;
    this.dataSource = deps.dataSource;
    this.logger = deps.logger ?? createLogger('mev-analyzer');
    this.clock = deps.clock ?? Date.now;
    this.startedAt = this.clock();

    this.ledger = new OpportunityLedger(this.config.ledgerCapacity);
    this.detectors = new DetectorSet(this.config.detection, this.logger);
    this.blockReference = new BlockReferenceTracker(deps.blockSource ?? null, {
      timeoutMs: this.config.fetchTimeoutMs,
      logger: this.logger
    });
    this.enhancement = new EnhancementStage(
      deps.enhancer ?? new CorrelationEnhancer(this.config.correlation),
      {
        enabled: this.config.correlation.enabled,
        timeoutMs: this.config.enhanceTimeoutMs,
        logger: this.logger,
        stats: this.stats
      }
    );
    this.dispatcher = new AlertDispatcher(deps.alertSink, {
      alertThreshold: this.config.alertThreshold,
      timeoutMs: this.config.dispatchTimeoutMs,
      logger: this.logger,
      stats: this.stats
    });
  }

  // ===========================================================================
  // Analysis Cycle
  // ===========================================================================

  async runCycle(now: number = this.clock()): Promise<CycleReport> {
    const cycleId = ++this.cycleCount;
    const cycleLogger = this.logger.child({ cycleId });
    const progress = emptyProgress();

    try {
      const fetched = await this.fetchSnapshots(cycleLogger);
      const { snapshots, skipped } = this.cache.resolve(this.config.pools, fetched, now);

      progress.poolsEvaluated = snapshots.length;
      progress.poolsSkipped = skipped.length;
      progress.staleSnapshots = snapshots.filter(s => s.stale).length;
      this.stats.recordSnapshotResolution(progress.staleSnapshots, progress.poolsSkipped);
      if (skipped.length > 0) {
        cycleLogger.warn('Pools skipped: no fresh or cached snapshot', { pools: skipped });
      }

      const blockReference = await this.blockReference.refresh();

      const { opportunities, failures } = this.detectors.detectAll(snapshots, blockReference, now);
      this.stats.recordDetectorFailures(failures.length);
      this.stats.recordDetected(opportunities.length);

      const windowMs = this.config.correlation.windowMs;
      progress.opportunities = await this.ledger.runExclusive(async view => {
        // History is read before anything from this cycle is appended
        const histories = new Map<string, Opportunity[]>();
        for (const opportunity of opportunities) {
          if (!histories.has(opportunity.poolId)) {
            histories.set(opportunity.poolId, view.historyFor(opportunity.poolId, now, windowMs));
          }
        }

        const finals: Opportunity[] = [];
        for (const candidate of opportunities) {
          const final = await this.enhancement.apply(candidate, histories.get(candidate.poolId) ?? []);
          progress.appended += view.append([final]);
          finals.push(final);
        }
        return finals;
      });

      const outcome = await this.dispatcher.dispatch(progress.opportunities);
      progress.alertsSent = outcome.sent.length;
      progress.dispatchFailures = outcome.failures.length;

      const durationMs = Math.max(0, this.clock() - now);
      this.stats.recordCycle('completed', now, durationMs);

      if (progress.opportunities.length > 0) {
        cycleLogger.info(`Detected ${progress.opportunities.length} MEV opportunities`, {
          alertsSent: progress.alertsSent,
          blockReference
        });
      } else {
        cycleLogger.debug('Analysis cycle completed with no opportunities', {
          poolsEvaluated: progress.poolsEvaluated
        });
      }

      return { cycleId, status: 'completed', startedAt: now, durationMs, ...progress };
    } catch (error) {
      const durationMs = Math.max(0, this.clock() - now);
      this.stats.recordCycle('failed', now, durationMs);
      cycleLogger.error('Analysis cycle failed', {
        error: getErrorMessage(error),
        appended: progress.appended
      });
      return failedCycleReport(cycleId, now, durationMs, getErrorMessage(error), progress);
    }
  }

  /**
   * @returns Fresh snapshots, or null when the fetch failed and the cache must be used
   */
  private async fetchSnapshots(logger: ILogger): Promise<Map<string, MarketSnapshot> | null> {
    if (this.config.pools.length === 0) {
      return new Map();
    }

    try {
      return await withTimeout(
        this.dataSource.fetchSnapshots(this.config.pools),
        this.config.fetchTimeoutMs,
        `snapshot fetch from ${this.dataSource.name}`
      );
    } catch (error) {
      const failure = error instanceof DataSourceError
        ? error
        : new DataSourceError(`Snapshot fetch failed: ${getErrorMessage(error)}`, this.dataSource.name, {
          code: error instanceof TimeoutError ? ErrorCode.DATA_SOURCE_TIMEOUT : ErrorCode.DATA_SOURCE_FAILED,
          cause: toError(error)
        });

      logger.warn('Snapshot fetch failed, falling back to cached snapshots', {
        source: failure.source,
        code: failure.code,
        error: failure.message
      });
      return null;
    }
  }

  // ===========================================================================
  // External Alerts
  // ===========================================================================

  /**
   * Record an alert reported by a peer.
   *
   * @throws ValidationError when the payload is not a valid alert
   */
  async ingestExternal(alert: unknown, now: number = this.clock()): Promise<Opportunity> {
    const parsed = ExternalAlertSchema.safeParse(alert);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid external alert: ${issues.join('; ')}`, {
        field: parsed.error.issues[0]?.path.join('.'),
        context: { issues }
      });
    }

    const data = parsed.data;
    const blockReference = this.blockReference.observe(data.blockReference);

    const candidate: Opportunity = {
      id: buildOpportunityId(data.poolId, data.kind, blockReference, now),
      poolId: data.poolId,
      kind: data.kind,
      estimatedValue: capValue(data.estimatedValue, this.valueCapFor(data.kind)),
      riskScore: clampUnit(data.riskScore),
      confidence: this.config.externalAlertConfidence,
      detectedAt: now,
      blockReference,
      source: 'external'
    };
    if (data.transactionRef !== undefined) {
      candidate.transactionRef = data.transactionRef;
    }

    const windowMs = this.config.correlation.windowMs;
    const final = await this.ledger.runExclusive(async view => {
      const recorded = this.config.correlateExternal
        ? await this.enhancement.apply(candidate, view.historyFor(candidate.poolId, now, windowMs))
        : candidate;
      view.append([recorded]);
      return recorded;
    });

    this.stats.recordExternalAlert();
    this.logger.info('External MEV alert ingested', {
      opportunityId: final.id,
      kind: final.kind,
      riskScore: final.riskScore
    });

    await this.dispatcher.dispatch([final]);
    return final;
  }

  private valueCapFor(kind: OpportunityKind): number {
    return this.config.detection[kind].valueCap;
  }

  // ===========================================================================
  // Stats
  // ===========================================================================

  async getStats(now: number = this.clock()): Promise<AnalyzerStats> {
    const counters = this.stats.getCounters();
    return {
      opportunitiesDetectedTotal: counters.opportunitiesDetectedTotal,
      alertsSentTotal: counters.alertsSentTotal,
      uptimeHours: Math.max(0, now - this.startedAt) / MS_PER_HOUR,
      activeOpportunityCount: await this.ledger.size(),
      cycleIntervalSeconds: this.config.cycleIntervalMs / 1000
    };
  }

  getCounters(): AnalyzerCounters {
    return this.stats.getCounters();
  }

  /**
   * Shared with the scheduler so skipped ticks land in the same counters.
   */
  getStatsTracker(): AnalyzerStatsTracker {
    return this.stats;
  }

  getLedger(): OpportunityLedger {
    return this.ledger;
  }
}
