/**
 * Alert Dispatcher
 *
 * Forwards opportunities whose riskScore reaches the alert threshold to the
 * sink, one at a time and each under its own timeout. A failed send is a
 * DispatchError: logged, counted, not retried, and it does not stop the
 * remaining sends.
 */

import {
  DispatchError,
  ErrorCode,
  TimeoutError,
  type AlertSink,
  type Opportunity
} from '@mev-sentinel/types';
import { getErrorMessage, toError, withTimeout, type ILogger } from '@mev-sentinel/core';

export interface AlertDispatcherOptions {
  alertThreshold: number;
  timeoutMs: number;
  logger: ILogger;
  stats: {
    recordAlertSent(): void;
    recordDispatchFailure(): void;
  };
}

export interface DispatchOutcome {
  /** Ids of opportunities the sink accepted */
  sent: string[];
  failures: DispatchError[];
}

export class AlertDispatcher {
  private readonly options: AlertDispatcherOptions;

  constructor(
    private readonly sink: AlertSink,
    options: AlertDispatcherOptions
  ) {
    this.options = options;
  }

  qualifies(opportunity: Opportunity): boolean {
    return opportunity.riskScore >= this.options.alertThreshold;
  }

  async dispatch(opportunities: readonly Opportunity[]): Promise<DispatchOutcome> {
    const outcome: DispatchOutcome = { sent: [], failures: [] };

    for (const opportunity of opportunities) {
      if (!this.qualifies(opportunity)) continue;

      try {
        await withTimeout(
          Promise.resolve().then(() => this.sink.send(opportunity)),
          this.options.timeoutMs,
          `alert dispatch to ${this.sink.name}`
        );
        outcome.sent.push(opportunity.id);
        this.options.stats.recordAlertSent();
        this.options.logger.info('MEV alert dispatched', {
          opportunityId: opportunity.id,
          kind: opportunity.kind,
          riskScore: opportunity.riskScore,
          sink: this.sink.name
        });
      } catch (error) {
        const failure = error instanceof DispatchError
          ? error
          : new DispatchError(`Alert dispatch failed: ${getErrorMessage(error)}`, opportunity.id, {
            code: error instanceof TimeoutError ? ErrorCode.DISPATCH_TIMEOUT : ErrorCode.DISPATCH_FAILED,
            cause: toError(error),
            context: { sink: this.sink.name }
          });

        outcome.failures.push(failure);
        this.options.stats.recordDispatchFailure();
        this.options.logger.warn('Alert dispatch failed', {
          opportunityId: opportunity.id,
          sink: this.sink.name,
          code: failure.code,
          error: failure.message
        });
      }
    }

    return outcome;
  }
}
