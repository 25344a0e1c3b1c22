import type Database from 'better-sqlite3';

import {
  listPendingRejections,
  markRejectionChecked,
  markRejectionEvaluated,
  type CounterfactualOutcome,
  type RejectionRecord,
} from '../memory/rejection_log.js';
import { describeError } from './errors.js';
import type { PriceProvider } from './feeds.js';
import type { Logger } from './logger.js';
import { withTimeout } from './timeout.js';

export type CounterfactualParams = {
  horizonHours: number;
  missedOpportunityPct: number;
  correctRejectionPct: number;
  lookupTimeoutMs: number;
  maxPerRun: number;
  maxLookupAttempts: number;
};

export const DEFAULT_COUNTERFACTUAL_PARAMS: CounterfactualParams = {
  horizonHours: 24,
  missedOpportunityPct: 20,
  correctRejectionPct: 20,
  lookupTimeoutMs: 10_000,
  maxPerRun: 50,
  maxLookupAttempts: 5,
};

export type CounterfactualSummary = {
  examined: number;
  evaluated: number;
  abandoned: number;
  skipped: number;
  expired: number;
  outcomes: Record<CounterfactualOutcome, number>;
};

export function classifyPriceChange(
  changePct: number,
  params: Pick<CounterfactualParams, 'missedOpportunityPct' | 'correctRejectionPct'> = DEFAULT_COUNTERFACTUAL_PARAMS
): CounterfactualOutcome {
  if (changePct > params.missedOpportunityPct) return 'missed_opportunity';
  if (changePct < -params.correctRejectionPct) return 'correct_rejection';
  return 'neutral';
}

export interface CounterfactualTrackerOptions {
  db: Database.Database;
  logger: Logger;
  params?: Partial<CounterfactualParams>;
}

/**
 * Checks what rejected signals did after the horizon. Reads and writes only the
 * rejection log; reliability stats are never touched from here. Rows whose
 * price stays unknown rotate behind fresh ones and expire after
 * `maxLookupAttempts` failed lookups.
 */
export class CounterfactualTracker {
  private readonly db: Database.Database;
  private readonly logger: Logger;
  private readonly params: CounterfactualParams;

  constructor(options: CounterfactualTrackerOptions) {
    this.db = options.db;
    this.logger = options.logger;
    this.params = { ...DEFAULT_COUNTERFACTUAL_PARAMS, ...options.params };
  }

  async evaluatePending(options: {
    priceProvider: PriceProvider;
    nowMs?: number;
    signal?: AbortSignal;
  }): Promise<CounterfactualSummary> {
    const nowMs = options.nowMs ?? Date.now();
    const cutoff = new Date(nowMs - this.params.horizonHours * 3_600_000).toISOString();
    const pending = listPendingRejections({ rejectedBefore: cutoff, limit: this.params.maxPerRun }, this.db);

    const summary: CounterfactualSummary = {
      examined: 0,
      evaluated: 0,
      abandoned: 0,
      skipped: 0,
      expired: 0,
      outcomes: { missed_opportunity: 0, correct_rejection: 0, neutral: 0 },
    };

    for (const rejection of pending) {
      if (options.signal?.aborted) {
        this.logger.warn('counterfactual.aborted', { remaining: pending.length - summary.examined });
        break;
      }
      summary.examined += 1;

      const change = await this.lookup(rejection, options.priceProvider, options.signal);
      if (change.kind !== 'value') {
        if (change.kind === 'abandoned') {
          summary.abandoned += 1;
        } else {
          summary.skipped += 1;
          this.logger.debug('counterfactual.no_price', { id: rejection.id, token: rejection.token });
        }
        const status = markRejectionChecked(
          { id: rejection.id, maxChecks: this.params.maxLookupAttempts, checkedAt: new Date(nowMs).toISOString() },
          this.db
        );
        if (status === 'expired') {
          summary.expired += 1;
          this.logger.info('counterfactual.expired', {
            id: rejection.id,
            token: rejection.token,
            checks: rejection.checks + 1,
          });
        }
        continue;
      }

      const outcome = classifyPriceChange(change.value, this.params);
      const updated = markRejectionEvaluated(
        {
          id: rejection.id,
          outcome,
          priceChangePct: Math.round(change.value * 100) / 100,
          evaluatedAt: new Date(nowMs).toISOString(),
        },
        this.db
      );
      if (updated) {
        summary.evaluated += 1;
        summary.outcomes[outcome] += 1;
      }
    }

    this.logger.info('counterfactual.run', summary);
    return summary;
  }

  private async lookup(
    rejection: RejectionRecord,
    provider: PriceProvider,
    parent?: AbortSignal
  ): Promise<{ kind: 'value'; value: number } | { kind: 'unknown' } | { kind: 'abandoned' }> {
    if (!rejection.token) return { kind: 'unknown' };

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parent?.reason);
    parent?.addEventListener('abort', onParentAbort, { once: true });
    try {
      const value = await withTimeout(
        provider.getPriceChangePct(
          {
            token: rejection.token,
            source: rejection.source,
            referencePrice: rejection.referencePrice,
            rejectedAt: rejection.rejectedAt,
            horizonHours: this.params.horizonHours,
          },
          controller.signal
        ),
        this.params.lookupTimeoutMs,
        `price lookup for ${rejection.token}`,
        controller
      );
      if (value === null || !Number.isFinite(value)) return { kind: 'unknown' };
      return { kind: 'value', value };
    } catch (error) {
      this.logger.warn('counterfactual.lookup_abandoned', {
        id: rejection.id,
        token: rejection.token,
        error: describeError(error),
      });
      return { kind: 'abandoned' };
    } finally {
      parent?.removeEventListener('abort', onParentAbort);
    }
  }
}
