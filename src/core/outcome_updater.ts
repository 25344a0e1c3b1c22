import { z } from 'zod';

import type { ReliabilityStore } from '../memory/reliability_store.js';
import { appendPatternLog, claimTradeOutcome, type PatternBucket } from '../memory/outcome_log.js';
import { DataQualityError } from './errors.js';
import type { Logger } from './logger.js';
import type { SourceStat, StrategyStat } from './reliability.js';
import { withStorageRetry } from './retry.js';

export const TradeOutcomeSchema = z.object({
  tradeId: z.string().trim().min(1),
  strategy: z.string().trim().min(1),
  source: z.string().trim().min(1),
  pnlPercent: z.number().finite(),
  // Stored as UTC ISO so text ordering in the outcome log is chronological.
  closedAt: z
    .string()
    .refine((value) => Number.isFinite(Date.parse(value)), { message: 'closedAt must be an ISO timestamp' })
    .transform((value) => new Date(value).toISOString()),
  context: z.record(z.unknown()).optional(),
});

export type TradeOutcome = z.infer<typeof TradeOutcomeSchema>;

export type RecordResult =
  | { status: 'applied'; tradeId: string; isWin: boolean; strategy: StrategyStat; source: SourceStat; patternId: number }
  | { status: 'duplicate'; tradeId: string; isWin: boolean };

export interface OutcomeUpdaterOptions {
  store: ReliabilityStore;
  logger: Logger;
  retry?: { retries: number; baseDelayMs: number; maxDelayMs: number };
}

const DEFAULT_RETRY = { retries: 3, baseDelayMs: 50, maxDelayMs: 2_000 };

export class OutcomeUpdater {
  private readonly store: ReliabilityStore;
  private readonly logger: Logger;
  private readonly retry: { retries: number; baseDelayMs: number; maxDelayMs: number };

  constructor(options: OutcomeUpdaterOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  /**
   * Apply one closed trade. The idempotence claim, both stat updates and the
   * pattern log entry commit together or not at all; a trade id already
   * claimed is reported as a duplicate and changes nothing.
   */
  async record(input: unknown): Promise<RecordResult> {
    const parsed = TradeOutcomeSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new DataQualityError(`Invalid trade outcome: ${issues.join('; ')}`, { issues });
    }
    const outcome = parsed.data;
    const isWin = outcome.pnlPercent > 0;
    const db = this.store.database;

    const apply = db.transaction((): RecordResult => {
      const claimed = claimTradeOutcome(
        {
          tradeId: outcome.tradeId,
          strategy: outcome.strategy,
          source: outcome.source,
          pnlPercent: outcome.pnlPercent,
          isWin,
          closedAt: outcome.closedAt,
        },
        db
      );
      if (!claimed) {
        return { status: 'duplicate', tradeId: outcome.tradeId, isWin };
      }
      const strategy = this.store.applyOutcome('strategy', outcome.strategy, isWin);
      const source = this.store.applyOutcome('source', outcome.source, isWin);
      const bucket: PatternBucket = isWin ? 'win' : 'loss';
      const patternId = appendPatternLog(
        {
          bucket,
          tradeId: outcome.tradeId,
          strategy: outcome.strategy,
          source: outcome.source,
          pnlPercent: outcome.pnlPercent,
          payload: { closedAt: outcome.closedAt, ...(outcome.context ?? {}) },
        },
        db
      );
      return { status: 'applied', tradeId: outcome.tradeId, isWin, strategy, source, patternId };
    });

    const result = await withStorageRetry(`record outcome ${outcome.tradeId}`, () => apply.immediate(), {
      ...this.retry,
      onRetry: ({ attempt, delayMs, error }) => {
        this.logger.warn('outcome.retry', { tradeId: outcome.tradeId, attempt, delayMs, error: String(error) });
      },
    });

    if (result.status === 'duplicate') {
      this.logger.info('outcome.duplicate', { tradeId: result.tradeId });
    } else {
      this.logger.info('outcome.applied', {
        tradeId: result.tradeId,
        isWin: result.isWin,
        strategy: result.strategy.name,
        alpha: result.strategy.alpha,
        beta: result.strategy.beta,
        source: result.source.name,
        grade: result.source.grade,
      });
    }
    return result;
  }
}
