import type Database from 'better-sqlite3';

import { hasAppliedTrade, listAppliedOutcomes } from '../memory/outcome_log.js';
import type { ArbiterConfig } from './config.js';
import type { CounterfactualTracker } from './counterfactual.js';
import { DataQualityError, describeError } from './errors.js';
import type { ClosedTradeFeed, PriceProvider, SignalFeed } from './feeds.js';
import type { Logger } from './logger.js';
import type { OutcomeUpdater } from './outcome_updater.js';
import { extractPatterns, type PatternReport } from './pattern_extraction.js';
import type { JobContext, SchedulerControlPlane } from './scheduler_control_plane.js';
import type { SignalRouter } from './signal_router.js';

export const JOB_NAMES = {
  signalRouter: 'signal-router',
  postTradeAnalyzer: 'post-trade-analyzer',
  counterfactual: 'counterfactual',
} as const;

export type ArbiterJobName = (typeof JOB_NAMES)[keyof typeof JOB_NAMES];

export interface ArbiterJobDeps {
  config: ArbiterConfig;
  logger: Logger;
  router: SignalRouter;
  updater: OutcomeUpdater;
  tracker: CounterfactualTracker;
  signalFeed?: SignalFeed;
  closedTradeFeed?: ClosedTradeFeed;
  priceProvider?: PriceProvider;
}

export type PostTradeSummary = {
  seen: number;
  applied: number;
  duplicates: number;
  invalid: number;
  report: PatternReport | null;
};

export async function runSignalRouterJob(
  deps: Pick<ArbiterJobDeps, 'router'> & { signalFeed: SignalFeed },
  context: Pick<JobContext, 'signal'>
): Promise<void> {
  const batch = await deps.signalFeed.take();
  if (batch.envelopes.length === 0) return;
  const settled = new Set<number>();
  try {
    await deps.router.route(batch.envelopes, {
      signal: context.signal,
      onSettled: (index) => settled.add(index),
    });
  } finally {
    // Unsettled envelopes stay queued for the next run.
    await batch.commit(settled);
  }
}

export async function runPostTradeAnalyzerJob(
  deps: Pick<ArbiterJobDeps, 'updater' | 'config' | 'logger'> & { closedTradeFeed: ClosedTradeFeed },
  context: Pick<JobContext, 'signal'>,
  db: Database.Database
): Promise<PostTradeSummary> {
  const summary: PostTradeSummary = { seen: 0, applied: 0, duplicates: 0, invalid: 0, report: null };
  const trades = await deps.closedTradeFeed.listClosedTrades();

  for (const trade of trades) {
    if (context.signal.aborted) break;
    summary.seen += 1;
    const tradeId = readTradeId(trade);
    if (tradeId && hasAppliedTrade(tradeId, db)) {
      summary.duplicates += 1;
      continue;
    }
    try {
      const result = await deps.updater.record(trade);
      if (result.status === 'applied') {
        summary.applied += 1;
      } else {
        summary.duplicates += 1;
      }
    } catch (error) {
      if (!(error instanceof DataQualityError)) throw error;
      summary.invalid += 1;
      deps.logger.warn('post_trade.invalid_trade', { tradeId, error: describeError(error) });
    }
  }

  const { window, minTrades } = deps.config.patterns;
  summary.report = extractPatterns(listAppliedOutcomes({ limit: window }, db), { window, minTrades });
  if (summary.report) {
    for (const insight of summary.report.insights) {
      deps.logger.info('post_trade.insight', insight.message);
    }
  }
  deps.logger.info('post_trade.run', {
    seen: summary.seen,
    applied: summary.applied,
    duplicates: summary.duplicates,
    invalid: summary.invalid,
    winRate: summary.report?.winRate ?? null,
  });
  return summary;
}

function readTradeId(trade: unknown): string | null {
  if (trade && typeof trade === 'object' && 'tradeId' in trade && typeof trade.tradeId === 'string') {
    return trade.tradeId;
  }
  return null;
}

/**
 * Register the scheduled invocations whose collaborators are configured.
 * Returns the names actually registered.
 */
export function registerArbiterJobs(
  plane: SchedulerControlPlane,
  deps: ArbiterJobDeps,
  db: Database.Database
): ArbiterJobName[] {
  const { jobs } = deps.config;
  const registered: ArbiterJobName[] = [];
  const log = deps.logger;

  const signalFeed = deps.signalFeed;
  if (jobs.signalRouter.enabled && signalFeed) {
    plane.registerJob(
      {
        name: JOB_NAMES.signalRouter,
        intervalMs: jobs.signalRouter.intervalMs,
        budgetMs: jobs.signalRouter.budgetMs,
        leaseMs: jobs.signalRouter.leaseMs,
      },
      (context) => runSignalRouterJob({ router: deps.router, signalFeed }, context)
    );
    registered.push(JOB_NAMES.signalRouter);
  }

  const closedTradeFeed = deps.closedTradeFeed;
  if (jobs.postTradeAnalyzer.enabled && closedTradeFeed) {
    plane.registerJob(
      {
        name: JOB_NAMES.postTradeAnalyzer,
        intervalMs: jobs.postTradeAnalyzer.intervalMs,
        budgetMs: jobs.postTradeAnalyzer.budgetMs,
        leaseMs: jobs.postTradeAnalyzer.leaseMs,
      },
      async (context) => {
        await runPostTradeAnalyzerJob(
          { updater: deps.updater, config: deps.config, logger: log, closedTradeFeed },
          context,
          db
        );
      }
    );
    registered.push(JOB_NAMES.postTradeAnalyzer);
  }

  const priceProvider = deps.priceProvider;
  if (jobs.counterfactual.enabled && priceProvider) {
    plane.registerJob(
      {
        name: JOB_NAMES.counterfactual,
        intervalMs: jobs.counterfactual.intervalMs,
        budgetMs: jobs.counterfactual.budgetMs,
        leaseMs: jobs.counterfactual.leaseMs,
      },
      async (context) => {
        await deps.tracker.evaluatePending({ priceProvider, signal: context.signal });
      }
    );
    registered.push(JOB_NAMES.counterfactual);
  }

  if (registered.length === 0) {
    log.warn('jobs.none_registered', 'no feeds configured; nothing will be scheduled');
  }
  return registered;
}
