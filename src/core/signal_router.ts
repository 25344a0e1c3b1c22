import type { ReliabilityStore } from '../memory/reliability_store.js';
import { recordRejection } from '../memory/rejection_log.js';
import type { BanditSelector } from './bandit.js';
import {
  CandidateSignalSchema,
  evaluateDecision,
  type CandidateSignal,
  type GateLearningParams,
  type Verdict,
} from './decision_gate.js';
import type { SignalEnvelope } from './feeds.js';
import type { Logger } from './logger.js';
import type { ModeState } from './mode.js';
import { withStorageRetry } from './retry.js';
import { resolveThresholds, type ThresholdProfile } from './threshold_policy.js';

export type RoutedSignal = {
  signal: CandidateSignal;
  verdict: Verdict;
};

export type RouteResult = {
  approved: RoutedSignal[];
  rejected: RoutedSignal[];
  /** Approved by the gate but over the per-run approval cap; left unsettled. */
  capped: RoutedSignal[];
  malformed: Verdict[];
};

export type RouteOptions = {
  signal?: AbortSignal;
  /**
   * Called with a candidate's input index once it needs no further routing:
   * its outcome is committed, or it is malformed.
   */
  onSettled?: (index: number) => void;
};

export interface SignalRouterOptions {
  store: ReliabilityStore;
  bandit: BanditSelector;
  mode: ModeState;
  profiles: ReadonlyMap<string, ThresholdProfile>;
  learning?: Partial<GateLearningParams>;
  maxApprovalsPerRun?: number;
  retry?: { retries: number; baseDelayMs: number; maxDelayMs: number };
  logger: Logger;
}

type Scored = { signal: CandidateSignal; deliberation: unknown; sourceScore: number; order: number };

const DEFAULT_RETRY = { retries: 3, baseDelayMs: 50, maxDelayMs: 2_000 };

export class SignalRouter {
  private readonly options: SignalRouterOptions;
  private readonly retry: { retries: number; baseDelayMs: number; maxDelayMs: number };

  constructor(options: SignalRouterOptions) {
    this.options = options;
    this.retry = options.retry ?? DEFAULT_RETRY;
  }

  /**
   * One routing pass: best-scoring sources are evaluated first and approvals
   * are capped per run. Each candidate's signal count and, for a gate
   * rejection, its rejection-log row commit in one transaction before it is
   * reported settled. ConfigurationError from threshold resolution propagates.
   */
  async route(candidates: SignalEnvelope[], options: RouteOptions = {}): Promise<RouteResult> {
    const { bandit, logger } = this.options;
    const result: RouteResult = { approved: [], rejected: [], capped: [], malformed: [] };
    const maxApprovals = this.options.maxApprovalsPerRun ?? 5;
    const settle = options.onSettled ?? (() => undefined);

    const scored: Scored[] = [];
    for (const [order, envelope] of candidates.entries()) {
      const parsed = CandidateSignalSchema.safeParse(envelope.signal);
      if (!parsed.success) {
        const verdict = this.evaluate(envelope.signal, envelope.deliberation, null, null);
        result.malformed.push(verdict);
        logger.warn('router.malformed_signal', { reason: verdict.reason });
        settle(order);
        continue;
      }
      scored.push({
        signal: parsed.data,
        deliberation: envelope.deliberation,
        sourceScore: bandit.scoreSource(parsed.data.source).score,
        order,
      });
    }

    scored.sort((a, b) => b.sourceScore - a.sourceScore || a.order - b.order);

    for (const entry of scored) {
      if (options.signal?.aborted) {
        logger.warn('router.aborted', { remaining: scored.length - this.processed(result) });
        break;
      }
      const strategy = await withStorageRetry(
        'select strategy',
        () => bandit.selectStrategy(entry.signal.strategyHint)?.name ?? null,
        this.retry
      );
      const verdict = this.evaluate(entry.signal, entry.deliberation, strategy, entry.sourceScore);
      const routed: RoutedSignal = { signal: entry.signal, verdict };

      if (verdict.decision === 'APPROVE' && result.approved.length >= maxApprovals) {
        result.capped.push(routed);
        logger.info('router.capped', { source: entry.signal.source, signalId: entry.signal.signalId });
        continue;
      }

      await withStorageRetry('record routed signal', () => this.commit(entry.signal, verdict), this.retry);
      settle(entry.order);

      if (verdict.decision === 'APPROVE') {
        result.approved.push(routed);
        logger.info('router.approved', {
          source: entry.signal.source,
          signalId: entry.signal.signalId,
          strategy,
          sizeMultiplier: verdict.sizeMultiplier,
          tags: verdict.tags,
        });
      } else {
        result.rejected.push(routed);
        logger.info('router.rejected', {
          source: entry.signal.source,
          signalId: entry.signal.signalId,
          reasonCode: verdict.reasonCode,
        });
      }
    }

    logger.info('router.run', {
      candidates: candidates.length,
      approved: result.approved.length,
      rejected: result.rejected.length,
      capped: result.capped.length,
      malformed: result.malformed.length,
    });
    return result;
  }

  private commit(signal: CandidateSignal, verdict: Verdict): void {
    const { store } = this.options;
    const db = store.database;
    const write = db.transaction(() => {
      store.recordSignal(signal.source);
      if (verdict.decision === 'REJECT') {
        recordRejection(
          {
            signalId: signal.signalId ?? null,
            source: signal.source,
            token: signal.token ?? null,
            reasonCode: verdict.reasonCode,
            reason: verdict.reason,
            operatingMode: verdict.operatingMode ?? this.options.mode.operatingMode,
            profile: verdict.profile ?? this.options.mode.activeProfile,
            referencePrice: signal.referencePrice ?? null,
          },
          db
        );
      }
    });
    write.immediate();
  }

  private evaluate(
    signal: unknown,
    deliberation: unknown,
    strategy: string | null,
    sourceScore: number | null
  ): Verdict {
    // Resolved per decision so coherence and the floor are re-checked each time.
    const resolved = resolveThresholds(this.options.mode, this.options.profiles);
    return evaluateDecision({
      signal,
      deliberation,
      resolved,
      bandit: { strategy, sourceScore },
      learning: this.options.learning,
    });
  }

  private processed(result: RouteResult): number {
    return result.approved.length + result.rejected.length + result.capped.length;
  }
}
