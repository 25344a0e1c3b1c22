import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { BanditSelector } from '../../src/core/bandit.js';
import { createSeededRandom } from '../../src/core/beta_sampling.js';
import { ConfigurationError } from '../../src/core/errors.js';
import { Logger } from '../../src/core/logger.js';
import { createModeState } from '../../src/core/mode.js';
import { SignalRouter } from '../../src/core/signal_router.js';
import type { ThresholdProfile } from '../../src/core/threshold_policy.js';
import { openDatabase } from '../../src/memory/db.js';
import { listRejections } from '../../src/memory/rejection_log.js';
import { ReliabilityStore } from '../../src/memory/reliability_store.js';

const PROFILES: ReadonlyMap<string, ThresholdProfile> = new Map([
  [
    'paper_learning',
    { name: 'paper_learning', policy: 'learning', minTrustScore: 30, minConfidenceScore: 40, minSignalScore: 30 },
  ],
]);

function setup(options?: { activeProfile?: string; maxApprovalsPerRun?: number }) {
  const dir = mkdtempSync(join(tmpdir(), 'arbiter-router-'));
  const store = new ReliabilityStore({ db: openDatabase(join(dir, 'arbiter.sqlite')) });
  const bandit = new BanditSelector({ store, rng: createSeededRandom(11) });
  const router = new SignalRouter({
    store,
    bandit,
    mode: createModeState({
      operatingMode: 'LEARNING',
      portfolioMode: 'LEARNING',
      activeProfile: options?.activeProfile ?? 'paper_learning',
    }),
    profiles: PROFILES,
    maxApprovalsPerRun: options?.maxApprovalsPerRun ?? 5,
    logger: new Logger('error'),
  });
  return { store, router };
}

const approve = { verdict: 'APPROVE', confidence: 70 };

describe('SignalRouter', () => {
  it('approves, rejects and logs rejections for counterfactual tracking', async () => {
    const { store, router } = setup();

    const result = await router.route([
      {
        signal: { signalId: 'sig-1', source: 'feed-a', strategyHint: 'alpha-strat', trustScore: 60, confidenceScore: 60, signalScore: 60 },
        deliberation: approve,
      },
      {
        signal: {
          signalId: 'sig-2',
          source: 'feed-b',
          token: 'TKN',
          referencePrice: 1.5,
          trustScore: 10,
          confidenceScore: 60,
          signalScore: 60,
        },
        deliberation: approve,
      },
      { signal: { source: 'feed-x' }, deliberation: approve },
    ]);

    expect(result.approved.map((entry) => entry.signal.signalId)).toEqual(['sig-1']);
    expect(result.approved[0]?.verdict.strategy).toBe('alpha-strat');
    expect(result.rejected.map((entry) => entry.verdict.reasonCode)).toEqual(['below_trust_threshold']);
    expect(result.malformed.map((verdict) => verdict.reasonCode)).toEqual(['malformed_signal']);

    const rows = listRejections({}, store.database);
    expect(rows).toHaveLength(1);
    expect(rows[0]).toMatchObject({
      signalId: 'sig-2',
      source: 'feed-b',
      token: 'TKN',
      referencePrice: 1.5,
      reasonCode: 'below_trust_threshold',
      reason: 'below trust threshold',
      operatingMode: 'LEARNING',
      profile: 'paper_learning',
      status: 'pending',
    });
    expect(store.getSource('feed-a').signals).toBe(1);
    expect(store.peekSource('feed-x')).toBeNull();
  });

  it('evaluates better-scoring sources first and caps approvals per run', async () => {
    const { store, router } = setup({ maxApprovalsPerRun: 1 });
    for (let i = 0; i < 10; i += 1) store.applyOutcome('source', 'feed-c', false);

    const good = { trustScore: 60, confidenceScore: 60, signalScore: 60 };
    const result = await router.route([
      { signal: { signalId: 'from-c', source: 'feed-c', ...good }, deliberation: approve },
      { signal: { signalId: 'from-a', source: 'feed-a', ...good }, deliberation: approve },
    ]);

    expect(result.approved.map((entry) => entry.signal.signalId)).toEqual(['from-a']);
    expect(result.approved[0]?.verdict.sourceScore).toBe(100);
    expect(result.capped.map((entry) => entry.signal.signalId)).toEqual(['from-c']);
    expect(result.capped[0]?.verdict.sourceScore).toBe(67.86);
    expect(listRejections({}, store.database)).toEqual([]);
  });

  it('propagates configuration errors from threshold resolution', async () => {
    const { router } = setup({ activeProfile: 'ghost' });
    await expect(
      router.route([
        { signal: { source: 'feed-a', trustScore: 60, confidenceScore: 60, signalScore: 60 }, deliberation: approve },
      ])
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('stops early once aborted', async () => {
    const { router } = setup();
    const controller = new AbortController();
    controller.abort();
    const result = await router.route(
      [{ signal: { source: 'feed-a', trustScore: 60, confidenceScore: 60, signalScore: 60 }, deliberation: approve }],
      { signal: controller.signal }
    );
    expect(result.approved).toEqual([]);
    expect(result.rejected).toEqual([]);
  });

  it('reports settled inputs and leaves capped approvals unsettled', async () => {
    const { router } = setup({ maxApprovalsPerRun: 1 });
    const good = { trustScore: 60, confidenceScore: 60, signalScore: 60 };
    const settled: number[] = [];

    await router.route(
      [
        { signal: { signalId: 'first', source: 'feed-a', ...good }, deliberation: approve },
        { signal: { source: '' }, deliberation: approve },
        { signal: { signalId: 'second', source: 'feed-a', ...good }, deliberation: approve },
        { signal: { signalId: 'weak', source: 'feed-a', ...good, trustScore: 1 }, deliberation: approve },
      ],
      { onSettled: (index) => settled.push(index) }
    );

    expect([...settled].sort()).toEqual([0, 1, 3]);
  });

  it('routes with an unseen hinted strategy and starts tracking it', async () => {
    const { store, router } = setup();
    store.applyOutcome('strategy', 'alpha-strat', true);

    const result = await router.route([
      {
        signal: { source: 'feed-a', strategyHint: 'new-strat', trustScore: 60, confidenceScore: 60, signalScore: 60 },
        deliberation: approve,
      },
    ]);

    expect(result.approved[0]?.verdict.strategy).toBe('new-strat');
    expect(store.listStrategies().map((stats) => stats.name).sort()).toEqual(['alpha-strat', 'new-strat']);
  });
});
