import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { BanditSelector } from '../../src/core/bandit.js';
import { createSeededRandom, sampleBeta, sampleGamma } from '../../src/core/beta_sampling.js';
import { openDatabase } from '../../src/memory/db.js';
import { ReliabilityStore } from '../../src/memory/reliability_store.js';

function createStore(): ReliabilityStore {
  const dir = mkdtempSync(join(tmpdir(), 'arbiter-bandit-'));
  return new ReliabilityStore({ db: openDatabase(join(dir, 'arbiter.sqlite')) });
}

function seedStrategy(store: ReliabilityStore, name: string, alpha: number, beta: number): void {
  store.database
    .prepare('INSERT INTO strategy_stats (name, alpha, beta, trades) VALUES (?, ?, ?, ?)')
    .run(name, alpha, beta, alpha + beta - 2);
}

describe('beta sampling', () => {
  it('draws values inside (0, 1)', () => {
    const rng = createSeededRandom(7);
    for (let i = 0; i < 500; i += 1) {
      const value = sampleBeta(0.5, 3, rng);
      expect(value).toBeGreaterThan(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('centres on alpha / (alpha + beta)', () => {
    const rng = createSeededRandom(42);
    const draws = 4_000;
    let sum = 0;
    for (let i = 0; i < draws; i += 1) {
      sum += sampleBeta(30, 10, rng);
    }
    expect(sum / draws).toBeGreaterThan(0.72);
    expect(sum / draws).toBeLessThan(0.78);
  });

  it('rejects non-positive gamma shapes', () => {
    expect(() => sampleGamma(0)).toThrow(RangeError);
    expect(() => sampleGamma(-1)).toThrow(RangeError);
  });
});

describe('BanditSelector', () => {
  it('ranks a 100/1 strategy above a 1/100 strategy in a large majority of draws', () => {
    const store = createStore();
    seedStrategy(store, 'strong', 100, 1);
    seedStrategy(store, 'weak', 1, 100);
    const bandit = new BanditSelector({ store, rng: createSeededRandom(1234) });

    let strongFirst = 0;
    const rounds = 1_000;
    for (let i = 0; i < rounds; i += 1) {
      if (bandit.rankStrategies()[0]?.name === 'strong') strongFirst += 1;
    }
    expect(strongFirst / rounds).toBeGreaterThan(0.95);
  });

  it('re-samples on every call instead of caching', () => {
    const store = createStore();
    seedStrategy(store, 'a', 2, 2);
    const bandit = new BanditSelector({ store, rng: createSeededRandom(99) });

    const first = bandit.rankStrategies()[0]?.sample;
    const second = bandit.rankStrategies()[0]?.sample;
    expect(first).not.toBe(second);
  });

  it('picks up store updates between rankings', () => {
    const store = createStore();
    const bandit = new BanditSelector({ store, rng: createSeededRandom(5) });
    expect(bandit.rankStrategies()).toEqual([]);

    store.applyOutcome('strategy', 'fresh', true);
    expect(bandit.rankStrategies().map((entry) => entry.name)).toEqual(['fresh']);
  });

  it('keeps a hinted strategy and takes the top draw without a hint', () => {
    const store = createStore();
    seedStrategy(store, 'strong', 100, 1);
    seedStrategy(store, 'weak', 1, 100);
    const bandit = new BanditSelector({ store, rng: createSeededRandom(3) });

    expect(bandit.selectStrategy('weak')?.name).toBe('weak');
    expect(bandit.selectStrategy()?.name).toBe('strong');
    expect(bandit.selectStrategy('  ')?.name).toBe('strong');
    expect(new BanditSelector({ store: createStore() }).selectStrategy()).toBeNull();
  });

  it('creates an unseen hinted strategy and includes it in later draws', () => {
    const store = createStore();
    seedStrategy(store, 'strong', 100, 1);
    const bandit = new BanditSelector({ store, rng: createSeededRandom(8) });

    expect(bandit.selectStrategy('new-strat')).toMatchObject({ name: 'new-strat', alpha: 1, beta: 1, trades: 0 });
    expect(store.listStrategies().map((stat) => stat.name)).toEqual(['new-strat', 'strong']);
    expect(bandit.rankStrategies().map((entry) => entry.name).sort()).toEqual(['new-strat', 'strong']);
  });

  it('scores unseen sources optimistically and observed ones by UCB', () => {
    const store = createStore();
    const bandit = new BanditSelector({ store });

    expect(bandit.scoreSource('new-feed')).toEqual({
      name: 'new-feed',
      score: 100,
      wins: 0,
      losses: 0,
      optimistic: true,
    });

    for (let i = 0; i < 10; i += 1) {
      store.applyOutcome('source', 'old-feed', i === 0);
    }
    const scored = bandit.scoreSource('old-feed');
    expect(scored.optimistic).toBe(false);
    expect(scored.score).toBe(77.86);
  });
});
