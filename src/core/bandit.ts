import type { ReliabilityStore } from '../memory/reliability_store.js';
import { sampleBeta, type RandomSource } from './beta_sampling.js';
import {
  computeUcbScore,
  DEFAULT_SOURCE_SCORING,
  strategyExpectedValue,
  type SourceScoringParams,
} from './reliability.js';

export type StrategyRanking = {
  name: string;
  sample: number;
  expected: number;
  alpha: number;
  beta: number;
  trades: number;
};

export type SourceScore = {
  name: string;
  score: number;
  wins: number;
  losses: number;
  optimistic: boolean;
};

export interface BanditSelectorOptions {
  store: ReliabilityStore;
  rng?: RandomSource;
  scoring?: Partial<SourceScoringParams>;
}

/**
 * Thompson sampling over strategies, UCB1 over sources. Nothing is cached:
 * every ranking draws fresh samples from the current store contents.
 */
export class BanditSelector {
  private readonly store: ReliabilityStore;
  private readonly rng: RandomSource;
  private readonly scoring: SourceScoringParams;

  constructor(options: BanditSelectorOptions) {
    this.store = options.store;
    this.rng = options.rng ?? Math.random;
    this.scoring = { ...DEFAULT_SOURCE_SCORING, ...options.scoring };
  }

  rankStrategies(): StrategyRanking[] {
    return this.store
      .listStrategies()
      .map((stat) => ({
        name: stat.name,
        sample: sampleBeta(stat.alpha, stat.beta, this.rng),
        expected: strategyExpectedValue(stat),
        alpha: stat.alpha,
        beta: stat.beta,
        trades: stat.trades,
      }))
      .sort((a, b) => b.sample - a.sample);
  }

  /**
   * Keeps the hinted strategy, creating its Beta(1, 1) row on first reference
   * so it takes part in later draws. Without a hint, the top Thompson draw.
   */
  selectStrategy(hint?: string | null): StrategyRanking | null {
    const wanted = hint?.trim();
    if (wanted) {
      this.store.getStrategy(wanted);
    }
    const ranked = this.rankStrategies();
    if (wanted) {
      const hinted = ranked.find((entry) => entry.name === wanted);
      if (hinted) return hinted;
    }
    return ranked[0] ?? null;
  }

  scoreSource(name: string): SourceScore {
    const stat = this.store.peekSource(name);
    const wins = stat?.wins ?? 0;
    const losses = stat?.losses ?? 0;
    const observations = wins + losses;
    const score = computeUcbScore({
      wins,
      observations,
      totalObservations: this.store.totalSourceObservations(),
      exploration: this.scoring.exploration,
      optimisticScore: this.scoring.optimisticScore,
    });
    return { name: name.trim(), score, wins, losses, optimistic: observations === 0 };
  }
}
