export type SourceGrade = 'S' | 'A+' | 'A' | 'B' | 'C' | 'D' | 'F';

export type StrategyStat = {
  name: string;
  alpha: number;
  beta: number;
  trades: number;
  updatedAt: string | null;
};

export type SourceStat = {
  name: string;
  wins: number;
  losses: number;
  grade: SourceGrade;
  score: number;
  signals: number;
  updatedAt: string | null;
};

export type StatKind = 'strategy' | 'source';

export type SourceScoringParams = {
  minGradeSamples: number;
  exploration: number;
  optimisticScore: number;
};

export const DEFAULT_SOURCE_SCORING: SourceScoringParams = {
  minGradeSamples: 5,
  exploration: 2,
  optimisticScore: 100,
};

export const NEUTRAL_GRADE: SourceGrade = 'C';

export function defaultStrategyStat(name: string): StrategyStat {
  return { name, alpha: 1, beta: 1, trades: 0, updatedAt: null };
}

export function defaultSourceStat(
  name: string,
  params: SourceScoringParams = DEFAULT_SOURCE_SCORING
): SourceStat {
  return {
    name,
    wins: 0,
    losses: 0,
    grade: NEUTRAL_GRADE,
    score: params.optimisticScore,
    signals: 0,
    updatedAt: null,
  };
}

export function computeSourceGrade(
  wins: number,
  losses: number,
  minSamples = DEFAULT_SOURCE_SCORING.minGradeSamples
): SourceGrade {
  const total = wins + losses;
  if (total <= 0 || total < minSamples) return NEUTRAL_GRADE;
  const rate = wins / total;
  if (rate > 0.9) return 'S';
  if (rate >= 0.8) return 'A+';
  if (rate >= 0.7) return 'A';
  if (rate >= 0.6) return 'B';
  if (rate >= 0.5) return 'C';
  if (rate >= 0.4) return 'D';
  return 'F';
}

/**
 * UCB1 on a 0-100 scale:
 *   100 * (winRate + sqrt(exploration * ln(totalObservations) / observations))
 * clamped to [0, 100]. A source with no observations gets the optimistic score
 * so it is tried before anything with a record.
 */
export function computeUcbScore(params: {
  wins: number;
  observations: number;
  totalObservations: number;
  exploration?: number;
  optimisticScore?: number;
}): number {
  const optimistic = params.optimisticScore ?? DEFAULT_SOURCE_SCORING.optimisticScore;
  if (params.observations <= 0) return optimistic;
  const exploration = params.exploration ?? DEFAULT_SOURCE_SCORING.exploration;
  const n = Math.max(params.observations, 1);
  const total = Math.max(params.totalObservations, n, 1);
  const winRate = params.wins / n;
  const bonus = Math.sqrt((exploration * Math.log(total)) / n);
  const raw = (winRate + bonus) * 100;
  return Math.round(Math.min(100, Math.max(0, raw)) * 100) / 100;
}

export function strategyExpectedValue(stat: Pick<StrategyStat, 'alpha' | 'beta'>): number {
  return stat.alpha / (stat.alpha + stat.beta);
}

export function isStrategyStatConsistent(stat: StrategyStat): boolean {
  return stat.alpha >= 1 && stat.beta >= 1 && stat.alpha + stat.beta - 2 === stat.trades;
}

export function applyStrategyOutcome(stat: StrategyStat, isWin: boolean, nowIso: string): StrategyStat {
  return {
    ...stat,
    alpha: stat.alpha + (isWin ? 1 : 0),
    beta: stat.beta + (isWin ? 0 : 1),
    trades: stat.trades + 1,
    updatedAt: nowIso,
  };
}

/**
 * `totalObservationsBefore` is the sum of wins+losses over every source before
 * this outcome is counted.
 */
export function applySourceOutcome(
  stat: SourceStat,
  isWin: boolean,
  totalObservationsBefore: number,
  nowIso: string,
  params: SourceScoringParams = DEFAULT_SOURCE_SCORING
): SourceStat {
  const wins = stat.wins + (isWin ? 1 : 0);
  const losses = stat.losses + (isWin ? 0 : 1);
  return {
    ...stat,
    wins,
    losses,
    grade: computeSourceGrade(wins, losses, params.minGradeSamples),
    score: computeUcbScore({
      wins,
      observations: wins + losses,
      totalObservations: totalObservationsBefore + 1,
      exploration: params.exploration,
      optimisticScore: params.optimisticScore,
    }),
    updatedAt: nowIso,
  };
}
