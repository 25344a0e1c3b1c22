import type { AppliedTradeOutcome } from '../memory/outcome_log.js';

export type PatternGroupStats = {
  key: string;
  trades: number;
  wins: number;
  losses: number;
  winRate: number;
  avgPnlPercent: number;
};

export type PatternInsight = {
  kind: 'best_strategy' | 'worst_strategy' | 'best_source' | 'worst_source';
  key: string;
  trades: number;
  winRate: number;
  message: string;
};

export type PatternReport = {
  window: number;
  trades: number;
  wins: number;
  losses: number;
  winRate: number;
  avgPnlPercent: number;
  byStrategy: PatternGroupStats[];
  bySource: PatternGroupStats[];
  insights: PatternInsight[];
};

export type PatternExtractionOptions = {
  window?: number;
  minTrades?: number;
  minInsightTrades?: number;
};

type OutcomeLike = Pick<AppliedTradeOutcome, 'strategy' | 'source' | 'pnlPercent' | 'isWin'>;

function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function summarize(key: string, outcomes: OutcomeLike[]): PatternGroupStats {
  const wins = outcomes.filter((outcome) => outcome.isWin).length;
  const totalPnl = outcomes.reduce((sum, outcome) => sum + outcome.pnlPercent, 0);
  return {
    key,
    trades: outcomes.length,
    wins,
    losses: outcomes.length - wins,
    winRate: outcomes.length > 0 ? round(wins / outcomes.length) : 0,
    avgPnlPercent: outcomes.length > 0 ? round(totalPnl / outcomes.length) : 0,
  };
}

function groupBy(outcomes: OutcomeLike[], pick: (outcome: OutcomeLike) => string): PatternGroupStats[] {
  const groups = new Map<string, OutcomeLike[]>();
  for (const outcome of outcomes) {
    const key = pick(outcome);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(outcome);
    } else {
      groups.set(key, [outcome]);
    }
  }
  return [...groups.entries()]
    .map(([key, items]) => summarize(key, items))
    .sort((a, b) => b.winRate - a.winRate || b.trades - a.trades || a.key.localeCompare(b.key));
}

function extremes(
  groups: PatternGroupStats[],
  minTrades: number,
  label: 'strategy' | 'source'
): PatternInsight[] {
  const eligible = groups.filter((group) => group.trades >= minTrades);
  const best = eligible[0];
  if (!best) return [];
  const insights: PatternInsight[] = [
    {
      kind: label === 'strategy' ? 'best_strategy' : 'best_source',
      key: best.key,
      trades: best.trades,
      winRate: best.winRate,
      message: `best ${label} ${best.key}: ${Math.round(best.winRate * 100)}% over ${best.trades} trades`,
    },
  ];
  const worst = eligible[eligible.length - 1];
  if (worst && worst.key !== best.key) {
    insights.push({
      kind: label === 'strategy' ? 'worst_strategy' : 'worst_source',
      key: worst.key,
      trades: worst.trades,
      winRate: worst.winRate,
      message: `worst ${label} ${worst.key}: ${Math.round(worst.winRate * 100)}% over ${worst.trades} trades`,
    });
  }
  return insights;
}

/**
 * Win-rate breakdown over the most recent `window` outcomes (input ordered
 * oldest first). Returns null until at least `minTrades` outcomes exist.
 * Insights only name groups with `minInsightTrades` or more trades.
 */
export function extractPatterns(
  outcomes: OutcomeLike[],
  options: PatternExtractionOptions = {}
): PatternReport | null {
  const window = options.window ?? 20;
  const minTrades = options.minTrades ?? 10;
  const minInsightTrades = options.minInsightTrades ?? 3;

  const recent = outcomes.slice(-window);
  if (recent.length < minTrades) return null;

  const overall = summarize('all', recent);
  const byStrategy = groupBy(recent, (outcome) => outcome.strategy);
  const bySource = groupBy(recent, (outcome) => outcome.source);

  return {
    window,
    trades: overall.trades,
    wins: overall.wins,
    losses: overall.losses,
    winRate: overall.winRate,
    avgPnlPercent: overall.avgPnlPercent,
    byStrategy,
    bySource,
    insights: [
      ...extremes(byStrategy, minInsightTrades, 'strategy'),
      ...extremes(bySource, minInsightTrades, 'source'),
    ],
  };
}
