import type Database from 'better-sqlite3';

import { DataQualityError } from '../core/errors.js';
import {
  applySourceOutcome,
  applyStrategyOutcome,
  computeSourceGrade,
  DEFAULT_SOURCE_SCORING,
  defaultSourceStat,
  defaultStrategyStat,
  type SourceGrade,
  type SourceScoringParams,
  type SourceStat,
  type StatKind,
  type StrategyStat,
} from '../core/reliability.js';
import { openDatabase } from './db.js';

type StrategyRow = {
  name: string;
  alpha: number;
  beta: number;
  trades: number;
  updated_at: string | null;
};

type SourceRow = {
  name: string;
  wins: number;
  losses: number;
  grade: string;
  score: number;
  signals: number;
  updated_at: string | null;
};

export interface ReliabilityStoreOptions {
  db?: Database.Database;
  scoring?: Partial<SourceScoringParams>;
  nowIso?: () => string;
}

function normalizeKey(kind: StatKind, key: string): string {
  const trimmed = typeof key === 'string' ? key.trim() : '';
  if (trimmed.length === 0) {
    throw new DataQualityError(`${kind} key must be a non-empty string`);
  }
  return trimmed;
}

function toStrategyStat(row: StrategyRow): StrategyStat {
  return {
    name: row.name,
    alpha: Number(row.alpha),
    beta: Number(row.beta),
    trades: Number(row.trades),
    updatedAt: row.updated_at ?? null,
  };
}

function toSourceStat(row: SourceRow, minGradeSamples: number): SourceStat {
  const wins = Number(row.wins);
  const losses = Number(row.losses);
  // The stored grade is never trusted over the counters.
  const grade: SourceGrade = computeSourceGrade(wins, losses, minGradeSamples);
  return {
    name: row.name,
    wins,
    losses,
    grade,
    score: Number(row.score),
    signals: Number(row.signals ?? 0),
    updatedAt: row.updated_at ?? null,
  };
}

/**
 * Durable per-strategy Beta counts and per-source win/loss records. Every
 * mutation is one IMMEDIATE transaction (read, compute, write), so concurrent
 * writers on the same key serialize and readers only see committed rows.
 */
export class ReliabilityStore {
  private readonly db: Database.Database;
  private readonly scoring: SourceScoringParams;
  private readonly nowIso: () => string;

  constructor(options: ReliabilityStoreOptions = {}) {
    this.db = options.db ?? openDatabase();
    this.scoring = { ...DEFAULT_SOURCE_SCORING, ...options.scoring };
    this.nowIso = options.nowIso ?? (() => new Date().toISOString());
  }

  get database(): Database.Database {
    return this.db;
  }

  getStrategy(name: string): StrategyStat {
    const key = normalizeKey('strategy', name);
    const existing = this.readStrategy(key);
    if (existing) return existing;
    this.db
      .prepare('INSERT OR IGNORE INTO strategy_stats (name, alpha, beta, trades) VALUES (?, 1, 1, 0)')
      .run(key);
    return this.readStrategy(key) ?? defaultStrategyStat(key);
  }

  getSource(name: string): SourceStat {
    const key = normalizeKey('source', name);
    const existing = this.readSource(key);
    if (existing) return existing;
    this.insertDefaultSource(key);
    return this.readSource(key) ?? defaultSourceStat(key, this.scoring);
  }

  /** Read-only lookup; does not create a row. */
  peekSource(name: string): SourceStat | null {
    return this.readSource(normalizeKey('source', name));
  }

  listStrategies(): StrategyStat[] {
    const rows = this.db
      .prepare('SELECT name, alpha, beta, trades, updated_at FROM strategy_stats ORDER BY name')
      .all() as StrategyRow[];
    return rows.map(toStrategyStat);
  }

  listSources(): SourceStat[] {
    const rows = this.db
      .prepare('SELECT name, wins, losses, grade, score, signals, updated_at FROM source_stats ORDER BY name')
      .all() as SourceRow[];
    return rows.map((row) => toSourceStat(row, this.scoring.minGradeSamples));
  }

  totalSourceObservations(): number {
    const row = this.db
      .prepare('SELECT COALESCE(SUM(wins + losses), 0) AS total FROM source_stats')
      .get() as { total?: number } | undefined;
    return Number(row?.total ?? 0);
  }

  applyOutcome(kind: 'strategy', key: string, isWin: boolean): StrategyStat;
  applyOutcome(kind: 'source', key: string, isWin: boolean): SourceStat;
  applyOutcome(kind: StatKind, key: string, isWin: boolean): StrategyStat | SourceStat;
  applyOutcome(kind: StatKind, key: string, isWin: boolean): StrategyStat | SourceStat {
    const name = normalizeKey(kind, key);
    if (kind === 'strategy') {
      const run = this.db.transaction(() => this.applyStrategyOutcomeInTx(name, isWin));
      return run.immediate();
    }
    const run = this.db.transaction(() => this.applySourceOutcomeInTx(name, isWin));
    return run.immediate();
  }

  recordSignal(source: string): SourceStat {
    const key = normalizeKey('source', source);
    const run = this.db.transaction(() => {
      this.insertDefaultSource(key);
      this.db
        .prepare('UPDATE source_stats SET signals = signals + 1 WHERE name = ?')
        .run(key);
      return this.readSource(key) ?? defaultSourceStat(key, this.scoring);
    });
    return run.immediate();
  }

  private applyStrategyOutcomeInTx(name: string, isWin: boolean): StrategyStat {
    const current = this.readStrategy(name) ?? defaultStrategyStat(name);
    const next = applyStrategyOutcome(current, isWin, this.nowIso());
    this.db
      .prepare(
        `
        INSERT INTO strategy_stats (name, alpha, beta, trades, updated_at)
        VALUES (@name, @alpha, @beta, @trades, @updatedAt)
        ON CONFLICT(name) DO UPDATE SET
          alpha = excluded.alpha,
          beta = excluded.beta,
          trades = excluded.trades,
          updated_at = excluded.updated_at
      `
      )
      .run(next);
    return next;
  }

  private applySourceOutcomeInTx(name: string, isWin: boolean): SourceStat {
    const current = this.readSource(name) ?? defaultSourceStat(name, this.scoring);
    const totalBefore = this.totalSourceObservations();
    const next = applySourceOutcome(current, isWin, totalBefore, this.nowIso(), this.scoring);
    this.db
      .prepare(
        `
        INSERT INTO source_stats (name, wins, losses, grade, score, signals, updated_at)
        VALUES (@name, @wins, @losses, @grade, @score, @signals, @updatedAt)
        ON CONFLICT(name) DO UPDATE SET
          wins = excluded.wins,
          losses = excluded.losses,
          grade = excluded.grade,
          score = excluded.score,
          updated_at = excluded.updated_at
      `
      )
      .run(next);
    return next;
  }

  private insertDefaultSource(key: string): void {
    this.db
      .prepare(
        `
        INSERT OR IGNORE INTO source_stats (name, wins, losses, grade, score, signals)
        VALUES (@name, 0, 0, @grade, @score, 0)
      `
      )
      .run({ name: key, grade: defaultSourceStat(key, this.scoring).grade, score: this.scoring.optimisticScore });
  }

  private readStrategy(name: string): StrategyStat | null {
    const row = this.db
      .prepare('SELECT name, alpha, beta, trades, updated_at FROM strategy_stats WHERE name = ?')
      .get(name) as StrategyRow | undefined;
    return row ? toStrategyStat(row) : null;
  }

  private readSource(name: string): SourceStat | null {
    const row = this.db
      .prepare('SELECT name, wins, losses, grade, score, signals, updated_at FROM source_stats WHERE name = ?')
      .get(name) as SourceRow | undefined;
    return row ? toSourceStat(row, this.scoring.minGradeSamples) : null;
  }
}
