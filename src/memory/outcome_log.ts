import type Database from 'better-sqlite3';

import { openDatabase } from './db.js';

export type PatternBucket = 'win' | 'loss';

export type AppliedTradeOutcome = {
  tradeId: string;
  strategy: string;
  source: string;
  pnlPercent: number;
  isWin: boolean;
  closedAt: string;
  appliedAt: string;
};

export type PatternLogEntry = {
  id: number;
  bucket: PatternBucket;
  tradeId: string;
  strategy: string;
  source: string;
  pnlPercent: number;
  payload: Record<string, unknown>;
  createdAt: string;
};

type OutcomeRow = {
  trade_id: string;
  strategy: string;
  source: string;
  pnl_percent: number;
  is_win: number;
  closed_at: string;
  applied_at: string;
};

type PatternRow = {
  id: number;
  bucket: string;
  trade_id: string;
  strategy: string;
  source: string;
  pnl_percent: number;
  payload: string;
  created_at: string;
};

function parsePayload(raw: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // unparseable payloads read back as empty
  }
  return {};
}

/**
 * Claim a trade id in the idempotence log. Returns false when the id was
 * already recorded, in which case nothing was written.
 */
export function claimTradeOutcome(
  outcome: Omit<AppliedTradeOutcome, 'appliedAt'>,
  db: Database.Database = openDatabase()
): boolean {
  const result = db
    .prepare(
      `
      INSERT OR IGNORE INTO trade_outcomes (trade_id, strategy, source, pnl_percent, is_win, closed_at)
      VALUES (@tradeId, @strategy, @source, @pnlPercent, @isWin, @closedAt)
    `
    )
    .run({
      tradeId: outcome.tradeId,
      strategy: outcome.strategy,
      source: outcome.source,
      pnlPercent: outcome.pnlPercent,
      isWin: outcome.isWin ? 1 : 0,
      closedAt: outcome.closedAt,
    });
  return result.changes > 0;
}

export function hasAppliedTrade(tradeId: string, db: Database.Database = openDatabase()): boolean {
  const row = db.prepare('SELECT 1 AS found FROM trade_outcomes WHERE trade_id = ?').get(tradeId);
  return row !== undefined;
}

export function listAppliedOutcomes(
  params?: { limit?: number },
  db: Database.Database = openDatabase()
): AppliedTradeOutcome[] {
  const limit = Math.min(Math.max(params?.limit ?? 100, 1), 5_000);
  const rows = db
    .prepare(
      `
      SELECT trade_id, strategy, source, pnl_percent, is_win, closed_at, applied_at
      FROM trade_outcomes
      ORDER BY closed_at DESC, applied_at DESC
      LIMIT ?
    `
    )
    .all(limit) as OutcomeRow[];
  return rows
    .map((row) => ({
      tradeId: row.trade_id,
      strategy: row.strategy,
      source: row.source,
      pnlPercent: Number(row.pnl_percent),
      isWin: row.is_win === 1,
      closedAt: row.closed_at,
      appliedAt: row.applied_at,
    }))
    .reverse();
}

export function appendPatternLog(
  entry: {
    bucket: PatternBucket;
    tradeId: string;
    strategy: string;
    source: string;
    pnlPercent: number;
    payload: Record<string, unknown>;
  },
  db: Database.Database = openDatabase()
): number {
  const result = db
    .prepare(
      `
      INSERT INTO pattern_log (bucket, trade_id, strategy, source, pnl_percent, payload)
      VALUES (@bucket, @tradeId, @strategy, @source, @pnlPercent, @payload)
    `
    )
    .run({
      bucket: entry.bucket,
      tradeId: entry.tradeId,
      strategy: entry.strategy,
      source: entry.source,
      pnlPercent: entry.pnlPercent,
      payload: JSON.stringify(entry.payload),
    });
  return Number(result.lastInsertRowid);
}

export function listPatternLog(
  params?: { bucket?: PatternBucket; limit?: number },
  db: Database.Database = openDatabase()
): PatternLogEntry[] {
  const limit = Math.min(Math.max(params?.limit ?? 50, 1), 500);
  const bucket = params?.bucket ?? null;
  const rows = db
    .prepare(
      `
      SELECT id, bucket, trade_id, strategy, source, pnl_percent, payload, created_at
      FROM pattern_log
      WHERE (? IS NULL OR bucket = ?)
      ORDER BY id DESC
      LIMIT ?
    `
    )
    .all(bucket, bucket, limit) as PatternRow[];

  return rows.map((row): PatternLogEntry => ({
    id: Number(row.id),
    bucket: row.bucket === 'win' ? 'win' : 'loss',
    tradeId: row.trade_id,
    strategy: row.strategy,
    source: row.source,
    pnlPercent: Number(row.pnl_percent),
    payload: parsePayload(row.payload),
    createdAt: row.created_at,
  }));
}
