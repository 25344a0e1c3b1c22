import type Database from 'better-sqlite3';

import { openDatabase } from './db.js';

export type CounterfactualOutcome = 'missed_opportunity' | 'correct_rejection' | 'neutral';

/**
 * `untracked` rows have no token and are never priced; `expired` rows ran out
 * of lookup attempts. Both are terminal, like `evaluated`.
 */
export type RejectionStatus = 'pending' | 'evaluated' | 'untracked' | 'expired';

export type RejectionAccuracy = Record<CounterfactualOutcome, number> &
  Record<Exclude<RejectionStatus, 'evaluated'>, number>;

export type RejectionRecord = {
  id: number;
  signalId: string | null;
  source: string;
  token: string | null;
  reasonCode: string;
  reason: string;
  operatingMode: string;
  profile: string;
  referencePrice: number | null;
  rejectedAt: string;
  status: RejectionStatus;
  outcome: CounterfactualOutcome | null;
  priceChangePct: number | null;
  evaluatedAt: string | null;
  checks: number;
  lastCheckedAt: string | null;
};

type RejectionRow = {
  id: number;
  signal_id: string | null;
  source: string;
  token: string | null;
  reason_code: string;
  reason: string;
  operating_mode: string;
  profile: string;
  reference_price: number | null;
  rejected_at: string;
  status: string;
  outcome: string | null;
  price_change_pct: number | null;
  evaluated_at: string | null;
  checks: number;
  last_checked_at: string | null;
};

const SELECT_COLUMNS = `
  id, signal_id, source, token, reason_code, reason, operating_mode, profile,
  reference_price, rejected_at, status, outcome, price_change_pct, evaluated_at,
  checks, last_checked_at
`;

function toOutcome(value: string | null): CounterfactualOutcome | null {
  if (value === 'missed_opportunity' || value === 'correct_rejection' || value === 'neutral') {
    return value;
  }
  return null;
}

function toStatus(value: string): RejectionStatus {
  if (value === 'evaluated' || value === 'untracked' || value === 'expired') return value;
  return 'pending';
}

function toRecord(row: RejectionRow): RejectionRecord {
  return {
    id: Number(row.id),
    signalId: row.signal_id ?? null,
    source: row.source,
    token: row.token ?? null,
    reasonCode: row.reason_code,
    reason: row.reason,
    operatingMode: row.operating_mode,
    profile: row.profile,
    referencePrice: row.reference_price == null ? null : Number(row.reference_price),
    rejectedAt: row.rejected_at,
    status: toStatus(row.status),
    outcome: toOutcome(row.outcome),
    priceChangePct: row.price_change_pct == null ? null : Number(row.price_change_pct),
    evaluatedAt: row.evaluated_at ?? null,
    checks: Number(row.checks),
    lastCheckedAt: row.last_checked_at ?? null,
  };
}

export function recordRejection(
  input: {
    signalId?: string | null;
    source: string;
    token?: string | null;
    reasonCode: string;
    reason: string;
    operatingMode: string;
    profile: string;
    referencePrice?: number | null;
    rejectedAt?: string;
  },
  db: Database.Database = openDatabase()
): number {
  const result = db
    .prepare(
      `
      INSERT INTO rejection_log (
        signal_id, source, token, reason_code, reason, operating_mode, profile, reference_price, rejected_at, status
      ) VALUES (
        @signalId, @source, @token, @reasonCode, @reason, @operatingMode, @profile, @referencePrice, @rejectedAt,
        @status
      )
    `
    )
    .run({
      signalId: input.signalId ?? null,
      source: input.source,
      token: input.token ?? null,
      reasonCode: input.reasonCode,
      reason: input.reason,
      operatingMode: input.operatingMode,
      profile: input.profile,
      referencePrice: input.referencePrice ?? null,
      rejectedAt: input.rejectedAt ?? new Date().toISOString(),
      status: input.token ? 'pending' : 'untracked',
    });
  return Number(result.lastInsertRowid);
}

export function listPendingRejections(
  params: { rejectedBefore: string; limit?: number },
  db: Database.Database = openDatabase()
): RejectionRecord[] {
  const limit = Math.min(Math.max(params.limit ?? 50, 1), 500);
  const rows = db
    .prepare(
      `
      SELECT ${SELECT_COLUMNS}
      FROM rejection_log
      WHERE status = 'pending' AND rejected_at <= ?
      ORDER BY last_checked_at IS NOT NULL, last_checked_at ASC, rejected_at ASC, id ASC
      LIMIT ?
    `
    )
    .all(params.rejectedBefore, limit) as RejectionRow[];
  return rows.map(toRecord);
}

export function listRejections(
  params?: { reasonCode?: string; limit?: number },
  db: Database.Database = openDatabase()
): RejectionRecord[] {
  const limit = Math.min(Math.max(params?.limit ?? 50, 1), 500);
  const reasonCode = params?.reasonCode ?? null;
  const rows = db
    .prepare(
      `
      SELECT ${SELECT_COLUMNS}
      FROM rejection_log
      WHERE (? IS NULL OR reason_code = ?)
      ORDER BY id DESC
      LIMIT ?
    `
    )
    .all(reasonCode, reasonCode, limit) as RejectionRow[];
  return rows.map(toRecord);
}

export function markRejectionEvaluated(
  params: {
    id: number;
    outcome: CounterfactualOutcome;
    priceChangePct: number;
    evaluatedAt?: string;
  },
  db: Database.Database = openDatabase()
): boolean {
  const result = db
    .prepare(
      `
      UPDATE rejection_log
      SET status = 'evaluated',
          outcome = @outcome,
          price_change_pct = @priceChangePct,
          evaluated_at = @evaluatedAt
      WHERE id = @id AND status = 'pending'
    `
    )
    .run({
      id: params.id,
      outcome: params.outcome,
      priceChangePct: params.priceChangePct,
      evaluatedAt: params.evaluatedAt ?? new Date().toISOString(),
    });
  return result.changes > 0;
}

/**
 * Count one unsuccessful lookup. The row moves to the back of the pending
 * queue, or to `expired` once `maxChecks` lookups have failed.
 */
export function markRejectionChecked(
  params: { id: number; maxChecks: number; checkedAt?: string },
  db: Database.Database = openDatabase()
): RejectionStatus | null {
  const row = db
    .prepare(
      `
      UPDATE rejection_log
      SET checks = checks + 1,
          last_checked_at = @checkedAt,
          status = CASE WHEN checks + 1 >= @maxChecks THEN 'expired' ELSE status END
      WHERE id = @id AND status = 'pending'
      RETURNING status
    `
    )
    .get({
      id: params.id,
      maxChecks: Math.max(1, Math.floor(params.maxChecks)),
      checkedAt: params.checkedAt ?? new Date().toISOString(),
    }) as { status: string } | undefined;
  return row ? toStatus(row.status) : null;
}

export function summarizeRejectionAccuracy(db: Database.Database = openDatabase()): RejectionAccuracy {
  const rows = db
    .prepare(
      `
      SELECT CASE WHEN status = 'evaluated' THEN outcome ELSE status END AS bucket, COUNT(*) AS count
      FROM rejection_log
      GROUP BY bucket
    `
    )
    .all() as Array<{ bucket: string | null; count: number }>;
  const summary: RejectionAccuracy = {
    missed_opportunity: 0,
    correct_rejection: 0,
    neutral: 0,
    pending: 0,
    untracked: 0,
    expired: 0,
  };
  for (const row of rows) {
    const outcome = toOutcome(row.bucket);
    if (outcome) {
      summary[outcome] += Number(row.count);
      continue;
    }
    const status = toStatus(row.bucket ?? 'pending');
    if (status !== 'evaluated') {
      summary[status] += Number(row.count);
    }
  }
  return summary;
}
