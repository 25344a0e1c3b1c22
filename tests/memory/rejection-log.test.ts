import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { openDatabase } from '../../src/memory/db.js';
import {
  listPendingRejections,
  listRejections,
  markRejectionChecked,
  markRejectionEvaluated,
  recordRejection,
  summarizeRejectionAccuracy,
} from '../../src/memory/rejection_log.js';

function createDb() {
  const dir = mkdtempSync(join(tmpdir(), 'arbiter-rejections-'));
  return openDatabase(join(dir, 'arbiter.sqlite'));
}

function seed(db: ReturnType<typeof createDb>, reasonCode: string, rejectedAt: string): number {
  return recordRejection(
    {
      signalId: `sig-${rejectedAt}`,
      source: 'feed-a',
      token: 'TKN',
      reasonCode,
      reason: reasonCode.replace(/_/g, ' '),
      operatingMode: 'PRODUCTION',
      profile: 'strict',
      referencePrice: 2,
      rejectedAt,
    },
    db
  );
}

describe('rejection log', () => {
  it('lists pending rejections older than the cutoff, oldest first', () => {
    const db = createDb();
    seed(db, 'below_trust_threshold', '2026-03-01T09:00:00.000Z');
    seed(db, 'below_signal_threshold', '2026-03-01T08:00:00.000Z');
    seed(db, 'below_trust_threshold', '2026-03-02T09:00:00.000Z');

    const pending = listPendingRejections({ rejectedBefore: '2026-03-01T12:00:00.000Z' }, db);
    expect(pending.map((row) => row.rejectedAt)).toEqual([
      '2026-03-01T08:00:00.000Z',
      '2026-03-01T09:00:00.000Z',
    ]);
    expect(pending[0]).toMatchObject({ status: 'pending', outcome: null, priceChangePct: null, referencePrice: 2 });
  });

  it('filters by reason code, newest first', () => {
    const db = createDb();
    const first = seed(db, 'below_trust_threshold', '2026-03-01T09:00:00.000Z');
    seed(db, 'revise_not_allowed', '2026-03-01T10:00:00.000Z');
    const third = seed(db, 'below_trust_threshold', '2026-03-01T11:00:00.000Z');

    const rows = listRejections({ reasonCode: 'below_trust_threshold' }, db);
    expect(rows.map((row) => row.id)).toEqual([third, first]);
    expect(listRejections({ limit: 1 }, db)).toHaveLength(1);
  });

  it('evaluates a rejection once and summarizes accuracy', () => {
    const db = createDb();
    const id = seed(db, 'below_trust_threshold', '2026-03-01T09:00:00.000Z');
    seed(db, 'below_trust_threshold', '2026-03-01T10:00:00.000Z');

    expect(markRejectionEvaluated({ id, outcome: 'missed_opportunity', priceChangePct: 31.5 }, db)).toBe(true);
    expect(markRejectionEvaluated({ id, outcome: 'neutral', priceChangePct: 0 }, db)).toBe(false);

    expect(listRejections({}, db).find((row) => row.id === id)).toMatchObject({
      status: 'evaluated',
      outcome: 'missed_opportunity',
      priceChangePct: 31.5,
    });
    expect(summarizeRejectionAccuracy(db)).toEqual({
      missed_opportunity: 1,
      correct_rejection: 0,
      neutral: 0,
      pending: 1,
      untracked: 0,
      expired: 0,
    });
  });

  it('records token-less rejections as untracked', () => {
    const db = createDb();
    recordRejection(
      {
        source: 'feed-a',
        reasonCode: 'below_trust_threshold',
        reason: 'below trust threshold',
        operatingMode: 'LEARNING',
        profile: 'paper_learning',
        rejectedAt: '2026-03-01T09:00:00.000Z',
      },
      db
    );

    expect(listPendingRejections({ rejectedBefore: '2026-03-02T00:00:00.000Z' }, db)).toEqual([]);
    expect(summarizeRejectionAccuracy(db)).toMatchObject({ pending: 0, untracked: 1 });
  });

  it('moves checked rejections behind unchecked ones and expires them', () => {
    const db = createDb();
    const first = seed(db, 'below_trust_threshold', '2026-03-01T08:00:00.000Z');
    const second = seed(db, 'below_trust_threshold', '2026-03-01T09:00:00.000Z');
    const cutoff = '2026-03-02T00:00:00.000Z';

    expect(markRejectionChecked({ id: first, maxChecks: 2, checkedAt: '2026-03-02T10:00:00.000Z' }, db)).toBe('pending');
    expect(listPendingRejections({ rejectedBefore: cutoff }, db).map((row) => row.id)).toEqual([second, first]);

    expect(markRejectionChecked({ id: first, maxChecks: 2, checkedAt: '2026-03-02T11:00:00.000Z' }, db)).toBe('expired');
    expect(markRejectionChecked({ id: first, maxChecks: 2 }, db)).toBeNull();
    expect(listPendingRejections({ rejectedBefore: cutoff }, db).map((row) => row.id)).toEqual([second]);
    expect(listRejections({}, db).find((row) => row.id === first)).toMatchObject({
      status: 'expired',
      checks: 2,
      lastCheckedAt: '2026-03-02T11:00:00.000Z',
    });
  });
});
