import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { openDatabase } from '../../src/memory/db.js';
import { SchedulerControlPlane, computeNextIntervalRunMs } from '../../src/core/scheduler_control_plane.js';

function createTempDbPath(): string {
  const dir = mkdtempSync(join(tmpdir(), 'arbiter-scheduler-'));
  return join(dir, 'arbiter.sqlite');
}

describe('scheduler control plane', () => {
  it('computes deterministic next interval runs', () => {
    const anchorMs = 1_000;
    const intervalMs = 100;

    expect(computeNextIntervalRunMs({ anchorMs, nowMs: 1_000, intervalMs })).toBe(1_100);
    expect(computeNextIntervalRunMs({ anchorMs, nowMs: 1_499, intervalMs })).toBe(1_500);
    expect(computeNextIntervalRunMs({ anchorMs, nowMs: 1_500, intervalMs })).toBe(1_600);
    expect(computeNextIntervalRunMs({ anchorMs: 5_000, nowMs: 1_000, intervalMs })).toBe(5_000);
  });

  it('enforces lock/lease semantics and resumes after expiry', () => {
    const db = openDatabase(createTempDbPath());
    let nowMs = Date.now();

    const ownerA = new SchedulerControlPlane({ ownerId: 'owner-a', db, nowMs: () => nowMs });
    ownerA.registerJob({ name: 'lease-job', intervalMs: 1_000, budgetMs: 500, leaseMs: 5_000 }, async () => undefined);

    db.prepare(`UPDATE scheduler_jobs SET next_run_at = @nextRunAt WHERE name = 'lease-job'`).run({
      nextRunAt: new Date(nowMs).toISOString(),
    });

    expect(ownerA.tryAcquireLease('lease-job')).toBe(true);

    const ownerB = new SchedulerControlPlane({ ownerId: 'owner-b', db, nowMs: () => nowMs });
    expect(ownerB.tryAcquireLease('lease-job')).toBe(false);

    nowMs += 6_000;
    expect(ownerB.tryAcquireLease('lease-job')).toBe(true);
    expect(ownerB.getStoredJob('lease-job')?.lockOwner).toBe('owner-b');
  });

  it('does not acquire a job that is not yet due unless forced', () => {
    const db = openDatabase(createTempDbPath());
    const nowMs = Date.now();
    const plane = new SchedulerControlPlane({ ownerId: 'owner-a', db, nowMs: () => nowMs });
    plane.registerJob({ name: 'later-job', intervalMs: 60_000, budgetMs: 1_000 }, async () => undefined);

    expect(plane.tryAcquireLease('later-job')).toBe(false);
    expect(plane.tryAcquireLease('later-job', { force: true })).toBe(true);
  });

  it('recovers expired running jobs on startup and executes due work', async () => {
    const db = openDatabase(createTempDbPath());
    let runs = 0;
    const nowMs = Date.now();

    db.prepare(
      `
      INSERT INTO scheduler_jobs (
        name, interval_ms, budget_ms, status, next_run_at, failures, last_error,
        lock_owner, lock_expires_at, lease_ms, created_at, updated_at
      ) VALUES (
        'recover-job', 1000, 500, 'running', @nextRunAt, 0, NULL,
        'stale-owner', @lockExpiresAt, 1000, @nowIso, @nowIso
      )
    `
    ).run({
      nextRunAt: new Date(nowMs - 2_000).toISOString(),
      lockExpiresAt: new Date(nowMs - 1_000).toISOString(),
      nowIso: new Date(nowMs).toISOString(),
    });

    const scheduler = new SchedulerControlPlane({ ownerId: 'recover-owner', db, pollIntervalMs: 20 });
    scheduler.registerJob({ name: 'recover-job', intervalMs: 1_000, budgetMs: 500, leaseMs: 1_000 }, async () => {
      runs += 1;
    });

    scheduler.start();
    await new Promise((resolve) => setTimeout(resolve, 120));
    await scheduler.stop();

    expect(runs).toBe(1);
    const row = scheduler.getStoredJob('recover-job');
    expect(row?.status).toBe('success');
    expect(row?.lockOwner).toBeNull();
    expect(row?.failures).toBe(0);
  });

  it('fails a job that exceeds its execution budget and aborts its signal', async () => {
    const db = openDatabase(createTempDbPath());
    const plane = new SchedulerControlPlane({ ownerId: 'budget-owner', db });
    let sawAbort = false;

    plane.registerJob({ name: 'slow-job', intervalMs: 60_000, budgetMs: 30 }, ({ signal }) => {
      return new Promise<void>((resolve) => {
        signal.addEventListener('abort', () => {
          sawAbort = true;
          resolve();
        });
      });
    });

    const result = await plane.runJobNow('slow-job');

    expect(result.status).toBe('failed');
    expect(result.error).toBe('exceeded execution budget of 30ms');
    expect(sawAbort).toBe(true);
    const row = plane.getStoredJob('slow-job');
    expect(row?.status).toBe('failed');
    expect(row?.failures).toBe(1);
    expect(row?.lastError).toBe('exceeded execution budget of 30ms');
    expect(row?.lockOwner).toBeNull();
  });

  it('records handler errors as failures and skips jobs leased by another owner', async () => {
    const db = openDatabase(createTempDbPath());
    const nowMs = Date.now();
    const ownerA = new SchedulerControlPlane({ ownerId: 'owner-a', db, nowMs: () => nowMs });
    const ownerB = new SchedulerControlPlane({ ownerId: 'owner-b', db, nowMs: () => nowMs });
    const handler = async (): Promise<void> => {
      throw new Error('feed unavailable');
    };
    ownerA.registerJob({ name: 'shared-job', intervalMs: 60_000, budgetMs: 1_000 }, handler);
    ownerB.registerJob({ name: 'shared-job', intervalMs: 60_000, budgetMs: 1_000 }, handler);

    expect(ownerA.tryAcquireLease('shared-job', { force: true })).toBe(true);
    const skipped = await ownerB.runJobNow('shared-job');
    expect(skipped.status).toBe('skipped');

    db.prepare(`UPDATE scheduler_jobs SET lock_owner = NULL, lock_expires_at = NULL WHERE name = 'shared-job'`).run();
    const failed = await ownerB.runJobNow('shared-job');
    expect(failed.status).toBe('failed');
    expect(failed.error).toBe('feed unavailable');
    expect(ownerB.getStoredJob('shared-job')?.failures).toBe(1);
  });
});
