import type Database from 'better-sqlite3';

import { openDatabase } from '../memory/db.js';
import { describeError } from './errors.js';
import type { Logger } from './logger.js';
import { TimeoutError, withTimeout } from './timeout.js';

type JobStatus = 'idle' | 'running' | 'success' | 'failed';

export interface SchedulerJobDefinition {
  name: string;
  intervalMs: number;
  /** Execution budget; the handler's signal aborts and the run fails once exceeded. */
  budgetMs: number;
  leaseMs?: number;
}

export interface StoredSchedulerJob {
  name: string;
  intervalMs: number;
  budgetMs: number;
  status: JobStatus;
  lastRunAt: string | null;
  nextRunAt: string;
  failures: number;
  lastError: string | null;
  lockOwner: string | null;
  lockExpiresAt: string | null;
  leaseMs: number;
}

export interface SchedulerControlPlaneOptions {
  ownerId: string;
  db?: Database.Database;
  pollIntervalMs?: number;
  defaultLeaseMs?: number;
  nowMs?: () => number;
  logger?: Logger;
}

export type JobContext = {
  jobName: string;
  signal: AbortSignal;
  deadlineMs: number;
};

export type JobHandler = (context: JobContext) => Promise<void>;

export type JobRunResult = {
  name: string;
  status: 'success' | 'failed' | 'skipped';
  durationMs: number;
  error?: string;
};

type StoredRow = {
  name: string;
  interval_ms: number;
  budget_ms: number;
  status: string;
  last_run_at: string | null;
  next_run_at: string;
  failures: number;
  last_error: string | null;
  lock_owner: string | null;
  lock_expires_at: string | null;
  lease_ms: number;
};

function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

function parseIsoMs(iso: string | null | undefined): number | null {
  if (!iso) return null;
  const ms = Date.parse(iso);
  return Number.isFinite(ms) ? ms : null;
}

function toStatus(value: string): JobStatus {
  if (value === 'running' || value === 'success' || value === 'failed') return value;
  return 'idle';
}

function toStoredJob(row: StoredRow): StoredSchedulerJob {
  return {
    name: row.name,
    intervalMs: Number(row.interval_ms),
    budgetMs: Number(row.budget_ms),
    status: toStatus(row.status),
    lastRunAt: row.last_run_at,
    nextRunAt: row.next_run_at,
    failures: Number(row.failures),
    lastError: row.last_error,
    lockOwner: row.lock_owner,
    lockExpiresAt: row.lock_expires_at,
    leaseMs: Number(row.lease_ms),
  };
}

export function computeNextIntervalRunMs(params: { anchorMs: number; nowMs: number; intervalMs: number }): number {
  const { anchorMs, nowMs, intervalMs } = params;
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new Error(`intervalMs must be > 0, got ${intervalMs}`);
  }
  if (anchorMs > nowMs) {
    return anchorMs;
  }
  const steps = Math.floor((nowMs - anchorMs) / intervalMs) + 1;
  return anchorMs + steps * intervalMs;
}

/**
 * Interval jobs coordinated through lease rows in SQLite. A runner only executes
 * a job after winning the conditional UPDATE on its row, so overlapping
 * processes skip work another owner holds.
 */
export class SchedulerControlPlane {
  private readonly db: Database.Database;
  private readonly ownerId: string;
  private readonly pollIntervalMs: number;
  private readonly defaultLeaseMs: number;
  private readonly nowMs: () => number;
  private readonly logger: Logger | null;
  private readonly jobs = new Map<string, SchedulerJobDefinition>();
  private readonly handlers = new Map<string, JobHandler>();
  private readonly running = new Map<string, AbortController>();
  private tickTimer: NodeJS.Timeout | null = null;
  private tickInFlight: Promise<void> | null = null;

  constructor(options: SchedulerControlPlaneOptions) {
    this.db = options.db ?? openDatabase();
    this.ownerId = options.ownerId;
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
    this.defaultLeaseMs = options.defaultLeaseMs ?? 120_000;
    this.nowMs = options.nowMs ?? (() => Date.now());
    this.logger = options.logger ?? null;
  }

  registerJob(definition: SchedulerJobDefinition, handler: JobHandler): void {
    if (!Number.isFinite(definition.budgetMs) || definition.budgetMs <= 0) {
      throw new Error(`Job ${definition.name} needs a positive budgetMs, got ${definition.budgetMs}`);
    }
    this.jobs.set(definition.name, definition);
    this.handlers.set(definition.name, handler);
    this.upsertJobDefinition(definition);
  }

  start(): void {
    if (this.tickTimer) return;
    this.recoverExpiredRunningLeases();
    this.tickTimer = setInterval(() => {
      this.scheduleTick();
    }, this.pollIntervalMs);
    this.scheduleTick();
  }

  /** Stop polling, abort running handlers and wait for the current tick to settle. */
  async stop(): Promise<void> {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    for (const controller of this.running.values()) {
      controller.abort(new Error('scheduler stopping'));
    }
    if (this.tickInFlight) {
      await this.tickInFlight;
    }
  }

  tryAcquireLease(jobName: string, options?: { force?: boolean }): boolean {
    const nowMs = this.nowMs();
    const nowIso = toIso(nowMs);
    const row = this.getStoredJob(jobName);
    if (!row) {
      return false;
    }
    const leaseMs = Math.max(row.leaseMs > 0 ? row.leaseMs : this.defaultLeaseMs, row.budgetMs);
    const lockExpiresAt = toIso(nowMs + leaseMs);
    const result = this.db
      .prepare(
        `
        UPDATE scheduler_jobs
        SET
          status = 'running',
          lock_owner = @ownerId,
          lock_expires_at = @lockExpiresAt,
          updated_at = @nowIso
        WHERE
          name = @name
          AND (@force = 1 OR next_run_at <= @nowIso)
          AND (lock_expires_at IS NULL OR lock_expires_at <= @nowIso)
      `
      )
      .run({
        name: jobName,
        ownerId: this.ownerId,
        lockExpiresAt,
        nowIso,
        force: options?.force ? 1 : 0,
      });
    return result.changes > 0;
  }

  /** Run a registered job immediately, still honouring another owner's lease. */
  async runJobNow(jobName: string): Promise<JobRunResult> {
    if (!this.handlers.has(jobName)) {
      throw new Error(`No handler registered for job "${jobName}".`);
    }
    if (!this.tryAcquireLease(jobName, { force: true })) {
      return { name: jobName, status: 'skipped', durationMs: 0 };
    }
    return this.execute(jobName);
  }

  listJobs(): StoredSchedulerJob[] {
    const rows = this.db
      .prepare(
        `
        SELECT name, interval_ms, budget_ms, status, last_run_at, next_run_at, failures,
               last_error, lock_owner, lock_expires_at, lease_ms
        FROM scheduler_jobs
        ORDER BY name
      `
      )
      .all() as StoredRow[];
    return rows.map(toStoredJob);
  }

  getStoredJob(name: string): StoredSchedulerJob | null {
    const row = this.db
      .prepare(
        `
        SELECT name, interval_ms, budget_ms, status, last_run_at, next_run_at, failures,
               last_error, lock_owner, lock_expires_at, lease_ms
        FROM scheduler_jobs
        WHERE name = ?
      `
      )
      .get(name) as StoredRow | undefined;
    return row ? toStoredJob(row) : null;
  }

  private scheduleTick(): void {
    if (this.tickInFlight) return;
    this.tickInFlight = this.tick()
      .catch((error: unknown) => {
        this.logger?.error('scheduler.tick_failed', { error: describeError(error) });
      })
      .finally(() => {
        this.tickInFlight = null;
      });
  }

  private async tick(): Promise<void> {
    for (const name of this.jobs.keys()) {
      if (!this.tickTimer) return;
      const due = this.getStoredJob(name);
      if (!due) continue;
      const nextRunMs = parseIsoMs(due.nextRunAt);
      if (nextRunMs == null || nextRunMs > this.nowMs()) {
        continue;
      }
      const lockExpiresMs = parseIsoMs(due.lockExpiresAt);
      if (lockExpiresMs != null && lockExpiresMs > this.nowMs()) {
        continue;
      }
      if (!this.tryAcquireLease(name)) {
        continue;
      }
      await this.execute(name);
    }
  }

  private async execute(jobName: string): Promise<JobRunResult> {
    const startedMs = this.nowMs();
    const handler = this.handlers.get(jobName);
    const row = this.getStoredJob(jobName);
    if (!handler || !row) {
      const error = new Error(`No handler registered for job "${jobName}".`);
      this.markFailed(jobName, error);
      return { name: jobName, status: 'failed', durationMs: 0, error: error.message };
    }

    const controller = new AbortController();
    this.running.set(jobName, controller);
    try {
      await withTimeout(
        handler({ jobName, signal: controller.signal, deadlineMs: startedMs + row.budgetMs }),
        row.budgetMs,
        `job ${jobName}`,
        controller
      );
      this.markSuccess(jobName);
      this.logger?.info('scheduler.job_succeeded', { job: jobName, durationMs: this.nowMs() - startedMs });
      return { name: jobName, status: 'success', durationMs: this.nowMs() - startedMs };
    } catch (error) {
      const message =
        error instanceof TimeoutError ? `exceeded execution budget of ${row.budgetMs}ms` : describeError(error);
      this.markFailed(jobName, message);
      this.logger?.error('scheduler.job_failed', { job: jobName, error: message });
      return { name: jobName, status: 'failed', durationMs: this.nowMs() - startedMs, error: message };
    } finally {
      this.running.delete(jobName);
    }
  }

  private markSuccess(jobName: string): void {
    const row = this.getStoredJob(jobName);
    if (!row) return;
    const nowMs = this.nowMs();
    const nowIso = toIso(nowMs);
    const nextRunAt = toIso(this.computeNextRun(row, nowMs));
    this.db
      .prepare(
        `
        UPDATE scheduler_jobs
        SET
          status = 'success',
          last_run_at = @nowIso,
          next_run_at = @nextRunAt,
          failures = 0,
          last_error = NULL,
          lock_owner = NULL,
          lock_expires_at = NULL,
          updated_at = @nowIso
        WHERE name = @name AND lock_owner = @ownerId
      `
      )
      .run({ name: jobName, nowIso, nextRunAt, ownerId: this.ownerId });
  }

  private markFailed(jobName: string, error: unknown): void {
    const row = this.getStoredJob(jobName);
    if (!row) return;
    const nowMs = this.nowMs();
    const nowIso = toIso(nowMs);
    const nextRunAt = toIso(this.computeNextRun(row, nowMs));
    this.db
      .prepare(
        `
        UPDATE scheduler_jobs
        SET
          status = 'failed',
          last_run_at = @nowIso,
          next_run_at = @nextRunAt,
          failures = failures + 1,
          last_error = @lastError,
          lock_owner = NULL,
          lock_expires_at = NULL,
          updated_at = @nowIso
        WHERE name = @name AND (lock_owner IS NULL OR lock_owner = @ownerId)
      `
      )
      .run({ name: jobName, nowIso, nextRunAt, lastError: describeError(error), ownerId: this.ownerId });
  }

  private computeNextRun(row: StoredSchedulerJob, nowMs: number): number {
    const anchorMs = parseIsoMs(row.nextRunAt) ?? nowMs + row.intervalMs;
    return computeNextIntervalRunMs({ anchorMs, nowMs, intervalMs: row.intervalMs });
  }

  private recoverExpiredRunningLeases(): void {
    const nowIso = toIso(this.nowMs());
    this.db
      .prepare(
        `
        UPDATE scheduler_jobs
        SET
          status = CASE WHEN status = 'running' THEN 'failed' ELSE status END,
          failures = CASE WHEN status = 'running' THEN failures + 1 ELSE failures END,
          last_error = CASE WHEN status = 'running' THEN 'Recovered expired lease during startup' ELSE last_error END,
          lock_owner = NULL,
          lock_expires_at = NULL,
          updated_at = @nowIso
        WHERE lock_expires_at IS NOT NULL AND lock_expires_at <= @nowIso
      `
      )
      .run({ nowIso });
  }

  private upsertJobDefinition(definition: SchedulerJobDefinition): void {
    const nowMs = this.nowMs();
    const nowIso = toIso(nowMs);
    const nextRunAt = toIso(nowMs + definition.intervalMs);
    const leaseMs = definition.leaseMs ?? this.defaultLeaseMs;

    this.db
      .prepare(
        `
        INSERT INTO scheduler_jobs (
          name, interval_ms, budget_ms, status, next_run_at, failures, lease_ms, created_at, updated_at
        ) VALUES (
          @name, @intervalMs, @budgetMs, 'idle', @nextRunAt, 0, @leaseMs, @nowIso, @nowIso
        )
        ON CONFLICT(name) DO UPDATE SET
          interval_ms = excluded.interval_ms,
          budget_ms = excluded.budget_ms,
          lease_ms = excluded.lease_ms,
          updated_at = excluded.updated_at
      `
      )
      .run({
        name: definition.name,
        intervalMs: definition.intervalMs,
        budgetMs: definition.budgetMs,
        nextRunAt,
        leaseMs,
        nowIso,
      });
  }
}
