import { mkdirSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import Database from 'better-sqlite3';

const DEFAULT_DB_PATH = join(homedir(), '.arbiter', 'arbiter.sqlite');
const DEFAULT_BUSY_TIMEOUT_MS = 5_000;
const INSTANCES = new Map<string, Database.Database>();

function getSchemaSql(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const schemaPath = join(here, 'schema.sql');
  return readFileSync(schemaPath, 'utf-8');
}

function ensureDirectory(path: string): void {
  mkdirSync(dirname(path), { recursive: true });
}

function applySchema(db: Database.Database): void {
  db.exec(getSchemaSql());
}

export function resolveDatabasePath(dbPath?: string): string {
  return dbPath ?? process.env.ARBITER_DB_PATH ?? DEFAULT_DB_PATH;
}

/**
 * Open a fresh connection with schema applied. Separate connections to the same
 * file behave like separate scheduled invocations.
 */
export function createConnection(
  dbPath: string,
  options?: { busyTimeoutMs?: number }
): Database.Database {
  ensureDirectory(dbPath);
  const db = new Database(dbPath);
  db.pragma(`busy_timeout = ${Math.max(0, Math.floor(options?.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS))}`);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  applySchema(db);
  return db;
}

export function openDatabase(dbPath?: string, options?: { busyTimeoutMs?: number }): Database.Database {
  const resolvedPath = resolveDatabasePath(dbPath);

  const existing = INSTANCES.get(resolvedPath);
  if (existing) {
    return existing;
  }

  const db = createConnection(resolvedPath, options);
  INSTANCES.set(resolvedPath, db);
  return db;
}

export function closeDatabase(dbPath?: string): void {
  const resolvedPath = resolveDatabasePath(dbPath);
  const existing = INSTANCES.get(resolvedPath);
  if (!existing) return;
  INSTANCES.delete(resolvedPath);
  existing.close();
}
