export type ArbiterErrorCode =
  | 'config.invalid'
  | 'config.mode_incoherent'
  | 'config.unknown_profile'
  | 'config.below_safety_floor'
  | 'storage.transient'
  | 'data.invalid';

export class ArbiterError extends Error {
  constructor(
    message: string,
    public readonly code: ArbiterErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ArbiterError';
  }
}

/**
 * Fatal. Raised for anything that would let the process run with an unsafe or
 * unknown policy; callers must not catch and continue.
 */
export class ConfigurationError extends ArbiterError {
  constructor(
    message: string,
    code: Extract<ArbiterErrorCode, `config.${string}`> = 'config.invalid',
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
    this.name = 'ConfigurationError';
  }
}

export class TransientStorageError extends ArbiterError {
  constructor(
    message: string,
    public readonly originalError?: unknown
  ) {
    super(message, 'storage.transient');
    this.name = 'TransientStorageError';
  }
}

export class DataQualityError extends ArbiterError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'data.invalid', details);
    this.name = 'DataQualityError';
  }
}

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_BUSY_SNAPSHOT']);

export function isTransientStorageError(error: unknown): boolean {
  if (error instanceof TransientStorageError) return true;
  if (!(error instanceof Error)) return false;
  const code = 'code' in error ? error.code : undefined;
  if (typeof code === 'string' && TRANSIENT_SQLITE_CODES.has(code)) return true;
  const text = error.message.toLowerCase();
  return text.includes('database is locked') || text.includes('database table is locked');
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
