import { isTransientStorageError, TransientStorageError } from './errors.js';

export type RetryBackoffOptions = {
  retries: number; // retries after the first attempt
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; retriesLeft: number; delayMs: number; error: unknown }) => void;
  sleepFn?: (ms: number) => Promise<void>;
};

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function clamp(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min;
  return Math.min(max, Math.max(min, n));
}

export function computeBackoffDelayMs(params: {
  attempt: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs?: number;
  random?: () => number;
}): number {
  const base = Math.max(0, Math.floor(params.baseDelayMs));
  const max = Math.max(base, Math.floor(params.maxDelayMs));
  const raw = base * Math.pow(2, Math.max(0, params.attempt - 1));
  const jitterMs = Math.max(0, Math.floor(params.jitterMs ?? 0));
  const jitter = jitterMs > 0 ? Math.floor((params.random ?? Math.random)() * jitterMs) : 0;
  return clamp(raw, base, max) + jitter;
}

export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T> | T,
  opts: RetryBackoffOptions
): Promise<RetryResult<T>> {
  const retries = Math.max(0, Math.floor(opts.retries));
  const isRetryable = opts.isRetryable ?? isTransientStorageError;
  const sleepFn = opts.sleepFn ?? sleep;

  let attempt = 0;
  while (attempt < retries + 1) {
    attempt += 1;
    try {
      const value = await fn(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (err) {
      const retriesLeft = retries + 1 - attempt;
      if (retriesLeft <= 0 || !isRetryable(err)) {
        return { ok: false, error: err, attempts: attempt };
      }
      const delayMs = computeBackoffDelayMs({
        attempt,
        baseDelayMs: opts.baseDelayMs,
        maxDelayMs: opts.maxDelayMs,
        jitterMs: opts.jitterMs,
      });
      opts.onRetry?.({ attempt, retriesLeft, delayMs, error: err });
      if (delayMs > 0) await sleepFn(delayMs);
    }
  }

  return { ok: false, error: new Error('retryWithBackoff: exhausted retries'), attempts: retries + 1 };
}

/**
 * Run a storage mutation, retrying lock contention. Exhausted retries surface
 * as TransientStorageError; non-transient errors are rethrown untouched.
 */
export async function withStorageRetry<T>(
  label: string,
  fn: () => T,
  opts: Omit<RetryBackoffOptions, 'isRetryable'>
): Promise<T> {
  const result = await retryWithBackoff(() => fn(), { ...opts, isRetryable: isTransientStorageError });
  if (result.ok) return result.value;
  if (isTransientStorageError(result.error)) {
    throw new TransientStorageError(
      `${label} failed after ${result.attempts} attempt(s): ${
        result.error instanceof Error ? result.error.message : String(result.error)
      }`,
      result.error
    );
  }
  throw result.error;
}
