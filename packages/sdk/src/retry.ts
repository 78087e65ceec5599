/**
 * @cubeload/sdk — Retry Policy
 *
 * Generic retry combinator with capped exponential backoff. Kept apart from
 * the transport so classification and retry can be tested independently.
 */
import { isRetryableError } from './errors.js';

export interface RetryConfig {
  /** Total attempts including the first one (default: 5) */
  maxAttempts?: number;
  /** Delay before the first retry is multiplierMs, doubling after (default: 2000) */
  multiplierMs?: number;
  /** Lower bound for a single wait (default: 1000) */
  minDelayMs?: number;
  /** Upper bound for a single wait (default: 30000) */
  maxDelayMs?: number;
  /** Add up to minDelayMs of random jitter, still capped at maxDelayMs (default: true) */
  jitter?: boolean;
}

export interface RetryOptions extends RetryConfig {
  /** Which errors trigger another attempt (default: isRetryableError) */
  retryable?: (error: unknown) => boolean;
  /** Called before each wait; attempt is the 1-based attempt that just failed */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
  /** Wait implementation (default: setTimeout) */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxAttempts: 5,
  multiplierMs: 2_000,
  minDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: true,
};

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `retry` (1-based):
 * clamp(multiplierMs * 2^(retry - 1), minDelayMs, maxDelayMs), plus optional jitter.
 */
export function backoffDelay(retry: number, config: RetryConfig = {}): number {
  const multiplierMs = config.multiplierMs ?? DEFAULT_RETRY_CONFIG.multiplierMs;
  const minDelayMs = config.minDelayMs ?? DEFAULT_RETRY_CONFIG.minDelayMs;
  const maxDelayMs = config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs;
  const jitter = config.jitter ?? DEFAULT_RETRY_CONFIG.jitter;
  const exponential = multiplierMs * Math.pow(2, retry - 1);
  const base = Math.min(Math.max(exponential, minDelayMs), maxDelayMs);
  const extra = jitter ? Math.random() * minDelayMs : 0;
  return Math.min(base + extra, maxDelayMs);
}

/**
 * Run `fn`, retrying while `retryable(error)` holds and attempts remain.
 * Other errors propagate at once; after the last attempt the last error is
 * re-thrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts);
  const retryable = options.retryable ?? isRetryableError;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!retryable(err) || attempt >= maxAttempts) throw err;
      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.(attempt, err, delayMs);
      await sleep(delayMs);
    }
  }
}
