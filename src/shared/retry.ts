import { sleep as defaultSleep } from './utils.js';

/**
 * One retry discipline shared by the dispatcher and the store write path.
 * `delayMs(n)` is the wait after failed attempt `n` (1-based).
 */
export interface RetryPolicy {
  maxAttempts: number;
  delayMs: (attempt: number) => number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryInfo {
  attempt: number;
  delayMs: number;
  error: unknown;
}

export interface RetryHooks {
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  onRetry?: (info: RetryInfo) => void;
}

export function exponentialBackoff(opts: {
  baseMs: number;
  maxMs: number;
  factor?: number;
}): (attempt: number) => number {
  const factor = opts.factor ?? 2;
  return (attempt) => Math.min(opts.baseMs * Math.pow(factor, attempt - 1), opts.maxMs);
}

export function createRetryPolicy(opts: {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable?: (error: unknown) => boolean;
}): RetryPolicy {
  return {
    maxAttempts: Math.max(1, opts.maxAttempts),
    delayMs: exponentialBackoff({
      baseMs: Math.max(0, opts.baseDelayMs),
      maxMs: Math.max(opts.baseDelayMs, opts.maxDelayMs),
    }),
    isRetryable: opts.isRetryable ?? (() => true),
  };
}

/**
 * Run `task` until it succeeds, throws a non-retryable error, or hits the
 * attempt ceiling. The last error is rethrown unchanged. An abort during the
 * backoff sleep rejects with the sleep's AbortError.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (err) {
      if (attempt >= policy.maxAttempts || !policy.isRetryable(err)) {
        throw err;
      }
      const delayMs = policy.delayMs(attempt);
      hooks.onRetry?.({ attempt, delayMs, error: err });
      await sleep(delayMs, hooks.signal);
    }
  }
}
