import { setTimeout as sleep } from "node:timers/promises";
import { isTransient } from "../errors.js";

export type RetryPolicy = {
  /** Total attempts, including the first one. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
};

export const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 500, maxDelayMs: 8000 };

export type RetryOptions = {
  shouldRetry?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  /** Once aborted, no further attempt is started; the last error surfaces. */
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
};

/** Delay before attempt `attempt + 1`: base · 2^(attempt-1), capped. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** Math.max(0, attempt - 1));
}

/**
 * Run `fn` with bounded exponential backoff. Only transient errors (timeouts,
 * unreachable target) are retried unless `shouldRetry` says otherwise.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions = {},
): Promise<T> {
  const shouldRetry = opts.shouldRetry ?? isTransient;
  const wait = opts.sleep ?? ((ms: number) => sleep(ms));
  const attempts = Math.max(1, Math.floor(policy.attempts));

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (e) {
      if (attempt >= attempts || !shouldRetry(e) || opts.signal?.aborted) throw e;
      const delayMs = backoffDelay(attempt, policy);
      opts.onRetry?.(e, attempt, delayMs);
      await wait(delayMs);
    }
  }
}
