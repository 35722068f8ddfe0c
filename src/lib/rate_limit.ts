import type { Result } from "./result";
import { RateLimited } from "./errors";

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/**
 * How a fallible call is retried. `sleep` is injectable so tests can run the
 * whole schedule without waiting.
 */
export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  sleep: (ms: number) => Promise<void>;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 4,
  baseDelayMs: 1000,
  multiplier: 2,
  maxDelayMs: 20_000,
  sleep,
};

export function retryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/** Delay after the given failed attempt (1-based). */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw = policy.baseDelayMs * policy.multiplier ** (attempt - 1);
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Rate limits wait longer: the server's Retry-After when it sent one,
 * otherwise twice the normal backoff. Always capped.
 */
export function delayFor(
  policy: RetryPolicy,
  error: Error,
  attempt: number
): number {
  const delay = backoffDelay(policy, attempt);
  if (!(error instanceof RateLimited)) return delay;
  const wanted =
    error.retryAfterMs === null ? delay * 2 : Math.max(delay, error.retryAfterMs);
  return Math.min(wanted, policy.maxDelayMs);
}

export type RetryInfo = {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: Error;
};

export async function withRetries<T, E extends Error & { retryable: boolean }>(
  fn: (attempt: number) => Promise<Result<T, E>>,
  policy: RetryPolicy,
  onRetry?: (info: RetryInfo) => void
): Promise<Result<T, E>> {
  let attempt = 0;
  while (true) {
    attempt++;
    const res = await fn(attempt);
    if (res.ok) return res;

    // Non-retryable errors surface immediately
    if (!res.error.retryable || attempt >= policy.maxAttempts) return res;

    const delayMs = delayFor(policy, res.error, attempt);
    onRetry?.({ attempt, maxAttempts: policy.maxAttempts, delayMs, error: res.error });
    await policy.sleep(delayMs);
  }
}
