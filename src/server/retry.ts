/**
 * Exponential backoff with jitter for re-queued jobs.
 *
 * delay(attempt) = min(base * 2^(attempt-1), max), then scaled by a random
 * factor in [1 - jitter, 1 + jitter]. Defaults: 30s base, 10min cap, ±20%.
 */

export interface RetryPolicy {
  baseMs: number;
  maxMs: number;
  /** Fraction of the delay, 0..1. */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  baseMs: 30_000,
  maxMs: 10 * 60_000,
  jitter: 0.2,
};

export function computeBackoffMs(attempt: number, baseMs: number, maxMs: number): number {
  const safeAttempt = Number.isFinite(attempt) ? Math.max(1, Math.floor(attempt)) : 1;
  const raw = baseMs * Math.pow(2, safeAttempt - 1);
  return Math.min(raw, maxMs);
}

export function computeRetryDelayMs(
  attempt: number,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  random: () => number = Math.random
): number {
  const base = computeBackoffMs(attempt, policy.baseMs, policy.maxMs);
  const jitter = Math.min(Math.max(policy.jitter, 0), 1);
  const factor = 1 + jitter * (random() * 2 - 1);
  return Math.max(0, Math.round(base * factor));
}
