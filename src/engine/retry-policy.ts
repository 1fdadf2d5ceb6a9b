import { config } from '../config.js';
import { RateLimitedError, type ExchangeError } from '../errors.js';
import type { RetryPolicy } from '../types/index.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: config.retry.maxRetries,
  baseDelayMs: config.retry.baseDelayMs,
  maxDelayMs: config.retry.maxDelayMs,
  multiplier: config.retry.multiplier,
};

export function resolveRetryPolicy(
  base: RetryPolicy,
  override?: Partial<RetryPolicy>,
): RetryPolicy {
  if (!override) return base;
  return {
    maxRetries: override.maxRetries ?? base.maxRetries,
    baseDelayMs: override.baseDelayMs ?? base.baseDelayMs,
    maxDelayMs: override.maxDelayMs ?? base.maxDelayMs,
    multiplier: override.multiplier ?? base.multiplier,
  };
}

/**
 * Delay before retry number `attempt + 1` (attempt is 0-based).
 * Exponential, capped at maxDelayMs, never shorter than a venue retry-after.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, err?: ExchangeError): number {
  const exp = policy.baseDelayMs * Math.pow(policy.multiplier, attempt);
  const delay = Math.min(policy.maxDelayMs, exp);
  if (err instanceof RateLimitedError && err.retryAfterMs !== null) {
    return Math.max(delay, err.retryAfterMs);
  }
  return delay;
}

