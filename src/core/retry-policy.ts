/**
 * Retry policy between full authentication cycles
 *
 * Only failures marked retryable are repeated. Missing credentials, rate
 * limiting and an exhausted MFA chain end the run immediately.
 */

import { AuthError } from '../utils/errors.js';

export interface RetryPolicy {
  /** Total cycles, including the first (1 = no retry) */
  maxAttempts: number;

  /** Delay before the second cycle */
  initialDelayMs: number;

  /** Factor applied to the delay after each failed cycle */
  backoffMultiplier: number;

  /** Upper bound for any single delay */
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 60_000,
  backoffMultiplier: 2,
  maxDelayMs: 30 * 60_000,
};

/**
 * Delay to wait after the given failed attempt (1-based)
 */
export function retryDelayMs(policy: RetryPolicy, attempt: number): number {
  const delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  return Math.min(delay, policy.maxDelayMs);
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof AuthError) {
    return error.retryable;
  }
  // Unknown upstream failures (network blips, 5xx) are worth another cycle
  return true;
}
