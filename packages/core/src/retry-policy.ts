/**
 * Bounded exponential backoff shared by storage, delivery and DID refresh.
 */
export interface RetryPolicy {
  /** Total attempts including the first one. */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly multiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 5_000,
  multiplier: 2,
};

/**
 * Delay before retry number `attempt` (1-based: the delay after the first
 * failure is `backoffDelay(policy, 1)`).
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.baseDelayMs * policy.multiplier ** exponent, policy.maxDelayMs);
}
