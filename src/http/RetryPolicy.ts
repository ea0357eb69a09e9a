/**
 * Exponential backoff with jitter for retryable catalog failures.
 */
export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Returns a value in [0, 1) */
export type RandomSource = () => number;

/**
 * Delay before retry number `attempt + 1` (attempt counts from 0):
 * `min(maxDelay, base * 2^attempt + jitter)` with jitter uniform in `[0, 0.5 * base * 2^attempt]`.
 */
export const computeBackoffDelay = (
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs'>,
  random: RandomSource = Math.random
): number => {
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt);
  const jitter = random() * 0.5 * exponentialDelay;
  return Math.min(policy.maxDelayMs, exponentialDelay + jitter);
};

export const shouldRetry = (
  error: { isRetryable: boolean },
  attempt: number,
  policy: Pick<RetryPolicy, 'maxRetries'>
): boolean => error.isRetryable && attempt < policy.maxRetries;
