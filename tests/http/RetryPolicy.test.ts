import { describe, expect, it } from 'vitest';
import { computeBackoffDelay, shouldRetry } from '../../src/http/RetryPolicy';

const policy = { maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 30000 };

describe('computeBackoffDelay', () => {
  it('should double the delay per attempt without jitter', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(1000);
    expect(computeBackoffDelay(1, policy, () => 0)).toBe(2000);
    expect(computeBackoffDelay(3, policy, () => 0)).toBe(8000);
  });

  it('should add up to half the exponential delay as jitter', () => {
    expect(computeBackoffDelay(2, policy, () => 0.5)).toBe(5000);
    expect(computeBackoffDelay(0, policy, () => 0.999)).toBeCloseTo(1499.5);
  });

  it('should never exceed the maximum delay', () => {
    expect(computeBackoffDelay(10, policy, () => 0)).toBe(30000);
    expect(computeBackoffDelay(5, policy, () => 0.9)).toBe(30000);
  });
});

describe('shouldRetry', () => {
  it('should retry retryable errors until the budget is spent', () => {
    expect(shouldRetry({ isRetryable: true }, 0, policy)).toBe(true);
    expect(shouldRetry({ isRetryable: true }, 2, policy)).toBe(true);
    expect(shouldRetry({ isRetryable: true }, 3, policy)).toBe(false);
  });

  it('should never retry non-retryable errors', () => {
    expect(shouldRetry({ isRetryable: false }, 0, policy)).toBe(false);
  });
});
