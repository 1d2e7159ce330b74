import { describe, it, expect } from 'vitest';
import { Backoff, computeBackoffDelay } from './backoff.js';

const policy = { baseDelayMs: 1_000, maxDelayMs: 60_000 };

describe('computeBackoffDelay', () => {
  it('doubles from the base delay and caps at the maximum', () => {
    const delays = [1, 2, 3, 4, 5, 6, 7, 8].map((attempt) => computeBackoffDelay(attempt, policy));
    expect(delays).toEqual([1_000, 2_000, 4_000, 8_000, 16_000, 32_000, 60_000, 60_000]);
  });

  it('scales by the jitter factor before capping', () => {
    const jittered = { ...policy, jitter: 0.5 };
    expect(computeBackoffDelay(2, jittered, () => 0)).toBe(1_000);
    expect(computeBackoffDelay(2, jittered, () => 0.5)).toBe(2_000);
    expect(computeBackoffDelay(7, jittered, () => 0.99)).toBe(60_000);
  });
});

describe('Backoff', () => {
  it('counts attempts and resets after success', () => {
    const backoff = new Backoff(policy);
    expect(backoff.next()).toBe(1_000);
    expect(backoff.next()).toBe(2_000);
    expect(backoff.next()).toBe(4_000);
    expect(backoff.attempts).toBe(3);

    backoff.reset();

    expect(backoff.attempts).toBe(0);
    expect(backoff.next()).toBe(1_000);
  });
});
