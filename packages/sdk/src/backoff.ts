/**
 * Reconnect backoff.
 *
 * The n-th consecutive failed attempt waits `base * 2^(n-1)`, capped at `max`.
 * Jitter is off unless configured; with `jitter = 0.15` the delay is scaled by
 * a factor in [0.85, 1.15) before the cap is applied.
 */

export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  /** Proportional jitter in [0, 1). 0 disables it. */
  jitter?: number;
}

export function computeBackoffDelay(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const raw = policy.baseDelayMs * 2 ** exponent;
  const jitter = policy.jitter ?? 0;
  const scaled = jitter > 0 ? raw * (1 - jitter + random() * 2 * jitter) : raw;
  return Math.min(scaled, policy.maxDelayMs);
}

/** Stateful attempt counter around {@link computeBackoffDelay}. */
export class Backoff {
  private _attempts = 0;

  constructor(
    private readonly policy: BackoffPolicy,
    private readonly random: () => number = Math.random
  ) {}

  get attempts(): number {
    return this._attempts;
  }

  /** Register a failed attempt and return the delay before the next one. */
  next(): number {
    this._attempts++;
    return computeBackoffDelay(this._attempts, this.policy, this.random);
  }

  reset(): void {
    this._attempts = 0;
  }
}
