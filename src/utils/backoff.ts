/**
 * ABOUTME: Retry budget and backoff schedule for network-issuing calls.
 * Exponential, capped and jittered; the random source is injectable so the
 * schedule can be tested without real I/O.
 */

/**
 * Backoff schedule parameters.
 */
export interface RetryPolicy {
  /** Total attempts including the first (1 = no retries) */
  maxAttempts: number;

  /** Delay before the first retry */
  baseDelayMs: number;

  /** Upper bound for any single delay */
  maxDelayMs: number;

  /** Fraction of the delay that is randomized, 0..1 */
  jitter: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 30_000,
  jitter: 0.25,
};

/**
 * Delay for the given 0-based retry step: `base * 2^step`, capped at
 * `maxDelayMs`, then reduced by up to `jitter` of itself.
 */
export function computeBackoffDelay(
  step: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * Math.pow(2, Math.max(0, step));
  const capped = Math.min(policy.maxDelayMs, exponential);
  const jitter = Math.min(1, Math.max(0, policy.jitter));
  return Math.round(capped * (1 - jitter * random()));
}

/**
 * Tracks attempts spent against a policy for one logical call.
 */
export class RetryBudget {
  private attempts = 0;

  constructor(
    readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY,
    private readonly random: () => number = Math.random
  ) {}

  /** Record the start of an attempt. */
  consume(): void {
    this.attempts++;
  }

  get attemptsUsed(): number {
    return this.attempts;
  }

  /** Whether another attempt is allowed after the ones already made. */
  canRetry(): boolean {
    return this.attempts < this.policy.maxAttempts;
  }

  /** Delay before the next attempt. */
  nextDelay(): number {
    return computeBackoffDelay(this.attempts - 1, this.policy, this.random);
  }
}
