/**
 * ABOUTME: Client-side rate limiting for the GitHub REST API.
 * Tracks the remaining quota from response headers, spaces calls out below a
 * low-water mark, and waits out (or gives up on) hard rejections.
 */

import { RateLimitError } from '../../../../errors.js';
import { computeBackoffDelay, type RetryPolicy } from '../../../../utils/backoff.js';
import type { RateLimitSnapshot } from './cache.js';

/**
 * In-memory quota state. A fresh limiter assumes the quota is exhausted
 * and the reset time unknown until the first response says otherwise.
 */
export interface RateLimitState {
  remaining: number;
  /** Epoch milliseconds, null when unknown */
  resetAt: number | null;
  lastBackoffMs: number;
}

export interface RateLimiterOptions {
  /** Below this many remaining calls, delay each call */
  lowWaterMark: number;
  /** Longest wait for a reset after a hard rejection */
  patienceMs: number;
  backoff: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

function parseIntHeader(headers: Headers, name: string): number | null {
  const raw = headers.get(name);
  if (raw === null || raw.trim() === '') {
    return null;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

export class RateLimiter {
  private readonly options: RateLimiterOptions;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private state: RateLimitState = { remaining: 0, resetAt: null, lastBackoffMs: 0 };
  private lowStep = 0;

  constructor(options: RateLimiterOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.random = options.random ?? Math.random;
  }

  getState(): Readonly<RateLimitState> {
    return { ...this.state };
  }

  snapshot(): RateLimitSnapshot {
    return { remaining: this.state.remaining, resetAt: this.state.resetAt };
  }

  /**
   * Delay owed before the next call. 0 at or above the low-water mark;
   * below it, an exponential jittered delay that never runs past the reset.
   */
  nextDelay(): number {
    const { remaining, resetAt } = this.state;
    if (remaining >= this.options.lowWaterMark) {
      this.lowStep = 0;
      return 0;
    }

    let delay = computeBackoffDelay(this.lowStep, this.options.backoff, this.random);
    this.lowStep++;
    if (resetAt !== null) {
      delay = Math.min(delay, Math.max(0, resetAt - this.now()));
    }
    return delay;
  }

  /**
   * Wait as long as the quota requires before issuing a call.
   */
  async beforeRequest(): Promise<void> {
    const delay = this.nextDelay();
    this.state.lastBackoffMs = delay;
    if (delay > 0) {
      await this.sleep(delay);
    }
  }

  /**
   * Record the quota reported by a response.
   */
  update(headers: Headers): void {
    const remaining = parseIntHeader(headers, 'x-ratelimit-remaining');
    const reset = parseIntHeader(headers, 'x-ratelimit-reset');
    if (remaining !== null) {
      this.state.remaining = remaining;
    }
    if (reset !== null) {
      this.state.resetAt = reset * 1000;
    }
  }

  /**
   * Whether a response is a rate-limit rejection rather than a permission error.
   */
  isRateLimited(status: number, headers: Headers): boolean {
    if (status === 429) {
      return true;
    }
    if (status !== 403) {
      return false;
    }
    return headers.get('retry-after') !== null || headers.get('x-ratelimit-remaining') === '0';
  }

  /**
   * Handle a hard rejection: sleep until the reported reset if that fits in
   * the patience budget, otherwise throw RateLimitError.
   */
  async waitForReset(status: number, headers: Headers): Promise<void> {
    const retryAfter = parseIntHeader(headers, 'retry-after');
    const resetAt = retryAfter !== null ? this.now() + retryAfter * 1000 : this.state.resetAt;
    this.state.remaining = 0;

    if (resetAt === null) {
      throw new RateLimitError('GitHub rate limit exceeded (reset time unknown)', null, status);
    }

    const wait = Math.max(0, resetAt - this.now());
    if (wait > this.options.patienceMs) {
      throw new RateLimitError(
        `GitHub rate limit exceeded; resets in ${Math.ceil(wait / 1000)}s, beyond the ${Math.round(this.options.patienceMs / 1000)}s patience budget`,
        resetAt,
        status
      );
    }

    console.warn(`[github] Rate limited; waiting ${Math.ceil(wait / 1000)}s for reset`);
    this.state.lastBackoffMs = wait;
    if (wait > 0) {
      await this.sleep(wait);
    }
  }
}
