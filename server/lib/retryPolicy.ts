/**
 * Explicit retry policy: attempt budget, exponential backoff with jitter and
 * a retryable-error predicate. One instance is shared by every history fetch
 * so all symbols back off identically.
 */

import { sleepWithAbort, type Sleep } from './abort.js';
import { isAbortError } from './errors.js';

export interface RetryPolicyOptions {
  /** Total attempts including the first one. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Up to this fraction of the exponential delay is added at random. */
  jitterRatio?: number;
  isRetryable: (err: unknown) => boolean;
  /** Server-suggested minimum wait for an error, e.g. from Retry-After. */
  minDelayFor?: (err: unknown) => number | null;
  random?: () => number;
  sleep?: Sleep;
}

export interface RetryHooks {
  signal?: AbortSignal | null;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export class RetryPolicy {
  readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly jitterRatio: number;
  private readonly isRetryable: (err: unknown) => boolean;
  private readonly minDelayFor: (err: unknown) => number | null;
  private readonly random: () => number;
  private readonly sleep: Sleep;

  constructor(options: RetryPolicyOptions) {
    this.maxAttempts = Math.max(1, Math.floor(Number(options.maxAttempts) || 1));
    this.baseDelayMs = Math.max(0, Number(options.baseDelayMs) || 0);
    this.maxDelayMs = Math.max(this.baseDelayMs, Number(options.maxDelayMs) || 0);
    this.jitterRatio = Math.min(1, Math.max(0, options.jitterRatio ?? 0.5));
    this.isRetryable = options.isRetryable;
    this.minDelayFor = options.minDelayFor ?? (() => null);
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? sleepWithAbort;
  }

  /** Delay before the next attempt, given how many attempts have failed so far (1-based). */
  delayForAttempt(failedAttempts: number, err?: unknown): number {
    const attempt = Math.max(1, Math.floor(failedAttempts));
    const exponential = Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** (attempt - 1));
    const jitter = exponential * this.jitterRatio * this.random();
    const delay = Math.min(this.maxDelayMs, Math.round(exponential + jitter));
    const suggested = err === undefined ? null : this.minDelayFor(err);
    if (suggested !== null && Number.isFinite(suggested) && suggested > delay) {
      return Math.min(this.maxDelayMs, Math.ceil(suggested));
    }
    return delay;
  }

  shouldRetry(err: unknown, failedAttempts: number): boolean {
    if (isAbortError(err)) return false;
    return failedAttempts < this.maxAttempts && this.isRetryable(err);
  }

  /**
   * Run `task` until it resolves, a non-retryable error is thrown, or the
   * attempt budget is spent. The last error is rethrown.
   */
  async execute<T>(task: (attempt: number) => Promise<T>, hooks: RetryHooks = {}): Promise<T> {
    let failedAttempts = 0;
    while (true) {
      try {
        return await task(failedAttempts + 1);
      } catch (err: unknown) {
        failedAttempts += 1;
        if (!this.shouldRetry(err, failedAttempts) || hooks.signal?.aborted) throw err;
        const delayMs = this.delayForAttempt(failedAttempts, err);
        hooks.onRetry?.({ attempt: failedAttempts, delayMs, error: err });
        await this.sleep(delayMs, hooks.signal);
      }
    }
  }
}
