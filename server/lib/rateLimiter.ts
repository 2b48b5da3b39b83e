/**
 * Token-bucket rate limiter shared by every outbound price request of a scan.
 *
 * Worker-pool size bounds how many requests are in flight; this bounds how
 * fast they are issued. Token state is only touched in synchronous sections,
 * so concurrent workers on the event loop never interleave a refill and a take.
 */

import { sleepWithAbort, type Sleep } from './abort.js';
import { buildRequestAbortError } from './errors.js';

export interface RateLimiterOptions {
  /** Sustained request rate. */
  ratePerSecond: number;
  /** Burst size. Defaults to ratePerSecond (at least 1). */
  capacity?: number;
  now?: () => number;
  sleep?: Sleep;
}

export class TokenBucketRateLimiter {
  private tokens: number;
  private lastRefillMs: number;
  private readonly ratePerSecond: number;
  private readonly capacity: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(options: RateLimiterOptions) {
    this.ratePerSecond = Math.max(0.001, Number(options.ratePerSecond) || 1);
    this.capacity = Math.max(1, Number(options.capacity) || Math.floor(this.ratePerSecond) || 1);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleepWithAbort;
    this.tokens = this.capacity;
    this.lastRefillMs = this.now();
  }

  /** Wait until a request slot is available, then consume it. */
  async acquire(signal?: AbortSignal | null): Promise<void> {
    while (true) {
      if (signal?.aborted) {
        throw buildRequestAbortError('Request aborted while waiting for rate-limit slot');
      }
      this.refill(this.now());
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      const missingTokens = Math.max(0, 1 - this.tokens);
      const waitMs = Math.ceil((missingTokens * 1000) / this.ratePerSecond);
      await this.sleep(Math.max(1, waitMs), signal);
    }
  }

  getInfo(): { tokens: number; capacity: number; ratePerSecond: number } {
    this.refill(this.now());
    return { tokens: this.tokens, capacity: this.capacity, ratePerSecond: this.ratePerSecond };
  }

  private refill(nowMs: number): void {
    const elapsedMs = Math.max(0, nowMs - this.lastRefillMs);
    if (elapsedMs <= 0) return;
    const refillPerMs = this.ratePerSecond / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedMs * refillPerMs);
    this.lastRefillMs = nowMs;
  }
}
