import type { Clock } from '../clock.js';

/**
 * A single token bucket. Tokens accrue continuously at `requestsPerSecond`
 * up to `burstSize`; each admitted call takes one. The bucket starts full.
 *
 * `tryAcquire` never waits: it either takes a token or reports that none is
 * available. It runs to completion without yielding, so concurrent callers on
 * the event loop observe each update in full.
 */
export class TokenBucketLimiter {
  private tokens: number;
  private lastRefill: number;

  constructor(
    readonly requestsPerSecond: number,
    readonly burstSize: number,
    private readonly clock: Clock,
  ) {
    this.tokens = burstSize;
    this.lastRefill = clock.now();
  }

  tryAcquire(): boolean {
    this.refill();
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  /** Tokens available right now, without consuming any. */
  getAvailableTokens(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.clock.now();
    // The refill point only moves forward, so time is never counted twice
    // after the clock steps backwards and returns.
    if (now <= this.lastRefill) return;
    this.tokens = Math.min(
      this.burstSize,
      this.tokens + ((now - this.lastRefill) * this.requestsPerSecond) / 1000,
    );
    this.lastRefill = now;
  }
}
