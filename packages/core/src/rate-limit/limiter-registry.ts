import { SystemClock, type Clock } from '../clock.js';
import type { ResolvedRateLimitConfig } from './rate-limit-config.js';
import { TokenBucketLimiter } from './token-bucket-limiter.js';

export interface LimiterRegistryOptions {
  clock?: Clock;
  /**
   * Upper bound on tracked keys. When set, the least recently used key is
   * dropped to make room for a new one. Unset or 0 keeps every key for the
   * registry's lifetime.
   */
  maxKeys?: number;
}

/**
 * Owns one {@link TokenBucketLimiter} per key, created on first use.
 *
 * Lookup and insertion happen in one synchronous step, so two callers asking
 * for the same unseen key always receive the same instance.
 */
export class LimiterRegistry {
  private readonly limiters = new Map<string, TokenBucketLimiter>();
  private readonly clock: Clock;
  private readonly maxKeys: number;

  constructor(
    private readonly config: ResolvedRateLimitConfig,
    { clock = new SystemClock(), maxKeys = 0 }: LimiterRegistryOptions = {},
  ) {
    this.clock = clock;
    this.maxKeys = maxKeys > 0 ? Math.floor(maxKeys) : 0;
  }

  getOrCreate(key: string): TokenBucketLimiter {
    const existing = this.limiters.get(key);
    if (existing) {
      if (this.maxKeys > 0) {
        // Re-insert to mark as most recently used
        this.limiters.delete(key);
        this.limiters.set(key, existing);
      }
      return existing;
    }

    if (this.maxKeys > 0 && this.limiters.size >= this.maxKeys) {
      const oldest = this.limiters.keys().next();
      if (!oldest.done) {
        this.limiters.delete(oldest.value);
      }
    }

    const limiter = new TokenBucketLimiter(
      this.config.requestsPerSecond,
      this.config.burstSize,
      this.clock,
    );
    this.limiters.set(key, limiter);
    return limiter;
  }

  get(key: string): TokenBucketLimiter | undefined {
    return this.limiters.get(key);
  }

  get size(): number {
    return this.limiters.size;
  }

  keys(): Array<string> {
    return Array.from(this.limiters.keys());
  }
}
