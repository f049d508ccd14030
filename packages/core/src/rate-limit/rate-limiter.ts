import type { CallContext, CallInfo } from '../pipeline/call-context.js';
import {
  LimiterRegistry,
  type LimiterRegistryOptions,
} from './limiter-registry.js';
import {
  normalizeRateLimitConfig,
  type RateLimitConfig,
  type ResolvedRateLimitConfig,
} from './rate-limit-config.js';

export interface RateLimitDecision {
  allowed: boolean;
  key: string;
}

/**
 * Admission control for inbound calls: classifies each call into a key and
 * draws a token from that key's bucket.
 */
export class RateLimiter {
  readonly config: ResolvedRateLimitConfig;
  readonly registry: LimiterRegistry;

  constructor(config: RateLimitConfig, options: LimiterRegistryOptions = {}) {
    this.config = normalizeRateLimitConfig(config);
    this.registry = new LimiterRegistry(this.config, options);
  }

  check(ctx: CallContext, info: CallInfo): RateLimitDecision {
    const key = this.config.keyExtractor(ctx, info);
    const allowed = this.registry.getOrCreate(key).tryAcquire();
    return { allowed, key };
  }

  /** Message carried by the rejection error. */
  exceededMessage(): string {
    return `Rate limit exceeded. Maximum ${this.config.requestsPerSecond} requests per second allowed.`;
  }
}
