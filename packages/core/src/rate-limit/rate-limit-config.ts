import type { CallContext, CallInfo } from '../pipeline/call-context.js';

/**
 * Maps one call to the partition key of the budget it draws from.
 */
export type KeyExtractor = (ctx: CallContext, info: CallInfo) => string;

export type RateLimitStrategy = 'global' | 'per-method' | 'per-client';

/**
 * Configuration for per-key token-bucket rate limiting.
 */
export interface RateLimitConfig {
  /** Tokens added per second to every bucket. */
  requestsPerSecond: number;
  /** Bucket capacity; also the number of calls a fresh bucket admits at once. */
  burstSize: number;
  /** Defaults to a single shared `"global"` key. */
  keyExtractor?: KeyExtractor;
}

export type ResolvedRateLimitConfig = Readonly<Required<RateLimitConfig>>;

export const DEFAULT_REQUESTS_PER_SECOND = 100;
export const DEFAULT_BURST_MULTIPLIER = 2;
export const GLOBAL_RATE_LIMIT_KEY = 'global';

export const globalKeyExtractor: KeyExtractor = () => GLOBAL_RATE_LIMIT_KEY;

export const methodKeyExtractor: KeyExtractor = (_ctx, info) =>
  info.fullMethod;

/** Partitions by caller address; calls without one share `"unknown"`. */
export const clientKeyExtractor: KeyExtractor = (ctx) => ctx.peer ?? 'unknown';

export function keyExtractorForStrategy(
  strategy: RateLimitStrategy,
): KeyExtractor {
  switch (strategy) {
    case 'per-method':
      return methodKeyExtractor;
    case 'per-client':
      return clientKeyExtractor;
    case 'global':
      return globalKeyExtractor;
  }
}

/** Whole part of `value`, or undefined when that is not at least 1. */
function positiveInteger(value: number): number | undefined {
  if (!Number.isFinite(value)) return undefined;
  const whole = Math.floor(value);
  return whole >= 1 ? whole : undefined;
}

/**
 * Rounds both values down to whole numbers and replaces anything below 1 with
 * the defaults: 100 requests per second and a burst of twice the (resolved)
 * rate.
 */
export function normalizeRateLimitConfig(
  config: RateLimitConfig,
): ResolvedRateLimitConfig {
  const requestsPerSecond =
    positiveInteger(config.requestsPerSecond) ?? DEFAULT_REQUESTS_PER_SECOND;
  const burstSize =
    positiveInteger(config.burstSize) ??
    requestsPerSecond * DEFAULT_BURST_MULTIPLIER;

  return Object.freeze({
    requestsPerSecond,
    burstSize,
    keyExtractor: config.keyExtractor ?? globalKeyExtractor,
  });
}
