import {
  AppError,
  RateLimiter,
  keyExtractorForStrategy,
  type Clock,
  type RateLimitStrategy,
  type UnaryInterceptor,
} from '@callgate/core';
import type { ServerMetrics } from '../metrics.js';

export interface RateLimitInterceptorOptions {
  metrics?: ServerMetrics;
}

/**
 * Admits a call when its key's bucket has a token; otherwise fails it with
 * `RESOURCE_EXHAUSTED` without reaching `next`.
 */
export function createRateLimitInterceptor(
  rateLimiter: RateLimiter,
  options: RateLimitInterceptorOptions = {},
): UnaryInterceptor {
  const { requestsPerSecond, burstSize } = rateLimiter.config;

  return async (ctx, request, info, next) => {
    const { allowed, key } = rateLimiter.check(ctx, info);

    if (!allowed) {
      ctx.logger.warn('Rate limit exceeded', {
        method: info.fullMethod,
        rate_limit_key: key,
        requests_per_second: requestsPerSecond,
        burst_size: burstSize,
      });
      options.metrics?.recordRateLimitExceeded(info.fullMethod, key);
      throw new AppError('RESOURCE_EXHAUSTED', rateLimiter.exceededMessage());
    }

    return next(ctx, request);
  };
}

export interface RateLimitSettings {
  rateLimitEnabled: boolean;
  rateLimitRequestsPerSec: number;
  rateLimitBurstSize: number;
  rateLimitStrategy: RateLimitStrategy;
  rateLimitMaxKeys?: number;
}

export interface RateLimitDeps {
  metrics?: ServerMetrics;
  clock?: Clock;
}

/**
 * The rate-limit stage as it goes into the chain: nothing at all when
 * disabled, otherwise one interceptor over a fresh {@link RateLimiter}.
 */
export function createRateLimitInterceptors(
  settings: RateLimitSettings,
  deps: RateLimitDeps = {},
): Array<UnaryInterceptor> {
  if (!settings.rateLimitEnabled) return [];

  const rateLimiter = new RateLimiter(
    {
      requestsPerSecond: settings.rateLimitRequestsPerSec,
      burstSize: settings.rateLimitBurstSize,
      keyExtractor: keyExtractorForStrategy(settings.rateLimitStrategy),
    },
    { clock: deps.clock, maxKeys: settings.rateLimitMaxKeys },
  );

  return [createRateLimitInterceptor(rateLimiter, { metrics: deps.metrics })];
}
