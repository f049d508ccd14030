import type { Clock, UnaryInterceptor } from '@callgate/core';
import type { ServerMetrics } from '../metrics.js';
import { createErrorConversionInterceptor } from './error-conversion.js';
import { createLoggingInterceptor } from './logging.js';
import { createMetricsInterceptor } from './metrics.js';
import {
  createRateLimitInterceptors,
  type RateLimitSettings,
} from './rate-limit.js';
import { createRequestIdInterceptor } from './request-id.js';

export interface InterceptorDeps {
  metrics: ServerMetrics;
  clock?: Clock;
  generateRequestId?: () => string;
}

/**
 * The server's chain, outermost first: request-id, metrics, rate-limit (when
 * enabled), logging, error conversion.
 */
export function buildInterceptors(
  settings: RateLimitSettings,
  deps: InterceptorDeps,
): Array<UnaryInterceptor> {
  return [
    createRequestIdInterceptor({ generate: deps.generateRequestId }),
    createMetricsInterceptor(deps.metrics, { clock: deps.clock }),
    ...createRateLimitInterceptors(settings, {
      metrics: deps.metrics,
      clock: deps.clock,
    }),
    createLoggingInterceptor({ clock: deps.clock }),
    createErrorConversionInterceptor(),
  ];
}

export { createErrorConversionInterceptor } from './error-conversion.js';
export {
  createLoggingInterceptor,
  HIGH_FREQUENCY_METHODS,
  MAX_LOGGED_PAYLOAD_LENGTH,
} from './logging.js';
export { createMetricsInterceptor } from './metrics.js';
export {
  createRateLimitInterceptor,
  createRateLimitInterceptors,
} from './rate-limit.js';
export type {
  RateLimitDeps,
  RateLimitInterceptorOptions,
  RateLimitSettings,
} from './rate-limit.js';
export { createRequestIdInterceptor, REQUEST_ID_HEADER } from './request-id.js';
