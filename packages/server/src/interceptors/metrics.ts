import {
  GrpcStatus,
  SystemClock,
  toAppError,
  type Clock,
  type GrpcStatusCode,
  type UnaryInterceptor,
} from '@callgate/core';
import type { ServerMetrics } from '../metrics.js';

export interface MetricsInterceptorOptions {
  clock?: Clock;
}

export function createMetricsInterceptor(
  metrics: ServerMetrics,
  { clock = new SystemClock() }: MetricsInterceptorOptions = {},
): UnaryInterceptor {
  return async (ctx, request, info, next) => {
    const start = clock.now();
    let status: GrpcStatusCode = GrpcStatus.OK;
    metrics.activeRequests.inc();

    try {
      return await next(ctx, request);
    } catch (err) {
      status = toAppError(err).grpcStatus;
      throw err;
    } finally {
      metrics.activeRequests.dec();
      const labels = { method: info.fullMethod, status_code: String(status) };
      metrics.requestsTotal.inc(labels);
      metrics.requestDuration.observe((clock.now() - start) / 1000, labels);
    }
  };
}
