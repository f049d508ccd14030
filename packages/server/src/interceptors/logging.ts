import {
  SystemClock,
  grpcStatusName,
  toAppError,
  type Clock,
  type LogFields,
  type UnaryInterceptor,
} from '@callgate/core';

/** Methods whose payloads are never logged. */
export const HIGH_FREQUENCY_METHODS: ReadonlySet<string> = new Set([
  '/grpc.health.v1.Health/Check',
  '/grpc.reflection.v1alpha.ServerReflection/ServerReflectionInfo',
]);

export const MAX_LOGGED_PAYLOAD_LENGTH = 1000;

export interface LoggingInterceptorOptions {
  clock?: Clock;
}

function requestFields(method: string, request: unknown): LogFields {
  const serialized = JSON.stringify(request) ?? '';
  if (
    HIGH_FREQUENCY_METHODS.has(method) ||
    serialized.length > MAX_LOGGED_PAYLOAD_LENGTH
  ) {
    return { payload_size: serialized.length };
  }
  return { request_payload: request };
}

export function createLoggingInterceptor({
  clock = new SystemClock(),
}: LoggingInterceptorOptions = {}): UnaryInterceptor {
  return async (ctx, request, info, next) => {
    const start = clock.now();
    const log = ctx.logger.withField('method', info.fullMethod);

    log.info('request received', requestFields(info.fullMethod, request));

    try {
      const response = await next(ctx, request);
      log.info('request completed', {
        status: 'OK',
        status_code: 0,
        duration_ms: clock.now() - start,
      });
      return response;
    } catch (err) {
      const appError = toAppError(err);
      log.error('request failed', {
        status: grpcStatusName(appError.grpcStatus),
        status_code: appError.grpcStatus,
        duration_ms: clock.now() - start,
        code: appError.publicCode,
        error: appError,
      });
      throw err;
    }
  };
}
