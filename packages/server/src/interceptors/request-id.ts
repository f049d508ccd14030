import { randomUUID } from 'crypto';
import { withContext, type UnaryInterceptor } from '@callgate/core';

export const REQUEST_ID_HEADER = 'x-request-id';

export interface RequestIdInterceptorOptions {
  generate?: () => string;
}

/**
 * Reuses the caller's `x-request-id` or mints one, binds it to the call's
 * logger and echoes it in the response metadata.
 */
export function createRequestIdInterceptor(
  options: RequestIdInterceptorOptions = {},
): UnaryInterceptor {
  const generate = options.generate ?? randomUUID;

  return (ctx, request, _info, next) => {
    const requestId = ctx.metadata[REQUEST_ID_HEADER] || generate();
    ctx.responseMetadata.set(REQUEST_ID_HEADER, requestId);

    return next(
      withContext(ctx, {
        requestId,
        metadata: { ...ctx.metadata, [REQUEST_ID_HEADER]: requestId },
        logger: ctx.logger.withRequestID(requestId),
      }),
      request,
    );
  };
}
