import { toAppError, type UnaryInterceptor } from '@callgate/core';

/** Anything thrown below this stage leaves it as an `AppError`. */
export function createErrorConversionInterceptor(): UnaryInterceptor {
  return async (ctx, request, _info, next) => {
    try {
      return await next(ctx, request);
    } catch (err) {
      throw toAppError(err);
    }
  };
}
