import type { CallContext, CallInfo } from './call-context.js';

export type UnaryHandler = (
  ctx: CallContext,
  request: unknown,
) => Promise<unknown>;

/**
 * One stage of the call pipeline. Calls `next` to continue, or throws to
 * short-circuit the call.
 */
export type UnaryInterceptor = (
  ctx: CallContext,
  request: unknown,
  info: CallInfo,
  next: UnaryHandler,
) => Promise<unknown>;

/**
 * Composes interceptors around a handler. The first interceptor is the
 * outermost; each receives the context produced by the one before it.
 */
export function chainInterceptors(
  interceptors: ReadonlyArray<UnaryInterceptor>,
  info: CallInfo,
  handler: UnaryHandler,
): UnaryHandler {
  return interceptors.reduceRight<UnaryHandler>(
    (next, interceptor) => (ctx, request) =>
      interceptor(ctx, request, info, next),
    handler,
  );
}
