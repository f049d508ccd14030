import { NoOpLogger, type StructuredLogger } from '../logger/logger.js';

/** Identifies the method being invoked, e.g. `/hello.HelloService/GetHello`. */
export interface CallInfo {
  fullMethod: string;
}

/**
 * Per-call values handed from stage to stage. Stages never mutate a context;
 * they derive a new one with {@link withContext}. `responseMetadata` is the
 * one shared sink, written by stages that need to echo headers back.
 */
export interface CallContext {
  readonly metadata: Readonly<Record<string, string>>;
  readonly requestId?: string;
  /** Remote address of the caller, when known. */
  readonly peer?: string;
  readonly logger: StructuredLogger;
  readonly responseMetadata: Map<string, string>;
}

export interface CreateCallContextOptions {
  metadata?: Record<string, string>;
  peer?: string;
  logger?: StructuredLogger;
}

export function createCallContext(
  options: CreateCallContextOptions = {},
): CallContext {
  const metadata: Record<string, string> = {};
  for (const [key, value] of Object.entries(options.metadata ?? {})) {
    metadata[key.toLowerCase()] = value;
  }

  return {
    metadata,
    peer: options.peer,
    logger: options.logger ?? new NoOpLogger(),
    responseMetadata: new Map(),
  };
}

export function withContext(
  ctx: CallContext,
  patch: Partial<Omit<CallContext, 'responseMetadata'>>,
): CallContext {
  return { ...ctx, ...patch };
}

/**
 * `/package.Service/Method` → `{ service: 'package.Service', method: 'Method' }`.
 * Returns undefined for anything not in that shape.
 */
export function parseFullMethod(
  fullMethod: string,
): { service: string; method: string } | undefined {
  const match = /^\/([A-Za-z_][\w.]*)\/([A-Za-z_]\w*)$/.exec(fullMethod);
  if (!match) return undefined;
  const [, service, method] = match;
  if (service === undefined || method === undefined) return undefined;
  return { service, method };
}
