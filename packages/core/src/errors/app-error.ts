import {
  getErrorCodeEntry,
  type ErrorCode,
  type ErrorCodeEntry,
  type GrpcStatusCode,
} from './error-codes.js';

export interface AppErrorOptions {
  cause?: unknown;
}

/**
 * The single error type that crosses the call pipeline. Carries a symbolic
 * code from {@link ERROR_CODES}; the HTTP and gRPC statuses are derived from
 * it at the boundary.
 */
export class AppError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message?: string, options?: AppErrorOptions) {
    super(
      message ?? getErrorCodeEntry(code).message,
      options?.cause !== undefined ? { cause: options.cause } : undefined,
    );
    this.name = 'AppError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  get entry(): ErrorCodeEntry {
    return getErrorCodeEntry(this.code);
  }

  /** Public error code, e.g. `ERR429P08`. */
  get publicCode(): string {
    return this.entry.code;
  }

  get httpStatus(): number {
    return this.entry.httpStatus;
  }

  get grpcStatus(): GrpcStatusCode {
    return this.entry.grpcStatus;
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function isErrorCode(err: unknown, code: ErrorCode): boolean {
  return isAppError(err) && err.code === code;
}

/**
 * Returns `err` unchanged when it is already an {@link AppError}; anything
 * else becomes `INTERNAL` with the original value kept as `cause`.
 */
export function toAppError(err: unknown): AppError {
  if (isAppError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new AppError('INTERNAL', message, { cause: err });
}
