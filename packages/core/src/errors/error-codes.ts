/** Numeric status codes as defined by gRPC. */
export const GrpcStatus = {
  OK: 0,
  CANCELLED: 1,
  UNKNOWN: 2,
  INVALID_ARGUMENT: 3,
  DEADLINE_EXCEEDED: 4,
  NOT_FOUND: 5,
  ALREADY_EXISTS: 6,
  PERMISSION_DENIED: 7,
  RESOURCE_EXHAUSTED: 8,
  FAILED_PRECONDITION: 9,
  ABORTED: 10,
  OUT_OF_RANGE: 11,
  UNIMPLEMENTED: 12,
  INTERNAL: 13,
  UNAVAILABLE: 14,
  DATA_LOSS: 15,
  UNAUTHENTICATED: 16,
} as const;

export type GrpcStatusCode = (typeof GrpcStatus)[keyof typeof GrpcStatus];

export interface ErrorCodeEntry {
  /** Public code, `ERR<http status>P<nn>`. */
  code: string;
  httpStatus: number;
  grpcStatus: GrpcStatusCode;
  message: string;
}

export const ERROR_CODES = {
  CANCELLED: {
    code: 'ERR499P01',
    httpStatus: 499,
    grpcStatus: GrpcStatus.CANCELLED,
    message: 'request cancelled',
  },
  UNKNOWN: {
    code: 'ERR500P02',
    httpStatus: 500,
    grpcStatus: GrpcStatus.UNKNOWN,
    message: 'unknown error',
  },
  INVALID_ARGUMENT: {
    code: 'ERR400P03',
    httpStatus: 400,
    grpcStatus: GrpcStatus.INVALID_ARGUMENT,
    message: 'invalid argument',
  },
  DEADLINE_EXCEEDED: {
    code: 'ERR504P04',
    httpStatus: 504,
    grpcStatus: GrpcStatus.DEADLINE_EXCEEDED,
    message: 'deadline exceeded',
  },
  NOT_FOUND: {
    code: 'ERR404P05',
    httpStatus: 404,
    grpcStatus: GrpcStatus.NOT_FOUND,
    message: 'not found',
  },
  ALREADY_EXISTS: {
    code: 'ERR409P06',
    httpStatus: 409,
    grpcStatus: GrpcStatus.ALREADY_EXISTS,
    message: 'already exists',
  },
  PERMISSION_DENIED: {
    code: 'ERR403P07',
    httpStatus: 403,
    grpcStatus: GrpcStatus.PERMISSION_DENIED,
    message: 'permission denied',
  },
  RESOURCE_EXHAUSTED: {
    code: 'ERR429P08',
    httpStatus: 429,
    grpcStatus: GrpcStatus.RESOURCE_EXHAUSTED,
    message: 'resource exhausted',
  },
  FAILED_PRECONDITION: {
    code: 'ERR400P09',
    httpStatus: 400,
    grpcStatus: GrpcStatus.FAILED_PRECONDITION,
    message: 'failed precondition',
  },
  ABORTED: {
    code: 'ERR409P10',
    httpStatus: 409,
    grpcStatus: GrpcStatus.ABORTED,
    message: 'aborted',
  },
  OUT_OF_RANGE: {
    code: 'ERR400P11',
    httpStatus: 400,
    grpcStatus: GrpcStatus.OUT_OF_RANGE,
    message: 'out of range',
  },
  UNIMPLEMENTED: {
    code: 'ERR501P12',
    httpStatus: 501,
    grpcStatus: GrpcStatus.UNIMPLEMENTED,
    message: 'unimplemented',
  },
  INTERNAL: {
    code: 'ERR500P00',
    httpStatus: 500,
    grpcStatus: GrpcStatus.INTERNAL,
    message: 'internal server error',
  },
  UNAVAILABLE: {
    code: 'ERR503P14',
    httpStatus: 503,
    grpcStatus: GrpcStatus.UNAVAILABLE,
    message: 'service unavailable',
  },
  DATA_LOSS: {
    code: 'ERR500P15',
    httpStatus: 500,
    grpcStatus: GrpcStatus.DATA_LOSS,
    message: 'data loss',
  },
  UNAUTHENTICATED: {
    code: 'ERR401P16',
    httpStatus: 401,
    grpcStatus: GrpcStatus.UNAUTHENTICATED,
    message: 'unauthenticated',
  },

  // Application-specific
  USER_NOT_FOUND: {
    code: 'ERR404P17',
    httpStatus: 404,
    grpcStatus: GrpcStatus.NOT_FOUND,
    message: 'user not found',
  },
  USER_EMAIL_EXISTS: {
    code: 'ERR409P18',
    httpStatus: 409,
    grpcStatus: GrpcStatus.ALREADY_EXISTS,
    message: 'user with email already exists',
  },
  INVALID_USER_DATA: {
    code: 'ERR400P19',
    httpStatus: 400,
    grpcStatus: GrpcStatus.INVALID_ARGUMENT,
    message: 'invalid user data',
  },
} as const satisfies Record<string, ErrorCodeEntry>;

export type ErrorCode = keyof typeof ERROR_CODES;

export function getErrorCodeEntry(code: ErrorCode): ErrorCodeEntry {
  return ERROR_CODES[code];
}

const GRPC_STATUS_NAMES = new Map<number, string>(
  Object.entries(GrpcStatus).map(([name, value]) => [value, name]),
);

/** `8` → `RESOURCE_EXHAUSTED`. */
export function grpcStatusName(status: GrpcStatusCode): string {
  return GRPC_STATUS_NAMES.get(status) ?? 'UNKNOWN';
}
