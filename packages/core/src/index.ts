export { SystemClock, ManualClock } from './clock.js';
export type { Clock } from './clock.js';

export {
  AppError,
  isAppError,
  isErrorCode,
  toAppError,
} from './errors/app-error.js';
export type { AppErrorOptions } from './errors/app-error.js';
export {
  ERROR_CODES,
  GrpcStatus,
  getErrorCodeEntry,
  grpcStatusName,
} from './errors/error-codes.js';
export type {
  ErrorCode,
  ErrorCodeEntry,
  GrpcStatusCode,
} from './errors/error-codes.js';

export { JsonLogger, NoOpLogger, LOG_LEVELS } from './logger/logger.js';
export type {
  JsonLoggerOptions,
  LogFields,
  LogLevel,
  StructuredLogger,
} from './logger/logger.js';

export {
  Counter,
  Gauge,
  Histogram,
  MetricsRegistry,
  DEFAULT_BUCKETS,
} from './metrics/metrics-registry.js';
export type { Labels } from './metrics/metrics-registry.js';

export {
  createCallContext,
  parseFullMethod,
  withContext,
} from './pipeline/call-context.js';
export type {
  CallContext,
  CallInfo,
  CreateCallContextOptions,
} from './pipeline/call-context.js';
export { chainInterceptors } from './pipeline/interceptor.js';
export type { UnaryHandler, UnaryInterceptor } from './pipeline/interceptor.js';

export {
  DEFAULT_BURST_MULTIPLIER,
  DEFAULT_REQUESTS_PER_SECOND,
  GLOBAL_RATE_LIMIT_KEY,
  clientKeyExtractor,
  globalKeyExtractor,
  keyExtractorForStrategy,
  methodKeyExtractor,
  normalizeRateLimitConfig,
} from './rate-limit/rate-limit-config.js';
export type {
  KeyExtractor,
  RateLimitConfig,
  RateLimitStrategy,
  ResolvedRateLimitConfig,
} from './rate-limit/rate-limit-config.js';
export { TokenBucketLimiter } from './rate-limit/token-bucket-limiter.js';
export { LimiterRegistry } from './rate-limit/limiter-registry.js';
export type { LimiterRegistryOptions } from './rate-limit/limiter-registry.js';
export { RateLimiter } from './rate-limit/rate-limiter.js';
export type { RateLimitDecision } from './rate-limit/rate-limiter.js';

export { pageOffset } from './stores/user-repository.js';
export type {
  PageRequest,
  User,
  UserInput,
  UserPage,
  UserRepository,
} from './stores/user-repository.js';
