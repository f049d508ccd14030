import type { LogLevel, RateLimitStrategy } from '@callgate/core';
import { z } from 'zod';

const envBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform((value) => value === 'true' || value === '1');

const envPort = z
  .string()
  .trim()
  .regex(/^:?\d+$/, 'Must be a port number such as 8080 or :8080')
  .transform((value) => Number(value.replace(/^:/, '')))
  .pipe(z.number().int().min(0).max(65535));

const RATE_LIMIT_STRATEGIES = [
  'global',
  'per-method',
  'per-client',
] as const satisfies ReadonlyArray<RateLimitStrategy>;

const LOG_LEVEL_VALUES = [
  'debug',
  'info',
  'warn',
  'error',
] as const satisfies ReadonlyArray<LogLevel>;

const EnvSchema = z.object({
  APP_NAME: z.string().min(1).default('callgate-server'),
  APP_VERSION: z.string().min(1).default('v1.0.0'),
  HTTP_HOST: z.string().min(1).default('0.0.0.0'),
  HTTP_PORT: envPort.default('8080'),
  DATABASE_PATH: z.string().min(1).default(':memory:'),
  LOG_LEVEL: z.enum(LOG_LEVEL_VALUES).default('info'),
  RATE_LIMIT_ENABLED: envBoolean.default('true'),
  RATE_LIMIT_REQUESTS_PER_SEC: z.coerce.number().int().default(100),
  RATE_LIMIT_BURST_SIZE: z.coerce.number().int().default(200),
  RATE_LIMIT_STRATEGY: z.enum(RATE_LIMIT_STRATEGIES).default('global'),
  RATE_LIMIT_MAX_KEYS: z.coerce.number().int().nonnegative().default(0),
});

export interface AppConfig {
  appName: string;
  appVersion: string;
  httpHost: string;
  httpPort: number;
  databasePath: string;
  logLevel: LogLevel;
  rateLimitEnabled: boolean;
  rateLimitRequestsPerSec: number;
  rateLimitBurstSize: number;
  rateLimitStrategy: RateLimitStrategy;
  /** 0 keeps every rate-limit key for the life of the process. */
  rateLimitMaxKeys: number;
}

export type Env = Record<string, string | undefined>;

/** Empty variables count as unset. */
function presentValues(env: Env): Record<string, string> {
  const values: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value;
    }
  }
  return values;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    .join('; ');
}

export function loadConfig(env: Env = process.env): AppConfig {
  const result = EnvSchema.safeParse(presentValues(env));
  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`);
  }

  const vars = result.data;
  return {
    appName: vars.APP_NAME,
    appVersion: vars.APP_VERSION,
    httpHost: vars.HTTP_HOST,
    httpPort: vars.HTTP_PORT,
    databasePath: vars.DATABASE_PATH,
    logLevel: vars.LOG_LEVEL,
    rateLimitEnabled: vars.RATE_LIMIT_ENABLED,
    rateLimitRequestsPerSec: vars.RATE_LIMIT_REQUESTS_PER_SEC,
    rateLimitBurstSize: vars.RATE_LIMIT_BURST_SIZE,
    rateLimitStrategy: vars.RATE_LIMIT_STRATEGY,
    rateLimitMaxKeys: vars.RATE_LIMIT_MAX_KEYS,
  };
}
