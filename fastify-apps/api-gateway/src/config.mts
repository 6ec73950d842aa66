/**
 * Process configuration from environment variables
 */
import { z } from 'zod';
import { formatIssues } from '@apigw/endpoint-directory';
import type { LevelWithSilent } from '@apigw/logger';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const satisfies readonly LevelWithSilent[];

const DEFAULT_CONTENT_TYPES =
  'application/json,application/xml,text/xml,text/plain,text/csv,application/atom+xml';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    HOST: z.string().min(1).default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_PRETTY: flag,
    ENDPOINTS_DIR: z.string().min(1).default('./endpoints'),
    ENVIRONMENTS_DIR: z.string().min(1).default('./environments'),
    PUBLIC_BASE_URL: z.string().url().optional(),
    BACKEND_TIMEOUT_MS: positiveInt(30000),
    CACHE_PROVIDER: z.enum(['memory', 'redis']).default('memory'),
    REDIS_URL: z.string().url().optional(),
    CACHE_KEY_PREFIX: z.string().default('apigw:'),
    CACHE_DEFAULT_TTL_SECONDS: positiveInt(300),
    CACHE_CONTENT_TYPES: z
      .string()
      .default(DEFAULT_CONTENT_TYPES)
      .transform((value) =>
        value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      ),
    CACHE_CONTROL_DEFAULT: z.string().min(1).default('public, max-age=300'),
    LOCK_LEASE_MS: positiveInt(30000),
    LOCK_MAX_WAIT_MS: z.coerce.number().int().min(0).default(10000),
    LOCK_POLL_INTERVAL_MS: positiveInt(200),
    SHARED_VALUE_SCOPE: z.enum(['request', 'step']).default('request'),
  })
  .superRefine((env, ctx) => {
    if (env.CACHE_PROVIDER === 'redis' && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: 'REDIS_URL is required when CACHE_PROVIDER is redis',
      });
    }
  });

/**
 * Validated gateway configuration
 */
export interface GatewayConfig {
  host: string;
  port: number;
  logLevel: LevelWithSilent;
  logPretty: boolean;
  endpointsDir: string;
  environmentsDir: string;
  /** Overrides the scheme and host taken from the request when rewriting URLs */
  publicBaseUrl?: string;
  backendTimeoutMs: number;
  cache: {
    provider: 'memory' | 'redis';
    redisUrl?: string;
    keyPrefix: string;
    defaultTtlSeconds: number;
    contentTypes: string[];
    /** Cache-Control sent on GET responses whose backend set none */
    controlDefault: string;
  };
  lock: {
    leaseMs: number;
    maxWaitMs: number;
    pollIntervalMs: number;
  };
  sharedValueScope: 'request' | 'step';
}

export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate environment variables into a GatewayConfig
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const value = parsed.data;

  return {
    host: value.HOST,
    port: value.PORT,
    logLevel: value.LOG_LEVEL,
    logPretty: value.LOG_PRETTY,
    endpointsDir: value.ENDPOINTS_DIR,
    environmentsDir: value.ENVIRONMENTS_DIR,
    publicBaseUrl: value.PUBLIC_BASE_URL,
    backendTimeoutMs: value.BACKEND_TIMEOUT_MS,
    cache: {
      provider: value.CACHE_PROVIDER,
      redisUrl: value.REDIS_URL,
      keyPrefix: value.CACHE_KEY_PREFIX,
      defaultTtlSeconds: value.CACHE_DEFAULT_TTL_SECONDS,
      contentTypes: value.CACHE_CONTENT_TYPES,
      controlDefault: value.CACHE_CONTROL_DEFAULT,
    },
    lock: {
      leaseMs: value.LOCK_LEASE_MS,
      maxWaitMs: value.LOCK_MAX_WAIT_MS,
      pollIntervalMs: value.LOCK_POLL_INTERVAL_MS,
    },
    sharedValueScope: value.SHARED_VALUE_SCOPE,
  };
}
