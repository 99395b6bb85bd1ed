import { z } from 'zod';

const flag = (fallback: '0' | '1') =>
  z.enum(['0', '1']).default(fallback).transform((v) => v === '1');

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  PORT: int(4311, 1),
  WORKER_PORT: int(4500, 1),
  HOST: z.string().default('0.0.0.0'),
  INSTANCE_ID: z.string().min(1).optional(),

  // Queue store
  REPO_KIND: z.enum(['memory', 'redis']).default('memory'),
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().min(1).optional(),
  RESULT_RETENTION_MS: int(60 * 60 * 1000, 1000),

  // Worker
  WORKER_ENABLED: flag('1'),
  WORKER_CONCURRENCY: int(4, 1),
  LEASE_MS: int(30_000, 100),
  POLL_INTERVAL_MS: int(250, 1),
  POLL_MAX_INTERVAL_MS: int(2_000, 1),
  MAINTENANCE_INTERVAL_MS: int(5_000, 10),
  SHUTDOWN_GRACE_MS: int(5_000, 0),

  // Shared retry policy
  RETRY_MAX_ATTEMPTS: int(3, 1),
  RETRY_BASE_DELAY_MS: int(1_000, 0),
  RETRY_MULTIPLIER: z.coerce.number().min(1).default(2),
  RETRY_MAX_DELAY_MS: int(60_000, 0),
  RETRY_JITTER: z.coerce.number().min(0).max(1).default(0.1),

  // Circuit breaker
  BREAKER_WINDOW_SIZE: int(10, 1),
  BREAKER_FAILURE_RATIO: z.coerce.number().gt(0).max(1).default(0.5),
  BREAKER_COOLDOWN_MS: int(30_000, 0),

  // Gateway
  REGISTRY_KIND: z.enum(['memory', 'redis']).optional(),
  REGISTRY_TTL_MS: int(10 * 60 * 1000, 1000),
  REGISTRY_SWEEP_MS: int(30_000, 10),
  WS_HEARTBEAT_MS: int(30_000, 10),
  WS_OUTBOUND_QUEUE_MAX: int(256, 1),
  INTERNAL_TOKEN: z.string().min(1).optional(),
  // Comma-separated; a worker publishes to every gateway instance listed
  GATEWAY_INTERNAL_URLS: z.string().default('ws://127.0.0.1:4311/internal/ws').transform((csv, ctx) => {
    const urls = csv.split(',').map((s) => s.trim()).filter(Boolean);
    for (const url of urls) {
      if (!/^wss?:\/\//.test(url)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a WebSocket URL: ${url}` });
        return z.NEVER;
      }
    }
    return urls;
  }),

  // HTTP surface
  CORS_ORIGINS: z.string().default(''),
  CORS_DEV: flag('0'),
  RATE_LIMIT_ENABLED: flag('1'),
  RATE_LIMIT_RPM: int(120, 1),
  RATE_LIMIT_BURST: int(30, 1),

  // Downstream services
  EMBEDDING_SERVICE_URL: z.string().url().default('http://127.0.0.1:8003'),
  QUERY_SERVICE_URL: z.string().url().default('http://127.0.0.1:8004'),
  AGENT_EXECUTION_SERVICE_URL: z.string().url().default('http://127.0.0.1:8002'),
  INGESTION_SERVICE_URL: z.string().url().default('http://127.0.0.1:8001'),
  EMBEDDING_CACHE_TTL_MS: int(5 * 60 * 1000, 0),
}).superRefine((env, ctx) => {
  const needsRedis = env.REPO_KIND === 'redis' || env.REGISTRY_KIND === 'redis';
  if (needsRedis && (!env.UPSTASH_REDIS_REST_URL || !env.UPSTASH_REDIS_REST_TOKEN)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['UPSTASH_REDIS_REST_URL'],
      message: 'UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set when a redis store is selected',
    });
  }
  if (env.NODE_ENV === 'production' && !env.INTERNAL_TOKEN) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['INTERNAL_TOKEN'],
      message: 'INTERNAL_TOKEN must be set in production',
    });
  }
  if (env.POLL_MAX_INTERVAL_MS < env.POLL_INTERVAL_MS) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['POLL_MAX_INTERVAL_MS'],
      message: 'POLL_MAX_INTERVAL_MS must be >= POLL_INTERVAL_MS',
    });
  }
});

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/** Parses the environment once at boot; an invalid value aborts startup. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings behave like unset variables
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v !== ''),
  );
  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => `${e.path.join('.') || 'env'}: ${e.message}`));
  }
  return parsed.data;
}

export interface UpstashCredentials {
  url: string;
  token: string;
}

export function upstashCredentials(
  config: Pick<AppConfig, 'UPSTASH_REDIS_REST_URL' | 'UPSTASH_REDIS_REST_TOKEN'>,
): UpstashCredentials | null {
  if (!config.UPSTASH_REDIS_REST_URL || !config.UPSTASH_REDIS_REST_TOKEN) return null;
  return { url: config.UPSTASH_REDIS_REST_URL, token: config.UPSTASH_REDIS_REST_TOKEN };
}
