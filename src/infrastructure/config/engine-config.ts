import { resolve } from 'node:path';
import { z } from 'zod';

/**
 * Zod schema for the environment variables the engine reads.
 *
 * Every variable is optional; defaults match a single local process
 * writing to ./data.
 */
const envSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DATA_DIR: z.string().min(1).default('data'),
  NOTIFICATIONS_CONFIG: z.string().min(1).optional(),

  POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5000),
  WORKER_BATCH_SIZE: z.coerce.number().int().positive().default(50),

  RETRY_INTERVAL_MS: z.coerce.number().int().positive().default(10_000),
  RETRY_BATCH_SIZE: z.coerce.number().int().positive().default(10),
  MAX_DELIVERY_ATTEMPTS: z.coerce.number().int().positive().default(8),
  MAX_BACKOFF_SECONDS: z.coerce.number().positive().default(3600),
  IMMEDIATE_RETRIES: z.coerce.number().int().positive().default(3),
  IMMEDIATE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  SCORE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.8),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

/** Explicit configuration passed to every engine component. */
export interface EngineConfig {
  server: { host: string; port: number };
  logLevel: LogLevel;
  dataDir: string;
  databasePath: string;
  rulesPath: string;
  notificationsPath: string | undefined;
  worker: {
    pollIntervalMs: number;
    batchSize: number;
  };
  delivery: {
    immediateAttempts: number;
    immediateDelayMs: number;
  };
  retry: {
    intervalMs: number;
    batchSize: number;
    maxAttempts: number;
    maxBackoffSeconds: number;
  };
  /** Threshold written to the rule document when none exists yet. */
  defaultScoreThreshold: number;
}

/**
 * Builds the engine configuration from environment variables.
 *
 * Throws a ZodError naming every invalid variable.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envSchema.parse(env);
  const dataDir = resolve(parsed.DATA_DIR);

  return {
    server: { host: parsed.HOST, port: parsed.PORT },
    logLevel: parsed.LOG_LEVEL,
    dataDir,
    databasePath: resolve(dataDir, 'intel.db'),
    rulesPath: resolve(dataDir, 'rules.json'),
    notificationsPath: parsed.NOTIFICATIONS_CONFIG,
    worker: {
      pollIntervalMs: parsed.POLL_INTERVAL_MS,
      batchSize: parsed.WORKER_BATCH_SIZE,
    },
    delivery: {
      immediateAttempts: parsed.IMMEDIATE_RETRIES,
      immediateDelayMs: parsed.IMMEDIATE_RETRY_DELAY_MS,
    },
    retry: {
      intervalMs: parsed.RETRY_INTERVAL_MS,
      batchSize: parsed.RETRY_BATCH_SIZE,
      maxAttempts: parsed.MAX_DELIVERY_ATTEMPTS,
      maxBackoffSeconds: parsed.MAX_BACKOFF_SECONDS,
    },
    defaultScoreThreshold: parsed.SCORE_THRESHOLD,
  };
}
