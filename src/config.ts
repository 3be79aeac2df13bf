import { z } from 'zod';

function todayPartition(): string {
  return new Date().toISOString().split('T')[0] ?? 'latest';
}

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HARVEST_BASE_URL: z.string().url().default('http://ufcstats.com'),
  OUTPUT_DIR: z.string().min(1).default('./data'),
  OUTPUT_PARTITION: z.string().min(1).default(todayPartition),
  WORKER_POOL_SIZE: z.coerce.number().int().positive().default(10),
  ENUMERATION_POOL_SIZE: z.coerce.number().int().positive().default(10),
  MAX_RETRIES: z.coerce.number().int().nonnegative().default(5),
  BACKOFF_BASE_MS: z.coerce.number().int().nonnegative().default(1000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  USER_AGENT: z.string().default('Mozilla/5.0 (compatible; FightStatsHarvester/1.0)'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export type Config = z.infer<typeof envSchema>;

export function parseConfig(env: Record<string, string | undefined>): Config {
  return envSchema.parse(env);
}

const logEnvSchema = z.object({
  NODE_ENV: envSchema.shape.NODE_ENV.catch('development'),
  LOG_LEVEL: envSchema.shape.LOG_LEVEL.catch('info'),
});

export type LogSettings = z.infer<typeof logEnvSchema>;

/**
 * The settings the logger needs at import time. An invalid value falls back
 * to its default here; `parseConfig` reports it once the CLI starts.
 */
export function readLogSettings(env: Record<string, string | undefined>): LogSettings {
  return logEnvSchema.parse(env);
}
