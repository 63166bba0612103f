/**
 * Application Configuration
 * Validates process environment with zod
 */

import { z } from 'zod';

// Unset and empty variables both fall back to the schema default
function optionalEnv<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (value === '' ? undefined : value),
    schema
  );
}

/**
 * Largest sweep interval a Node timer can hold (2^31-1 ms, in whole minutes)
 */
export const MAX_SWEEP_INTERVAL_MINUTES = Math.floor(2_147_483_647 / 60_000);

const envSchema = z.object({
  NODE_ENV: optionalEnv(
    z.enum(['development', 'test', 'production']).default('development')
  ),
  PORT: optionalEnv(z.coerce.number().int().positive().default(3000)),
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_KEY: z.string().min(1),
  UPSTASH_REDIS_URL: optionalEnv(z.string().url().optional()),
  UPSTASH_REDIS_TOKEN: optionalEnv(z.string().min(1).optional()),
  RENEW_RATE_LIMIT: optionalEnv(z.coerce.number().int().positive().default(30)),
  RENEW_RATE_WINDOW_SECONDS: optionalEnv(
    z.coerce.number().int().positive().default(60)
  ),
  SWEEP_INTERVAL_MINUTES: optionalEnv(
    z.coerce
      .number()
      .nonnegative()
      .max(MAX_SWEEP_INTERVAL_MINUTES)
      .default(60)
  ),
  ALLOWED_ORIGINS: optionalEnv(
    z.string().default('http://localhost:3000')
  ).transform((value) =>
    value
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== '')
  ),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Parse and validate configuration
 * Throws a single error listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}

/**
 * Sweep interval in milliseconds, or null when the worker is disabled
 */
export function getSweepIntervalMs(config: AppConfig): number | null {
  if (config.SWEEP_INTERVAL_MINUTES === 0) {
    return null;
  }
  return config.SWEEP_INTERVAL_MINUTES * 60 * 1000;
}
