/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export type { AppConfig } from './config.js';
export { loadConfig, getSweepIntervalMs } from './config.js';
export type { Clock } from './clock.js';
export { systemClock, addDays, MS_PER_DAY } from './clock.js';
export { createSupabaseAdmin } from './supabase.js';
export { createRedis, createRenewRatelimit } from './redis.js';
