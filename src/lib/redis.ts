/**
 * Upstash Redis Client Configuration
 * Backs distributed rate limiting when credentials are configured
 */

import { Ratelimit } from '@upstash/ratelimit';
import { Redis } from '@upstash/redis';

import type { AppConfig } from './config.js';

/**
 * Create the Redis client, or null when Upstash is not configured
 */
export function createRedis(
  config: Pick<AppConfig, 'UPSTASH_REDIS_URL' | 'UPSTASH_REDIS_TOKEN'>
): Redis | null {
  const url = config.UPSTASH_REDIS_URL;
  const token = config.UPSTASH_REDIS_TOKEN;
  if (url === undefined || token === undefined) {
    return null;
  }
  return new Redis({ url, token });
}

/**
 * Sliding-window limiter for renewal requests
 */
export function createRenewRatelimit(
  redis: Redis,
  config: Pick<AppConfig, 'RENEW_RATE_LIMIT' | 'RENEW_RATE_WINDOW_SECONDS'>
): Ratelimit {
  return new Ratelimit({
    redis,
    limiter: Ratelimit.slidingWindow(
      config.RENEW_RATE_LIMIT,
      `${config.RENEW_RATE_WINDOW_SECONDS} s`
    ),
    prefix: 'ratelimit:renew',
  });
}
