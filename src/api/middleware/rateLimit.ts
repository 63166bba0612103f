/**
 * Rate Limiting Middleware
 * Uses Upstash Redis for distributed rate limiting, in-memory otherwise
 */

import type { Ratelimit } from '@upstash/ratelimit';
import type { Context, Next } from 'hono';

import { getRequestId } from '../utils/response.js';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the window
   */
  limit: number;

  /**
   * Window duration in seconds
   */
  window: number;

  /**
   * Optional: Get identifier from context (defaults to user, then IP)
   */
  getIdentifier?: (c: Context) => string;
}

/**
 * Rate limit decision
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  limit: 30,
  window: 60,
};

/**
 * Priority: userId > IP > 'unknown'
 */
function defaultGetIdentifier(c: Context): string {
  const actor = c.get('actor');
  if (actor?.userId) {
    return `user:${actor.userId}`;
  }
  const ip =
    c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip') ?? 'unknown';
  return `ip:${ip}`;
}

/**
 * Create rate limit middleware
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: RateLimitConfig = DEFAULT_RATE_LIMIT_CONFIG
) {
  const getIdentifier = config.getIdentifier ?? defaultGetIdentifier;

  return async function rateLimitMiddleware(c: Context, next: Next) {
    const result = await rateLimiter.limit(getIdentifier(c));

    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests',
            details: {
              retryAfter: result.reset,
              limit: result.limit,
            },
            requestId: getRequestId(c),
          },
        },
        429
      );
    }

    return next();
  };
}

/**
 * Adapt an @upstash/ratelimit instance
 * Upstash reports `reset` as a unix timestamp in ms; headers carry seconds remaining
 */
export function createUpstashRateLimiter(
  upstashRatelimit: Pick<Ratelimit, 'limit'>,
  now: () => number = Date.now
): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await upstashRatelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        reset: Math.max(0, Math.ceil((result.reset - now()) / 1000)),
      };
    },
  };
}

/**
 * In-memory limiter with its tracked identifier count exposed
 */
export interface InMemoryRateLimiter extends RateLimiter {
  size: () => number;
}

/**
 * Create in-memory rate limiter (single instance / development)
 * Expired windows are dropped at most once per window length
 */
export function createInMemoryRateLimiter(
  config: RateLimitConfig,
  now: () => number = Date.now
): InMemoryRateLimiter {
  const store = new Map<string, { count: number; resetAt: number }>();
  const windowMs = config.window * 1000;
  let nextPruneAt = now() + windowMs;

  function prune(current: number): void {
    for (const [key, entry] of store) {
      if (entry.resetAt <= current) {
        store.delete(key);
      }
    }
    nextPruneAt = current + windowMs;
  }

  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const current = now();
      if (current >= nextPruneAt) {
        prune(current);
      }

      let entry = store.get(identifier);

      if (entry !== undefined && entry.resetAt <= current) {
        store.delete(identifier);
        entry = undefined;
      }

      if (entry === undefined) {
        entry = { count: 0, resetAt: current + windowMs };
        store.set(identifier, entry);
      }

      entry.count++;

      return {
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: Math.ceil((entry.resetAt - current) / 1000),
      };
    },

    size(): number {
      return store.size;
    },
  };
}
