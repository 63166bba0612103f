/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { Hono } from 'hono';
import type { MiddlewareHandler } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import {
  createRateLimitMiddleware,
  type RateLimitConfig,
  type RateLimiter,
} from './middleware/rateLimit.js';
import { createHealthRoutes } from './routes/health.js';
import { createMemberRoutes } from './routes/members.js';
import type { ApiServices } from './types.js';
import { errorCodeResponse, getRequestId } from './utils/response.js';

/**
 * App configuration
 */
interface AppConfig {
  supabaseClient: Pick<SupabaseClient, 'auth'>;
  services: ApiServices;
  renewRateLimiter: RateLimiter;
  renewRateLimit?: RateLimitConfig;
  allowedOrigins?: string[];
  /**
   * Replaces the Supabase JWT middleware (tests, trusted internal callers)
   */
  authMiddleware?: MiddlewareHandler;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { supabaseClient, services, renewRateLimiter, allowedOrigins } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route('/api/v1', createHealthRoutes());

  // Member routes
  const authMiddleware =
    config.authMiddleware ?? createAuthMiddleware({ supabaseClient });
  app.use('/api/v1/members/*', authMiddleware);
  app.use(
    '/api/v1/members/:memberId/renew',
    createRateLimitMiddleware(renewRateLimiter, config.renewRateLimit)
  );
  app.route(
    '/api/v1',
    createMemberRoutes({
      memberService: services.memberService,
      lifecycleService: services.lifecycleService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    return errorCodeResponse(
      c,
      'NOT_FOUND',
      'Endpoint not found',
      getRequestId(c)
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);
    return errorCodeResponse(
      c,
      'INTERNAL_ERROR',
      'An unexpected error occurred',
      getRequestId(c)
    );
  });

  return app;
}
