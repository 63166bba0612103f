/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import { systemClock, type Clock } from '@/lib/clock.js';

/**
 * Create health check routes
 */
export function createHealthRoutes(clock: Clock = systemClock): Hono {
  const app = new Hono();

  /**
   * GET /health
   * Health check - no authentication required
   */
  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      timestamp: clock().toISOString(),
      version: 'v1',
    });
  });

  return app;
}
