/**
 * Membership Lifecycle API Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import {
  createApp,
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
  type RateLimitConfig,
  type RateLimiter,
} from './api/index.js';
import {
  createRedis,
  createRenewRatelimit,
  createSupabaseAdmin,
  getSweepIntervalMs,
  loadConfig,
} from './lib/index.js';
import {
  createLifecycleService,
  createMemberService,
  createMemberServiceDb,
  createNotifier,
  createPaymentVerifier,
} from './services/index.js';
import { createExpirationSweepWorker } from './workers/index.js';

const config = loadConfig();

const supabase = createSupabaseAdmin(config);

// Wire database adapters
const memberDb = createMemberServiceDb(supabase);

// Wire services
const memberService = createMemberService({ db: memberDb });
const lifecycleService = createLifecycleService({
  db: memberDb,
  payments: createPaymentVerifier(supabase),
  notifier: createNotifier(supabase),
});

// Rate limiting for renewals
const renewRateLimit: RateLimitConfig = {
  limit: config.RENEW_RATE_LIMIT,
  window: config.RENEW_RATE_WINDOW_SECONDS,
};
const redis = createRedis(config);
const renewRateLimiter: RateLimiter =
  redis === null
    ? createInMemoryRateLimiter(renewRateLimit)
    : createUpstashRateLimiter(createRenewRatelimit(redis, config));

const app = createApp({
  supabaseClient: supabase,
  services: { memberService, lifecycleService },
  renewRateLimiter,
  renewRateLimit,
  allowedOrigins: config.ALLOWED_ORIGINS,
});

console.error(`Server starting on port ${config.PORT}`);
console.error(`Supabase URL: ${config.SUPABASE_URL}`);
console.error(
  `Rate limiter: ${redis === null ? 'in-memory' : 'upstash'} (${renewRateLimit.limit}/${renewRateLimit.window}s)`
);

const server = serve({
  fetch: app.fetch,
  port: config.PORT,
});

// Scheduled expiration sweep
const sweepIntervalMs = getSweepIntervalMs(config);
const sweepWorker =
  sweepIntervalMs === null
    ? null
    : createExpirationSweepWorker({
        lifecycleService,
        intervalMs: sweepIntervalMs,
      });

if (sweepWorker === null) {
  console.error('Expiration sweep worker disabled');
} else {
  sweepWorker.start();
  console.error(
    `Expiration sweep every ${config.SWEEP_INTERVAL_MINUTES} minute(s)`
  );
}

function shutdown(signal: string): void {
  console.error(`${signal} received, shutting down`);
  sweepWorker?.stop();
  server.close((err) => {
    if (err !== undefined) {
      console.error('Error closing server:', err);
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

export { app };
