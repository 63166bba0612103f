/**
 * API Layer Exports
 *
 * API layer is thin - delegates to services for all business logic.
 */

export { createApp } from './app.js';
export {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
export { hasPermission, requirePermission } from './middleware/permission.js';
export {
  createRateLimitMiddleware,
  createUpstashRateLimiter,
  createInMemoryRateLimiter,
} from './middleware/rateLimit.js';
export type {
  InMemoryRateLimiter,
  RateLimiter,
  RateLimitConfig,
  RateLimitResult,
} from './middleware/rateLimit.js';
export type { ApiServices } from './types.js';
