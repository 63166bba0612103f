/**
 * Auth Middleware
 * Constructs ActorContext from Supabase JWT
 *
 * Permissions are read from the user's app_metadata.permissions,
 * which only the service role can write.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { ActorContext } from '@/types/index.js';

import { errorCodeResponse } from '../utils/response.js';

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  supabaseClient: Pick<SupabaseClient, 'auth'>;
}

const permissionsSchema = z.array(z.string()).catch([]);

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Check if user has admin-level permissions
 */
function isAdmin(permissions: string[]): boolean {
  return permissions.some((p) => p === '*' || p.startsWith('admin:'));
}

/**
 * Client address and agent, when the proxy forwards them
 */
function clientInfo(c: Context): Pick<ActorContext, 'ip' | 'userAgent'> {
  const ip = c.req.header('x-forwarded-for') ?? c.req.header('x-real-ip');
  const userAgent = c.req.header('user-agent');
  return {
    ...(ip !== undefined && { ip }),
    ...(userAgent !== undefined && { userAgent }),
  };
}

/**
 * Create auth middleware for protected routes
 * Extracts JWT, verifies with Supabase, constructs ActorContext
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { supabaseClient } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    const token = authHeader?.startsWith('Bearer ')
      ? authHeader.slice(7).trim()
      : '';

    if (token === '') {
      return errorCodeResponse(
        c,
        'UNAUTHORIZED',
        'Missing or invalid authorization header',
        requestId
      );
    }

    try {
      // 2. Verify JWT with Supabase
      const {
        data: { user },
        error,
      } = await supabaseClient.auth.getUser(token);

      if (error !== null || user === null) {
        return errorCodeResponse(
          c,
          'UNAUTHORIZED',
          'Invalid or expired token',
          requestId
        );
      }

      // 3. Resolve permissions
      const permissions = permissionsSchema.parse(
        user.app_metadata['permissions']
      );

      // 4. Construct ActorContext
      const actor: ActorContext = {
        type: isAdmin(permissions) ? 'admin' : 'user',
        userId: user.id,
        requestId,
        permissions,
        ...clientInfo(c),
      };

      c.set('actor', actor);
      c.set('requestId', requestId);
    } catch (err) {
      console.error('Auth middleware error:', err);
      return errorCodeResponse(
        c,
        'INTERNAL_ERROR',
        'Authentication failed',
        requestId
      );
    }

    return next();
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      permissions: [],
      ...clientInfo(c),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
