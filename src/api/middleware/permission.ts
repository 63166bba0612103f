/**
 * Permission Middleware
 * Gates a route on a single permission code
 */

import type { Context, Next } from 'hono';

import type { ActorContext, PermissionCode } from '@/types/index.js';

import { errorCodeResponse, getRequestId } from '../utils/response.js';

/**
 * Check if actor holds the permission (or the wildcard)
 */
export function hasPermission(
  actor: ActorContext,
  permission: PermissionCode
): boolean {
  return (
    actor.permissions.includes('*') || actor.permissions.includes(permission)
  );
}

/**
 * Create middleware that requires `permission`
 */
export function requirePermission(permission: PermissionCode) {
  return async function permissionMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const actor: ActorContext | undefined = c.get('actor');
    const requestId = getRequestId(c);

    if (actor === undefined) {
      return errorCodeResponse(
        c,
        'UNAUTHORIZED',
        'Authentication required',
        requestId
      );
    }

    if (!hasPermission(actor, permission)) {
      return errorCodeResponse(
        c,
        'PERMISSION_DENIED',
        `Missing permission: ${permission}`,
        requestId
      );
    }

    await next();
  };
}
