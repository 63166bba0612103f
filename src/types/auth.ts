/**
 * Actor Types
 */

/**
 * Actor Context - who is calling the API
 * Built by the auth middleware for every protected request
 */
export interface ActorContext {
  type: 'user' | 'admin' | 'system' | 'anonymous';
  userId?: string;
  requestId: string;
  permissions: string[];
  ip?: string;
  userAgent?: string;
}

/**
 * Permission codes checked by the member routes
 */
export const PERMISSIONS = {
  MEMBERS_READ: 'members:read',
  MEMBERS_RENEW: 'members:renew',
  MEMBERS_SWEEP: 'members:sweep',
} as const;

export type PermissionCode = (typeof PERMISSIONS)[keyof typeof PERMISSIONS];
