/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { ErrorCode, ServiceError } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create error response from a bare code and message
 */
export function errorCodeResponse(
  c: Context,
  code: ErrorCode,
  message: string,
  requestId: string
): Response {
  return errorResponse(c, { code, message }, requestId);
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Request ID set by the auth middleware, or 'unknown' outside it
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') ?? c.get('actor')?.requestId ?? 'unknown';
}
