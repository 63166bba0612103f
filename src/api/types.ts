/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { LifecycleService, MemberService } from '@/services/index.js';
import type { ActorContext, ErrorCode } from '@/types/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 401 | 402 | 403 | 404 | 429 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<ErrorCode, ErrorStatus> = {
  UNAUTHORIZED: 401,
  PERMISSION_DENIED: 403,
  NOT_FOUND: 404,
  VALIDATION_ERROR: 400,
  PAYMENT_DECLINED: 402,
  RATE_LIMITED: 429,
  SWEEP_INCOMPLETE: 500,
  INTERNAL_ERROR: 500,
};

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ERROR_STATUS_MAP, code);
}

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ErrorStatus {
  return isErrorCode(code) ? ERROR_STATUS_MAP[code] : 500;
}

/**
 * Services consumed by the API
 */
export interface ApiServices {
  memberService: MemberService;
  lifecycleService: LifecycleService;
}
