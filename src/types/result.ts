/**
 * Result Pattern
 *
 * Service methods report domain outcomes as Result<T> instead of throwing.
 * Collaborator failures (database, network) still reject the promise.
 */

/**
 * Error codes produced by the service and API layers
 */
export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'PAYMENT_DECLINED'
  | 'RATE_LIMITED'
  | 'SWEEP_INCOMPLETE'
  | 'INTERNAL_ERROR';

export interface ServiceError {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: ServiceError;
}

export type Result<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: ServiceError = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return { success: false, error };
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.success;
}
