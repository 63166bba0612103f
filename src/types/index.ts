/**
 * Core type definitions
 * Shared types used across the application
 */

export type {
  Result,
  Success,
  Failure,
  ErrorCode,
  ServiceError,
} from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type {
  Member,
  SweepFailure,
  SweepFailureStage,
  SweepReport,
} from './member.js';
export {
  RENEWAL_NOTIFICATION,
  EXPIRATION_NOTIFICATION,
  MEMBER_NOT_FOUND_MESSAGE,
} from './member.js';
export type { ActorContext, PermissionCode } from './auth.js';
export { PERMISSIONS } from './auth.js';
