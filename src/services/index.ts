/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database.
 * All business logic lives here.
 */

// MemberService
export type { MemberService, MemberServiceDb } from './member.service.js';
export { createMemberService } from './member.service.js';
export { createMemberServiceDb } from './member.db.js';

// LifecycleService
export type {
  LifecycleService,
  LifecycleServicePayments,
  LifecycleServiceNotifier,
} from './lifecycle.service.js';
export { createLifecycleService } from './lifecycle.service.js';
export { createPaymentVerifier } from './payment.db.js';
export { createNotifier } from './notification.db.js';
