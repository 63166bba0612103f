/**
 * Member Domain Types
 *
 * SCOPE: Paid membership lifecycle (renewal and expiration)
 *
 * `isActive` is a cached entitlement flag. It is written only by renewal
 * and by the expiration sweep, and is never derived from
 * `subscriptionEnd` on read, so the two may disagree between sweeps.
 */

/**
 * Member entity
 */
export interface Member {
  id: string;
  displayName: string;
  isActive: boolean;
  subscriptionEnd: Date | null; // null = no subscription ever established
}

/**
 * Notification text sent after a committed renewal
 */
export const RENEWAL_NOTIFICATION = 'Subscription renewed!';

/**
 * Notification text sent when the sweep deactivates a member
 */
export const EXPIRATION_NOTIFICATION = 'Membership expired';

export const MEMBER_NOT_FOUND_MESSAGE = 'Member not found';

/**
 * Step of the per-member sweep that failed
 */
export type SweepFailureStage = 'persist' | 'notify';

export interface SweepFailure {
  memberId: string;
  stage: SweepFailureStage;
  message: string;
}

/**
 * Outcome of one expiration sweep
 */
export interface SweepReport {
  evaluated: number;
  deactivated: string[];
  failures: SweepFailure[];
}
