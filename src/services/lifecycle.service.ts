/**
 * LifecycleService Implementation
 *
 * SCOPE: Subscription renewal and the expiration sweep
 *
 * GUARDRAILS:
 * - Renewal commits only after payment verification succeeds
 * - Commit order is fixed: mutate -> persist -> notify
 * - Renewal extends from now, never from the previous end date
 * - The clock is read once per operation
 * - The sweep touches only members that would change state, and one
 *   member's failure never stops evaluation of the rest
 *
 * Dependencies: member store, payment verifier, notifier, clock
 */

import { addDays, systemClock, type Clock } from '@/lib/clock.js';
import type {
  Member,
  Result,
  SweepFailure,
  SweepFailureStage,
  SweepReport,
} from '@/types/index.js';
import {
  EXPIRATION_NOTIFICATION,
  MEMBER_NOT_FOUND_MESSAGE,
  RENEWAL_NOTIFICATION,
  failure,
  success,
} from '@/types/index.js';

import type { MemberServiceDb } from './member.service.js';

/**
 * Payment verification capability
 * Must not have side effects on the member
 */
export interface LifecycleServicePayments {
  verifyPayment: (memberId: string, amount: number) => Promise<boolean>;
}

/**
 * Notification capability (fire-and-forget)
 */
export interface LifecycleServiceNotifier {
  sendNotification: (message: string, memberId: string) => Promise<void>;
}

/**
 * LifecycleService interface
 */
export interface LifecycleService {
  renewSubscription(
    memberId: string,
    amount: number,
    durationDays: number
  ): Promise<Result<boolean>>;
  deactivateExpiredMembers(): Promise<Result<SweepReport>>;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isExpired(member: Member, now: Date): boolean {
  return (
    member.subscriptionEnd !== null &&
    member.subscriptionEnd.getTime() <= now.getTime()
  );
}

/**
 * Create LifecycleService instance
 */
export function createLifecycleService(deps: {
  db: MemberServiceDb;
  payments: LifecycleServicePayments;
  notifier: LifecycleServiceNotifier;
  clock?: Clock;
}): LifecycleService {
  const { db, payments, notifier } = deps;
  const clock = deps.clock ?? systemClock;

  return {
    async renewSubscription(
      memberId: string,
      amount: number,
      durationDays: number
    ): Promise<Result<boolean>> {
      const member = await db.getMember(memberId);
      if (member === null) {
        return failure('NOT_FOUND', MEMBER_NOT_FOUND_MESSAGE, { memberId });
      }

      const verified = await payments.verifyPayment(memberId, amount);
      if (!verified) {
        return success(false);
      }

      const now = clock();
      const previous = {
        isActive: member.isActive,
        subscriptionEnd: member.subscriptionEnd,
      };

      member.isActive = true;
      member.subscriptionEnd = addDays(now, durationDays);

      try {
        await db.updateMember(member);
      } catch (err) {
        member.isActive = previous.isActive;
        member.subscriptionEnd = previous.subscriptionEnd;
        throw err;
      }

      await notifier.sendNotification(RENEWAL_NOTIFICATION, memberId);

      return success(true);
    },

    async deactivateExpiredMembers(): Promise<Result<SweepReport>> {
      const members = await db.listMembers();
      const now = clock();

      const deactivated: string[] = [];
      const failures: SweepFailure[] = [];

      const recordFailure = (
        member: Member,
        stage: SweepFailureStage,
        err: unknown
      ): void => {
        console.error(
          `Expiration sweep ${stage} failed for member ${member.id}:`,
          err
        );
        failures.push({
          memberId: member.id,
          stage,
          message: errorMessage(err),
        });
      };

      for (const member of members) {
        // Already inactive members are not re-persisted or re-notified
        if (!member.isActive || !isExpired(member, now)) {
          continue;
        }

        member.isActive = false;
        try {
          await db.updateMember(member);
        } catch (err) {
          member.isActive = true;
          recordFailure(member, 'persist', err);
          continue;
        }
        deactivated.push(member.id);

        try {
          await notifier.sendNotification(EXPIRATION_NOTIFICATION, member.id);
        } catch (err) {
          recordFailure(member, 'notify', err);
        }
      }

      const report: SweepReport = {
        evaluated: members.length,
        deactivated,
        failures,
      };

      if (failures.length > 0) {
        return failure(
          'SWEEP_INCOMPLETE',
          `Expiration sweep failed for ${failures.length} member(s)`,
          { ...report }
        );
      }

      return success(report);
    },
  };
}
