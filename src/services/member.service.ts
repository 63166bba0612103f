/**
 * MemberService Implementation
 *
 * SCOPE: Read-only member queries
 *
 * GUARDRAILS:
 * - No transformation of what the store returns
 * - "Not found" is an inactive member, never an error
 * - isActive is the stored flag; it is NOT recomputed from subscriptionEnd
 */

import type { Member, Result } from '@/types/index.js';
import { success } from '@/types/index.js';

/**
 * Member store abstraction
 * Shared by MemberService and LifecycleService
 */
export interface MemberServiceDb {
  getMember: (memberId: string) => Promise<Member | null>;
  listMembers: () => Promise<Member[]>;
  updateMember: (member: Member) => Promise<void>;
}

/**
 * MemberService interface
 */
export interface MemberService {
  getMember(memberId: string): Promise<Result<Member | null>>;
  isActive(memberId: string): Promise<Result<boolean>>;
}

/**
 * Create MemberService instance
 */
export function createMemberService(deps: {
  db: Pick<MemberServiceDb, 'getMember'>;
}): MemberService {
  const { db } = deps;

  return {
    async getMember(memberId: string): Promise<Result<Member | null>> {
      const member = await db.getMember(memberId);
      return success(member);
    },

    async isActive(memberId: string): Promise<Result<boolean>> {
      const member = await db.getMember(memberId);
      if (member === null) {
        return success(false);
      }
      return success(member.isActive);
    },
  };
}
