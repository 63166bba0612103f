/**
 * MemberService Database Adapter
 * Implements MemberServiceDb interface using Supabase
 *
 * Table: members(id, display_name, is_active, subscription_end, updated_at)
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import { systemClock, type Clock } from '@/lib/clock.js';
import type { Member } from '@/types/index.js';

import type { MemberServiceDb } from './member.service.js';

/**
 * Database row shape
 */
const memberRowSchema = z.object({
  id: z.coerce.string(),
  display_name: z.string(),
  is_active: z.boolean(),
  subscription_end: z.string().nullable(),
});

type MemberRow = z.infer<typeof memberRowSchema>;

/**
 * Map database row to Member entity
 */
export function mapRowToMember(row: MemberRow): Member {
  return {
    id: row.id,
    displayName: row.display_name,
    isActive: row.is_active,
    subscriptionEnd:
      row.subscription_end === null ? null : new Date(row.subscription_end),
  };
}

/**
 * Map Member entity to the updatable columns
 */
export function mapMemberToRow(member: Member): Omit<MemberRow, 'id'> {
  return {
    display_name: member.displayName,
    is_active: member.isActive,
    subscription_end:
      member.subscriptionEnd === null
        ? null
        : member.subscriptionEnd.toISOString(),
  };
}

function parseRow(data: unknown): Member {
  const parsed = memberRowSchema.safeParse(data);
  if (!parsed.success) {
    throw new Error(
      `Malformed member row: ${parsed.error.issues[0]?.message ?? 'unknown'}`
    );
  }
  return mapRowToMember(parsed.data);
}

/**
 * Create MemberServiceDb implementation using Supabase
 */
export function createMemberServiceDb(
  supabase: SupabaseClient,
  clock: Clock = systemClock
): MemberServiceDb {
  return {
    /**
     * Get member by ID
     */
    async getMember(memberId: string): Promise<Member | null> {
      const { data, error } = await supabase
        .from('members')
        .select('id, display_name, is_active, subscription_end')
        .eq('id', memberId)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get member: ${error.message}`);
      }

      if (data === null) {
        return null;
      }

      return parseRow(data);
    },

    /**
     * List every member (the sweep filters in-process)
     */
    async listMembers(): Promise<Member[]> {
      const { data, error } = await supabase
        .from('members')
        .select('id, display_name, is_active, subscription_end')
        .order('id', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to list members: ${error.message}`);
      }

      const rows: unknown[] = data ?? [];
      return rows.map(parseRow);
    },

    /**
     * Persist the member's current field values, keyed by ID
     */
    async updateMember(member: Member): Promise<void> {
      const { error } = await supabase
        .from('members')
        .update({
          ...mapMemberToRow(member),
          updated_at: clock().toISOString(),
        })
        .eq('id', member.id);

      if (error !== null) {
        throw new Error(`Failed to update member: ${error.message}`);
      }
    },
  };
}
