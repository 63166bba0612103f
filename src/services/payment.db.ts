/**
 * Payment Verifier Adapter
 * Implements LifecycleServicePayments using Supabase
 *
 * Table: payments(member_id, amount, status)
 * Read-only: verification never writes to payments or members
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { LifecycleServicePayments } from './lifecycle.service.js';

export const AUTHORIZED_PAYMENT_STATUS = 'authorized';

/**
 * Create payment verifier using Supabase
 */
export function createPaymentVerifier(
  supabase: SupabaseClient
): LifecycleServicePayments {
  return {
    async verifyPayment(memberId: string, amount: number): Promise<boolean> {
      const { data, error } = await supabase
        .from('payments')
        .select('id')
        .eq('member_id', memberId)
        .eq('amount', amount)
        .eq('status', AUTHORIZED_PAYMENT_STATUS)
        .limit(1)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to verify payment: ${error.message}`);
      }

      return data !== null;
    },
  };
}
