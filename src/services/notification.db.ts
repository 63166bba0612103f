/**
 * Notifier Adapter
 * Implements LifecycleServiceNotifier by queueing rows in Supabase
 *
 * Table: notifications(member_id, message)
 * Delivery is owned by whatever consumes the table.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { LifecycleServiceNotifier } from './lifecycle.service.js';

/**
 * Create notifier using Supabase
 */
export function createNotifier(
  supabase: SupabaseClient
): LifecycleServiceNotifier {
  return {
    async sendNotification(message: string, memberId: string): Promise<void> {
      const { error } = await supabase
        .from('notifications')
        .insert({ member_id: memberId, message });

      if (error !== null) {
        throw new Error(`Failed to queue notification: ${error.message}`);
      }
    },
  };
}
