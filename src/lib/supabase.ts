/**
 * Supabase Client Configuration
 * Service-role client for the member, payment and notification tables
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

import type { AppConfig } from './config.js';

/**
 * Create a Supabase admin client that bypasses RLS
 * Use this ONLY for server-side adapters
 */
export function createSupabaseAdmin(
  config: Pick<AppConfig, 'SUPABASE_URL' | 'SUPABASE_SERVICE_KEY'>
): SupabaseClient {
  return createClient(config.SUPABASE_URL, config.SUPABASE_SERVICE_KEY, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
