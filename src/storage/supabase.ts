/**
 * NewsRelay — Supabase Client
 *
 * Service-role client used only for the state bucket.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export function createStateClient(url: string | undefined, serviceRoleKey: string | undefined): SupabaseClient {
  if (!url) {
    throw new Error('Missing SUPABASE_URL environment variable');
  }
  if (!serviceRoleKey) {
    throw new Error('SUPABASE_SERVICE_ROLE_KEY is required for the supabase state backend');
  }
  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
