/**
 * Supabase Client Configuration (TASK_STORE=supabase)
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";

/**
 * Client with the service role key, for server-side table access.
 */
export function createSupabaseClient(url: string, serviceRoleKey: string): SupabaseClient {
  return createClient(url, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
