/**
 * Supabase client factory
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export interface ListSyncClientOptions {
  supabaseUrl: string;
  supabaseAnonKey: string;
}

/**
 * Create a client for a headless process. The session lives in memory
 * only; the CLI keeps the refresh token in its own config.
 */
export function createListSyncClient(options: ListSyncClientOptions): SupabaseClient {
  return createClient(options.supabaseUrl, options.supabaseAnonKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: true,
      detectSessionInUrl: false,
    },
  });
}
