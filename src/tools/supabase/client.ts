/**
 * Supabase Client
 * Server-side client for the pgvector passage store
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export interface SupabaseSettings {
  url: string;
  key: string;
}

export function createSupabase(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
