import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { loadConfig, validateSupabaseConfig, type AppConfig } from './config';

let supabaseClient: SupabaseClient | null = null;

/**
 * Get the Supabase client instance.
 * Returns null if Supabase is not configured (offline-only mode).
 */
export function getSupabase(config: AppConfig = loadConfig()): SupabaseClient | null {
  if (!validateSupabaseConfig(config) || !config.SUPABASE_URL || !config.SUPABASE_ANON_KEY) {
    return null;
  }

  if (!supabaseClient) {
    supabaseClient = createClient(config.SUPABASE_URL, config.SUPABASE_ANON_KEY, {
      auth: {
        // Sessions live in the auth_state table
        persistSession: false,
        autoRefreshToken: false,
      },
    });
  }

  return supabaseClient;
}

/**
 * Client for the sync server. Uses the service role key when present so token
 * verification does not depend on the anon key.
 */
export function createServerSupabase(config: AppConfig = loadConfig()): SupabaseClient | null {
  const key = config.SUPABASE_SERVICE_ROLE_KEY ?? config.SUPABASE_ANON_KEY;
  if (!config.SUPABASE_URL || !key) {
    console.warn('[SyncServer] Supabase not configured. Token verification unavailable.');
    return null;
  }

  return createClient(config.SUPABASE_URL, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
}
