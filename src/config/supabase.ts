/**
 * Supabase Client Configuration
 * Service-role client for the recordings, homily_segments and comparison_results tables.
 */

import { createClient, SupabaseClient } from "@supabase/supabase-js";
import { SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY } from "./env.js";

/**
 * Server-side only: the service role bypasses row level security.
 * Sessions are never persisted since no user signs in through this client.
 */
export const supabase: SupabaseClient = createClient(SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, {
  auth: {
    autoRefreshToken: false,
    persistSession: false,
  },
  global: {
    headers: { "x-client-info": "homily-monitor" },
  },
});
