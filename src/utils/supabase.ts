import { createClient, SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseSettings {
  url: string;
  serviceKey: string;
}

/**
 * Service-role client for server-side writes; no session persistence
 */
export function createServiceClient(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}
