import { createClient, SupabaseClient } from '@supabase/supabase-js';
import type { SupabaseConfig } from '../../bootstrap/config';

let client: SupabaseClient | null = null;

export function getSupabaseClient(config: SupabaseConfig): SupabaseClient {
  if (client) return client;

  if (!config.url || !config.serviceKey) {
    throw new Error('Supabase URL and service key are required');
  }

  client = createClient(config.url, config.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
