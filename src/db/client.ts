import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { ENV, validateEnv } from '../config/env';

export function createSupabase(): SupabaseClient {
  validateEnv();
  return createClient(ENV.SUPABASE_URL, ENV.SUPABASE_SERVICE_KEY, {
    auth: { persistSession: false },
  });
}
