import { createClient, type SupabaseClient } from '@supabase/supabase-js';

declare global {
  // eslint-disable-next-line no-var
  var __dealrelaySupabase: SupabaseClient | undefined;
}

/**
 * Singleton Supabase client (service role; the worker is the only writer).
 * One instance per process: the client keeps its own fetch keep-alive agent.
 */
export function getSupabase(
  env: { SUPABASE_URL?: string; SUPABASE_SERVICE_ROLE_KEY?: string } = process.env,
): SupabaseClient {
  if (globalThis.__dealrelaySupabase) return globalThis.__dealrelaySupabase;

  const url = env.SUPABASE_URL ?? '';
  const key = env.SUPABASE_SERVICE_ROLE_KEY ?? '';
  if (!url || !key) {
    throw new Error('Missing persistence env vars. Set SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY.');
  }

  const client = createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  globalThis.__dealrelaySupabase = client;
  return client;
}
