import { createClient, type SupabaseClient } from "@supabase/supabase-js";

export interface ServiceRoleClientOptions {
  fetch?: typeof fetch;
}

/**
 * Server-only client with the service role key.
 * Sessions are never persisted: each process talks to Postgres statelessly.
 */
export function getServiceRoleClient(
  url: string,
  serviceRoleKey: string,
  options: ServiceRoleClientOptions = {},
): SupabaseClient {
  if (!url) throw new Error("Supabase URL is not configured");
  if (!serviceRoleKey) throw new Error("Supabase service role key is not configured");

  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: options.fetch },
  });
}
