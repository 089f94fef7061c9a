import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { Database } from "@dockline/types/supabase";
import { loadConfig, type DocklineConfig } from "./config.js";

export type ServiceSupabaseClient = SupabaseClient<Database>;

export class SupabaseServiceConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SupabaseServiceConfigurationError";
  }
}

function resolveServiceEnv(config: DocklineConfig) {
  const url = config.supabaseUrl;
  const serviceKey = config.supabaseServiceKey;

  if (!url || !serviceKey) {
    throw new SupabaseServiceConfigurationError(
      "SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY environment variables must be set for store operations."
    );
  }

  return { url, serviceKey };
}

/**
 * Builds a fetch that aborts once `timeoutMs` elapses, unless the caller
 * already supplied its own signal.
 */
export function createTimeoutFetch(timeoutMs: number): typeof fetch {
  return (input, init) => {
    const signal = init?.signal ?? AbortSignal.timeout(timeoutMs);
    return fetch(input, { ...init, signal });
  };
}

export function getServiceSupabaseClient(config: DocklineConfig = loadConfig()): ServiceSupabaseClient {
  const { url, serviceKey } = resolveServiceEnv(config);
  return createClient<Database>(url, serviceKey, {
    auth: { persistSession: false },
    global: { fetch: createTimeoutFetch(config.storeTimeoutMs) }
  });
}
