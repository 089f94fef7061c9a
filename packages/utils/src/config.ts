import { EnvConfig, type TEnvConfig } from "@dockline/types";

export type DocklineConfig = {
  supabaseUrl?: string;
  supabaseServiceKey?: string;
  pageSize: number;
  storeTimeoutMs: number;
  serviceName: string;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): DocklineConfig {
  const parsed = EnvConfig.safeParse(pickDefined(env));
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid dockline environment: ${details}`);
  }
  return toConfig(parsed.data);
}

function toConfig(env: TEnvConfig): DocklineConfig {
  return {
    supabaseUrl: env.SUPABASE_URL,
    supabaseServiceKey: env.SUPABASE_SERVICE_ROLE_KEY,
    pageSize: env.DOCKLINE_PAGE_SIZE,
    storeTimeoutMs: env.DOCKLINE_STORE_TIMEOUT_MS,
    serviceName: env.OTEL_SERVICE_NAME
  };
}

// Blank variables count as unset so defaults apply.
function pickDefined(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim().length > 0) {
      result[key] = value;
    }
  }
  return result;
}
