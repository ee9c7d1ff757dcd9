import "dotenv/config";

export type TransportMode = "stdio" | "http";

export interface ServerConfig {
  mealieUrl: string | undefined;
  mealieApiToken: string | undefined;
  transport: TransportMode;
  port: number;
  logLevel: string;
}

function parseTransport(value: string | undefined): TransportMode {
  return value === "http" ? "http" : "stdio";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    mealieUrl: env.MEALIE_URL || undefined,
    mealieApiToken: env.MEALIE_API_TOKEN || undefined,
    transport: parseTransport(env.TRANSPORT),
    port: parseInt(env.PORT ?? "3000", 10),
    logLevel: env.LOG_LEVEL || "info",
  };
}

/** Names of required settings that are missing, in declaration order. */
export function missingSettings(config: ServerConfig): string[] {
  const missing: string[] = [];
  if (!config.mealieUrl) missing.push("MEALIE_URL");
  if (!config.mealieApiToken) missing.push("MEALIE_API_TOKEN");
  return missing;
}
