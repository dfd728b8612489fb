import path from "node:path";
import { fileURLToPath } from "node:url";

import { DEFAULT_MODULE_ID, credentialsFromEnv } from "./credentials.js";
import { REQUEST_TIMEOUT_MS } from "./http-client.js";
import { CoreConfig, McpTransportKind } from "./types.js";
import { EnvSource, readBoolEnv, readIntEnv, readStringEnv } from "./utils.js";

export function resolveRepoRoot(importMetaUrl: string): string {
  const here = path.dirname(fileURLToPath(importMetaUrl));
  return path.resolve(here, "..", "..", "..");
}

function readTransport(env: EnvSource): McpTransportKind {
  return (readStringEnv("MCP_TRANSPORT", env) ?? "http").toLowerCase() === "stdio" ? "stdio" : "http";
}

export function createCoreConfig(repoRoot: string, overrides: Partial<CoreConfig> = {}, env: EnvSource = process.env): CoreConfig {
  const base: CoreConfig = {
    repoRoot,
    serverApiKey: env.SERVER_API_KEY || "",
    readOnly: readBoolEnv("READ_ONLY_MODE", false, env),
    allowInsecureHttp: readBoolEnv("ALLOW_INSECURE_HTTP", false, env),
    logRequestPayloads: readBoolEnv("LOG_REQUEST_PAYLOADS", false, env),
    httpTimeoutMs: REQUEST_TIMEOUT_MS,
    moduleId: readStringEnv("SUPERFAKTURA_MODULE", env) ?? DEFAULT_MODULE_ID,
    apiUrl: readStringEnv("SUPERFAKTURA_API_URL", env),
    credentialDefaults: credentialsFromEnv(env),
    transport: readTransport(env),
    mcpPath: env.MCP_PATH || "/mcp",
    healthPath: env.HEALTH_PATH || "/healthz",
    mcpMaxSessions: readIntEnv("MCP_MAX_SESSIONS", 256, 1, 10_000, env),
    mcpSessionTtlMs: readIntEnv("MCP_SESSION_TTL_MS", 900_000, 100, 86_400_000, env),
    host: env.HOST || "127.0.0.1",
    port: readIntEnv("PORT", 8787, 1, 65535, env),
  };

  return {
    ...base,
    ...overrides,
  };
}
