#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { resolveRepoRoot } from "./core/config.js";
import { SuperFakturaService } from "./core/service.js";
import { configureLogStream, logError, logInfo } from "./core/utils.js";
import { createMcpApp, createSuperFakturaMcpServer } from "./mcp/server.js";

async function startStdio(core: SuperFakturaService): Promise<void> {
  const server = createSuperFakturaMcpServer(core);
  await server.connect(new StdioServerTransport());
  core.logStartup();
}

function startHttp(core: SuperFakturaService): void {
  const app = createMcpApp(core);
  const listener = app.listen(core.config.port, core.config.host, () => {
    core.logStartup();
  });

  const shutdown = (signal: string) => {
    logInfo("server.stopping", { signal });
    listener.close(() => process.exit(0));
    listener.closeAllConnections();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

async function main(): Promise<void> {
  // Protocol frames own stdout under stdio; decide before anything logs.
  if ((process.env.MCP_TRANSPORT ?? "").trim().toLowerCase() === "stdio") {
    configureLogStream("stderr");
  }

  const core = new SuperFakturaService(resolveRepoRoot(import.meta.url));
  if (core.config.transport === "stdio") {
    await startStdio(core);
    return;
  }
  startHttp(core);
}

main().catch((error: unknown) => {
  logError("server.failed", { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
