#!/usr/bin/env node
import { loadSettings } from "./config/settings.js";
import { Store } from "./db/database.js";
import { startMCPServer } from "./mcp/server.js";
import { configureLogger, logger } from "./utils/logger.js";

// MCP uses stdio transport - stdout is reserved for JSON-RPC. Any console.log breaks the protocol.
console.log = (...args: unknown[]) => console.error("[MCP]", ...args);

async function main(): Promise<void> {
  const settings = loadSettings();
  configureLogger(settings.logging);

  const store = new Store(settings.database.path, { busyTimeoutMs: settings.database.busyTimeoutMs });
  if (settings.database.ensureSchema) {
    store.migrate();
  }

  const server = await startMCPServer(store);

  const shutdown = (signal: string) => {
    logger.info(`[MCP] ${signal} received, shutting down`);
    server
      .close()
      .catch((error: unknown) => logger.error("[MCP] Error while closing:", error))
      .finally(() => process.exit(0));
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((error: unknown) => {
  logger.error("[MCP] Fatal error:", error);
  process.exit(1);
});
