#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, missingCredentials } from "../config/manager.js";
import { createConsoleLogger } from "../logging/console.js";
import { SessionMcpServer } from "./adapter.js";

const logger = createConsoleLogger();

async function main(): Promise<void> {
  const config = await loadConfig(process.env["TRADING_SESSION_CONFIG"]);
  const missing = missingCredentials(config);
  if (missing.length > 0) {
    logger.warn(`Platform credentials missing: ${missing.join(", ")}`);
  }

  const server = new SessionMcpServer({ config, logger });
  await server.start(new StdioServerTransport());
}

main().catch((error) => {
  logger.error("Failed to start session MCP server", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
