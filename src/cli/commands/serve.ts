import type { Command } from "commander";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, missingCredentials } from "../../config/manager.js";
import { createConsoleLogger } from "../../logging/console.js";
import { SessionMcpServer } from "../../mcp/adapter.js";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Run the MCP server over stdio")
    .option("--catalog <path>", "Operation catalog file")
    .action(async (opts: { catalog?: string }) => {
      const logger = createConsoleLogger();
      const config = await loadConfig(program.opts<{ config?: string }>().config);
      const missing = missingCredentials(config);
      if (missing.length > 0) {
        logger.warn(`Platform credentials missing: ${missing.join(", ")}`);
      }

      const server = new SessionMcpServer({ config, logger, catalogPath: opts.catalog });
      await server.start(new StdioServerTransport());
    });
}
