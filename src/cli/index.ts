#!/usr/bin/env node

import { Command } from "commander";
import { SERVER_VERSION } from "../version.js";
import { registerCatalogCommands } from "./commands/catalog.js";
import { registerConfigCommands } from "./commands/config-commands.js";
import { registerContextCommands } from "./commands/context.js";
import { registerServeCommand } from "./commands/serve.js";

const program = new Command();

program
  .name("trading-session")
  .description("Session context layer for trading platform operations")
  .version(SERVER_VERSION)
  .option("--config <path>", "Config file (YAML)", process.env["TRADING_SESSION_CONFIG"]);

registerServeCommand(program);
registerCatalogCommands(program);
registerConfigCommands(program);
registerContextCommands(program);

program.parseAsync(process.argv).catch((error) => {
  console.error(`[session] ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
