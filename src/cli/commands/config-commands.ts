/**
 * Configuration commands.
 */

import type { Command } from "commander";
import { getConfigValue, loadConfig, validateConfigFile } from "../../config/manager.js";

const SECRET_KEYS = new Set(["api.apiToken"]);

function format(value: unknown): string {
  return typeof value === "object" && value !== null ? JSON.stringify(value, null, 2) : String(value);
}

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Inspect session configuration");

  config
    .command("get <key>")
    .description("Get effective config value (dot-notation)")
    .action(async (key: string) => {
      const loaded = await loadConfig(program.opts<{ config?: string }>().config);
      const value = getConfigValue(loaded, key);
      if (value === undefined) {
        console.log(`Key '${key}' not found`);
        process.exitCode = 1;
      } else if (SECRET_KEYS.has(key) && value !== "") {
        console.log("********");
      } else {
        console.log(format(value));
      }
    });

  config
    .command("validate [file]")
    .description("Validate a config file against the schema")
    .action(async (file: string | undefined) => {
      const path = file ?? program.opts<{ config?: string }>().config;
      if (!path) {
        console.log("No config file given (pass a path or --config)");
        process.exitCode = 1;
        return;
      }

      const result = await validateConfigFile(path);
      if (result.valid) {
        console.log(`✅ ${path} is valid`);
        return;
      }
      console.log(`❌ ${path} has ${result.issues.length} issue(s):`);
      for (const issue of result.issues) {
        console.log(`  ✗ ${issue.path || "(root)"}: ${issue.message}`);
      }
      process.exitCode = 1;
    });
}
