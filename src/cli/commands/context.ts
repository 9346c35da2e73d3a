/**
 * Saved session context commands.
 */

import type { Command } from "commander";
import { loadConfig } from "../../config/manager.js";
import { isDomainName } from "../../context/domains.js";
import { SnapshotFile } from "../../context/snapshot.js";
import { ContextStore } from "../../context/store.js";
import { createConsoleLogger } from "../../logging/console.js";

async function openSnapshot(program: Command): Promise<SnapshotFile | undefined> {
  const config = await loadConfig(program.opts<{ config?: string }>().config);
  const path = config.context.snapshotPath;
  if (!path) {
    console.log("No snapshot configured (set context.snapshotPath or TRADING_SESSION_SNAPSHOT)");
    process.exitCode = 1;
    return undefined;
  }
  return new SnapshotFile(path, { logger: createConsoleLogger() });
}

export function registerContextCommands(program: Command): void {
  const context = program
    .command("context")
    .description("Inspect or reset the saved session context");

  context
    .command("show")
    .description("Print the saved context")
    .option("--domain <domain>", "Only this domain")
    .action(async (opts: { domain?: string }) => {
      const snapshot = await openSnapshot(program);
      if (!snapshot) return;
      const state = await snapshot.load();
      if (!state) {
        console.log("No saved context");
        return;
      }
      if (opts.domain === undefined) {
        console.log(JSON.stringify(state, null, 2));
        return;
      }
      if (!isDomainName(opts.domain)) {
        console.log(`Unknown domain '${opts.domain}'`);
        process.exitCode = 1;
        return;
      }
      console.log(JSON.stringify(state.domains[opts.domain], null, 2));
    });

  context
    .command("clear <domain>")
    .description("Clear a domain's pinned values in the saved context")
    .option("--recent", "Also clear the recent list", false)
    .action(async (domain: string, opts: { recent: boolean }) => {
      if (!isDomainName(domain)) {
        console.log(`Unknown domain '${domain}'`);
        process.exitCode = 1;
        return;
      }
      const snapshot = await openSnapshot(program);
      if (!snapshot) return;
      const state = await snapshot.load();
      if (!state) {
        console.log("No saved context");
        return;
      }
      const store = ContextStore.fromSnapshot(state);
      store.clear(domain, { recent: opts.recent });
      await snapshot.save(store.snapshot());
      console.log(`✅ Cleared ${domain}`);
    });
}
