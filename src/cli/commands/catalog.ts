/**
 * Operation catalog commands.
 */

import type { Command } from "commander";
import { stringify as stringifyYaml } from "yaml";
import { loadOperationRegistry } from "../../registry/catalog.js";
import { OperationKind } from "../../schemas/operation.js";

export function registerCatalogCommands(program: Command): void {
  const catalog = program
    .command("catalog")
    .description("Browse the operation catalog")
    .option("--file <path>", "Catalog file (default: bundled catalog)");

  catalog
    .command("list")
    .description("List operations")
    .option("--kind <kind>", `Filter by kind (${OperationKind.options.join(", ")})`)
    .option("--search <keyword>", "Filter by keyword in name, title or description")
    .action(async (opts: { kind?: string; search?: string }) => {
      const registry = await loadOperationRegistry(catalog.opts<{ file?: string }>().file);

      let operations = registry.list();
      if (opts.kind !== undefined) {
        const kind = OperationKind.safeParse(opts.kind);
        if (!kind.success) {
          console.log(`Unknown kind '${opts.kind}'`);
          process.exitCode = 1;
          return;
        }
        operations = registry.list(kind.data);
      }
      if (opts.search) {
        const matching = new Set(registry.search(opts.search).map(op => op.name));
        operations = operations.filter(op => matching.has(op.name));
      }

      const width = Math.max(10, ...operations.map(op => op.name.length));
      for (const op of operations) {
        const marker = op.longRunning ? " ⏳" : "";
        console.log(`${op.name.padEnd(width)}  ${op.kind.padEnd(9)}  ${op.endpoint ?? "-"}${marker}`);
      }
      console.log(`\n${operations.length} operation(s)`);
    });

  catalog
    .command("show <name>")
    .description("Show one operation's descriptor")
    .action(async (name: string) => {
      const registry = await loadOperationRegistry(catalog.opts<{ file?: string }>().file);
      const op = registry.get(name);
      if (!op) {
        console.log(`Operation '${name}' not found`);
        process.exitCode = 1;
        return;
      }
      console.log(stringifyYaml(op, { lineWidth: 120 }));
    });
}
