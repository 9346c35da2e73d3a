/**
 * Operation Registry — catalog of remote operations available to the agent.
 *
 * Operations are data: the registry is loaded from `catalog/operations.yaml`
 * (or any file of the same shape) and consulted by the resolver, the
 * harvester and the supervisor. Nothing here branches on operation names.
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import {
  OperationCatalog,
  OperationDescriptor,
  type OperationKind,
} from "../schemas/operation.js";

/** Default catalog shipped with the package. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../catalog/operations.yaml", import.meta.url));

/**
 * Registry of available operations.
 *
 * Supports registration, lookup, filtering by kind, and keyword search.
 */
export class OperationRegistry {
  private readonly operations = new Map<string, OperationDescriptor>();

  constructor(descriptors: OperationDescriptor[] = []) {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  /**
   * Register an operation. An existing entry with the same name is replaced.
   */
  register(descriptor: OperationDescriptor): void {
    this.operations.set(descriptor.name, descriptor);
  }

  unregister(name: string): void {
    this.operations.delete(name);
  }

  get(name: string): OperationDescriptor | undefined {
    return this.operations.get(name);
  }

  has(name: string): boolean {
    return this.operations.has(name);
  }

  /**
   * List operations, optionally filtered by kind.
   */
  list(kind?: OperationKind): OperationDescriptor[] {
    const all = Array.from(this.operations.values());
    if (kind === undefined) {
      return all;
    }
    return all.filter(op => op.kind === kind);
  }

  /**
   * Find operations by keyword in name, title or description (case-insensitive).
   */
  search(keyword: string): OperationDescriptor[] {
    const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    const pattern = new RegExp(escaped, "i");
    return this.list().filter(op =>
      pattern.test(op.name) || pattern.test(op.title) || pattern.test(op.description),
    );
  }

  /** Names of every operation referenced by another (lookups, polls) that is not registered. */
  danglingReferences(): string[] {
    const missing = new Set<string>();
    for (const op of this.operations.values()) {
      if (op.longRunning?.poll && !this.has(op.longRunning.poll)) {
        missing.add(op.longRunning.poll);
      }
      for (const param of op.params) {
        if (param.lookup && !this.has(param.lookup.operation)) {
          missing.add(param.lookup.operation);
        }
      }
    }
    return [...missing].sort();
  }
}

/**
 * Parse catalog YAML text into validated descriptors.
 *
 * @throws Error naming the first schema violations
 */
export function parseCatalog(content: string, source = "catalog"): OperationDescriptor[] {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new Error(`Invalid YAML in operation catalog: ${source}`, { cause: err });
  }

  const result = OperationCatalog.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 5)
      .map(i => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Operation catalog failed validation (${source}): ${issues}`);
  }

  const seen = new Set<string>();
  for (const op of result.data.operations) {
    if (seen.has(op.name)) {
      throw new Error(`Duplicate operation '${op.name}' in ${source}`);
    }
    seen.add(op.name);
  }
  return result.data.operations;
}

/**
 * Load an operation registry from a catalog file.
 */
export async function loadOperationRegistry(path: string = DEFAULT_CATALOG_PATH): Promise<OperationRegistry> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new Error(`Failed to read operation catalog: ${path}`, { cause: err });
  }
  return new OperationRegistry(parseCatalog(content, path));
}

/** Validate a single descriptor, e.g. one registered at run time. */
export function defineOperation(input: unknown): OperationDescriptor {
  return OperationDescriptor.parse(input);
}
