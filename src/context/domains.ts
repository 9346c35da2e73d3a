/**
 * Context domains — the named categories of identifiers held per session.
 */

export const DOMAINS = [
  "project",
  "compile",
  "backtest",
  "optimization",
  "live",
  "file",
  "object",
  "ai",
  "server",
  "lean",
] as const;

export type DomainName = (typeof DOMAINS)[number];

/** Domains whose operations complete asynchronously and carry a status slot. */
export const STATUS_DOMAINS: readonly DomainName[] = ["compile", "backtest", "optimization", "live"];

/** Domains whose entities belong to a single project. */
export const PROJECT_SCOPED_DOMAINS: readonly DomainName[] = [
  "compile",
  "backtest",
  "optimization",
  "live",
  "file",
];

/** Scalar values the store holds. Entities are never materialized. */
export type ContextValue = string | number;

/** Where a pinned value came from. */
export type Provenance = "explicit" | "inferred";

/** Target of an identifier-shaped key: the domain and the pinned field it fills. */
export interface SlotRef {
  domain: DomainName;
  field: string;
}

/**
 * Static mapping of identifier keys to their domain slot.
 * Keys absent from this table land in the overflow bucket.
 */
export const IDENTIFIER_SLOTS: Readonly<Record<string, SlotRef>> = {
  projectId: { domain: "project", field: "id" },
  compileId: { domain: "compile", field: "id" },
  backtestId: { domain: "backtest", field: "id" },
  optimizationId: { domain: "optimization", field: "id" },
  algorithmId: { domain: "live", field: "id" },
  deployId: { domain: "live", field: "id" },
  commandId: { domain: "live", field: "command" },
};

/** Non-identifier handles that name the entity of the surrounding object. */
export const HANDLE_KEYS: readonly string[] = ["name", "path", "key"];

/** Nested payload keys that announce the domain of the object below them. */
export const CONTAINER_DOMAINS: Readonly<Record<string, DomainName>> = {
  project: "project",
  projects: "project",
  compile: "compile",
  backtest: "backtest",
  backtests: "backtest",
  optimization: "optimization",
  optimizations: "optimization",
  live: "live",
  deployments: "live",
  file: "file",
  files: "file",
  objects: "object",
  object: "object",
  versions: "lean",
};

const IDENTIFIER_KEY = /(Id|ID)$/;

/** True for keys shaped like identifiers (`projectId`, `nodeID`, ...). */
export function isIdentifierKey(key: string): boolean {
  return IDENTIFIER_KEY.test(key) && key.length > 2;
}

export function isDomainName(value: string): value is DomainName {
  return (DOMAINS as readonly string[]).includes(value);
}

/**
 * Parse a `domain.field` reference, e.g. `project.id`.
 *
 * @returns The slot, or undefined for malformed references
 */
export function parseSlotRef(ref: string): SlotRef | undefined {
  const dot = ref.indexOf(".");
  if (dot <= 0 || dot === ref.length - 1) return undefined;
  const domain = ref.slice(0, dot);
  if (!isDomainName(domain)) return undefined;
  return { domain, field: ref.slice(dot + 1) };
}

/**
 * Infer the domain an operation works on from its name:
 * `list_backtests` → `backtest`, `read_live_algorithm` → `live`.
 */
export function domainFromOperation(operation: string): DomainName | undefined {
  const words = operation.toLowerCase().split("_").slice(1);
  for (const word of words) {
    const singular = word.endsWith("s") ? word.slice(0, -1) : word;
    if (isDomainName(word)) return word;
    if (isDomainName(singular)) return singular;
  }
  return undefined;
}

/** Normalize a raw payload value to a storable identifier, or undefined. */
export function toContextValue(value: unknown): ContextValue | undefined {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return undefined;
}

/** Loose equality for identifiers that may arrive as numbers or strings. */
export function sameValue(a: ContextValue | undefined, b: ContextValue | undefined): boolean {
  if (a === undefined || b === undefined) return false;
  return String(a) === String(b);
}
