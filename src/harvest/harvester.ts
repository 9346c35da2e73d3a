/**
 * Harvester — extracts identifiers and handles from operation results into
 * the session context.
 *
 * Payload fields are scanned at the top level and one nested level down.
 * Identifier-shaped keys (`...Id`/`...ID`) map onto domain slots through a
 * static table; unmapped ones go to the overflow bucket. A list payload
 * becomes the recent list of its domain. One harvest is one store
 * transaction, so cross-linked identifiers land together or not at all.
 *
 * Harvesting never fails: anything malformed is skipped.
 */

import {
  CONTAINER_DOMAINS,
  HANDLE_KEYS,
  IDENTIFIER_SLOTS,
  domainFromOperation,
  isIdentifierKey,
  sameValue,
  toContextValue,
  type ContextValue,
  type DomainName,
  type Provenance,
  type SlotRef,
} from "../context/domains.js";
import type { ContextStore, ContextTransaction, RecentItem } from "../context/store.js";
import type { OperationKind } from "../schemas/operation.js";

/** A caller-supplied value to pin with `explicit` provenance. */
export interface ExplicitPin {
  slot: SlotRef;
  value: ContextValue;
}

export interface HarvestOptions {
  /** Domain of the operation; inferred from its name when absent. */
  domain?: DomainName;
  kind?: OperationKind;
  /** Values the caller supplied for context-mapped parameters. */
  explicit?: ExplicitPin[];
  /** Only refresh recent lists; pinned slots, overflow and `last.*` stay as they are. */
  detached?: boolean;
}

export interface SlotChange {
  domain: DomainName;
  field: string;
  previous?: ContextValue;
  value: ContextValue;
}

export interface HarvestReport {
  operation: string;
  /** Domains whose pinned record changed. */
  domains: DomainName[];
  /** Every pinned field written, with its previous value. */
  changes: SlotChange[];
  /** Domain whose recent list was refreshed from a list payload. */
  listed?: DomainName;
  /** Identifiers seen, mapped or not. */
  identifiers: number;
}

type PayloadObject = Record<string, unknown>;

function isRecord(value: unknown): value is PayloadObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Identifier value usable as context, or undefined for blanks and non-positive numbers. */
function identifierValue(value: unknown): ContextValue | undefined {
  const normalized = toContextValue(value);
  if (typeof normalized === "number" && normalized <= 0) return undefined;
  return normalized;
}

/** Fields describing one entity: its own id/handles and its relations. */
interface EntityFields {
  own: Record<string, ContextValue>;
  relations: Record<string, ContextValue>;
  foreign: Array<{ slot: SlotRef; value: ContextValue }>;
  overflow: Array<{ key: string; value: ContextValue }>;
  /** Every identifier in payload order, for `last.id`. */
  identifiers: Array<{ key: string; value: ContextValue }>;
}

function readEntity(obj: PayloadObject, domain: DomainName | undefined): EntityFields {
  const fields: EntityFields = { own: {}, relations: {}, foreign: [], overflow: [], identifiers: [] };

  for (const [key, raw] of Object.entries(obj)) {
    if (isIdentifierKey(key)) {
      const value = identifierValue(raw);
      if (value === undefined) continue;
      fields.identifiers.push({ key, value });
      const slot = IDENTIFIER_SLOTS[key];
      if (!slot) {
        fields.overflow.push({ key, value });
      } else if (slot.domain === domain) {
        fields.own[slot.field] = value;
      } else {
        fields.foreign.push({ slot, value });
        fields.relations[key] = value;
      }
    } else if (key === "id" && domain) {
      const value = identifierValue(raw);
      if (value !== undefined && fields.own["id"] === undefined) fields.own["id"] = value;
    } else if (HANDLE_KEYS.includes(key) && domain) {
      const value = toContextValue(raw);
      if (typeof value === "string") fields.own[key] = value;
    }
  }

  return fields;
}

const IDENTITY_FIELDS = ["id", "name", "key", "path"] as const;

function identityField(fields: Record<string, ContextValue>): string | undefined {
  return IDENTITY_FIELDS.find(field => fields[field] !== undefined);
}

function identityOf(fields: Record<string, ContextValue>): ContextValue | undefined {
  const field = identityField(fields);
  return field === undefined ? undefined : fields[field];
}

function recentItemOf(fields: EntityFields): RecentItem | undefined {
  if (identityOf(fields.own) === undefined) return undefined;
  return { ...fields.own, ...fields.relations };
}

/**
 * Write an entity's fields into a domain's pinned record.
 *
 * When the entity differs from the one currently pinned, the old record is
 * dropped first so fields of two entities never mix. An inferred write of
 * the value already pinned keeps an explicit tag.
 */
function pinEntity(
  tx: ContextTransaction,
  domain: DomainName,
  values: Record<string, ContextValue>,
  provenance: Provenance,
  changes: SlotChange[],
): void {
  const previous: Record<string, ContextValue | undefined> = {};
  for (const key of Object.keys(values)) previous[key] = tx.get(domain, key);

  const field = identityField(values);
  if (field !== undefined) {
    const current = tx.get(domain, field);
    if (current !== undefined && !sameValue(current, values[field])) {
      tx.clear(domain);
    }
  }

  for (const [key, value] of Object.entries(values)) {
    const slot = tx.getSlot(domain, key);
    if (slot && sameValue(slot.value, value) && (slot.provenance === provenance || slot.provenance === "explicit")) {
      continue;
    }
    tx.set(domain, key, value, provenance);
    changes.push({ domain, field: key, previous: previous[key], value });
  }
}

/** Explicit pins of one domain describe one entity. */
function groupPins(pins: ExplicitPin[]): Map<DomainName, Record<string, ContextValue>> {
  const grouped = new Map<DomainName, Record<string, ContextValue>>();
  for (const pin of pins) {
    const values = grouped.get(pin.slot.domain) ?? {};
    values[pin.slot.field] = pin.value;
    grouped.set(pin.slot.domain, values);
  }
  return grouped;
}

interface ListPayload {
  domain: DomainName;
  items: PayloadObject[];
}

function ownIdKeys(domain: DomainName): string[] {
  return Object.entries(IDENTIFIER_SLOTS)
    .filter(([, slot]) => slot.domain === domain && slot.field === "id")
    .map(([key]) => key);
}

/** Locate a list of entities: the payload itself, or an array under a known container key. */
function findList(payload: unknown, opDomain: DomainName | undefined): ListPayload | undefined {
  if (Array.isArray(payload)) {
    if (!opDomain) return undefined;
    return { domain: opDomain, items: payload.filter(isRecord) };
  }
  if (!isRecord(payload)) return undefined;

  for (const [key, value] of Object.entries(payload)) {
    if (!Array.isArray(value)) continue;
    const records = value.filter(isRecord);
    if (records.length === 0) continue;
    const container = CONTAINER_DOMAINS[key];
    if (container) {
      return { domain: container, items: records };
    }
    if (opDomain && records.some(item => ownIdKeys(opDomain).some(k => item[k] !== undefined))) {
      return { domain: opDomain, items: records };
    }
  }
  return undefined;
}

export class Harvester {
  constructor(private readonly store: ContextStore) {}

  /**
   * Harvest an operation result into the store.
   *
   * @param operation - Operation name, used to infer the domain of list payloads
   * @param payload - Result payload as returned by the platform
   */
  harvest(operation: string, payload: unknown, options: HarvestOptions = {}): HarvestReport {
    const domain = options.domain ?? domainFromOperation(operation);
    const isCreate = options.kind === "create" || (!options.kind && operation.startsWith("create_"));
    const detached = options.detached === true;

    return this.store.transact(tx => {
      const report: HarvestReport = { operation, domains: [], changes: [], identifiers: 0 };

      const list = findList(payload, domain);
      if (list) {
        this.harvestList(tx, list, isCreate, detached, report);
      }

      if (isRecord(payload)) {
        this.harvestObject(tx, payload, domain, 0, detached, report);
      }
      if (detached) return report;

      for (const [pinDomain, values] of groupPins(options.explicit ?? [])) {
        pinEntity(tx, pinDomain, values, "explicit", report.changes);
      }

      tx.setLastOperation({ name: operation, domain, kind: options.kind });
      report.domains = [...new Set(report.changes.map(change => change.domain))];
      return report;
    });
  }

  /**
   * Record an explicit user override, e.g. `{ id: 42 }` or `{ id: 42, name: "Alpha" }`.
   * The entity also moves to the front of the domain's recent list.
   */
  pin(domain: DomainName, values: Record<string, ContextValue>): HarvestReport {
    return this.store.transact(tx => {
      const report: HarvestReport = { operation: "pin", domains: [], changes: [], identifiers: 0 };
      pinEntity(tx, domain, values, "explicit", report.changes);
      const item: RecentItem = {};
      for (const key of IDENTITY_FIELDS) {
        const current = tx.get(domain, key);
        if (current !== undefined) item[key] = current;
      }
      tx.pushRecent(domain, item);
      report.domains = report.changes.length > 0 ? [domain] : [];
      return report;
    });
  }

  private harvestObject(
    tx: ContextTransaction,
    obj: PayloadObject,
    domain: DomainName | undefined,
    depth: number,
    detached: boolean,
    report: HarvestReport,
  ): void {
    const fields = readEntity(obj, domain);
    if (detached) {
      const item = recentItemOf(fields);
      if (domain && item) tx.pushRecent(domain, item);
    } else {
      this.applyEntity(tx, fields, domain, "inferred", report);
    }

    if (depth > 0) return;
    for (const [key, value] of Object.entries(obj)) {
      if (isRecord(value)) {
        this.harvestObject(tx, value, CONTAINER_DOMAINS[key], depth + 1, detached, report);
      }
    }
  }

  private applyEntity(
    tx: ContextTransaction,
    fields: EntityFields,
    domain: DomainName | undefined,
    provenance: Provenance,
    report: HarvestReport,
  ): void {
    for (const { slot, value } of fields.foreign) {
      pinEntity(tx, slot.domain, { [slot.field]: value }, provenance, report.changes);
    }
    for (const { key, value } of fields.overflow) {
      tx.setOverflow(key, value);
    }
    for (const { key, value } of fields.identifiers) {
      tx.setLastId(key, value);
      report.identifiers += 1;
    }

    if (!domain) return;
    const item = recentItemOf(fields);
    if (!item) return;

    pinEntity(tx, domain, { ...fields.own, ...fields.relations }, provenance, report.changes);
    tx.pushRecent(domain, item);
  }

  private harvestList(
    tx: ContextTransaction,
    list: ListPayload,
    isCreate: boolean,
    detached: boolean,
    report: HarvestReport,
  ): void {
    const entities = list.items.map(item => readEntity(item, list.domain));
    const items = entities
      .map(recentItemOf)
      .filter((item): item is RecentItem => item !== undefined);
    if (items.length === 0) return;

    tx.mergeRecent(list.domain, items);
    report.listed = list.domain;
    if (detached) return;

    const first = entities.find(entity => identityOf(entity.own) !== undefined);
    if (!first) return;

    if (isCreate) {
      this.applyEntity(tx, first, list.domain, "inferred", report);
      return;
    }

    // A list refresh never clobbers an explicit pin.
    const current = tx.getSlot(list.domain, "id") ?? tx.getSlot(list.domain, "name");
    if (current && current.provenance === "explicit") return;
    pinEntity(tx, list.domain, { ...first.own, ...first.relations }, "inferred", report.changes);
  }
}
