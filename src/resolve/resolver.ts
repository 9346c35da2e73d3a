/**
 * Resolver — completes a partial argument set from session context.
 *
 * Each declared parameter is resolved on its own, in this order:
 *
 * 1. a value supplied by the caller;
 * 2. a supplied name (`lookup.nameArg`), matched exactly and
 *    case-insensitively against the domain's list operation; the match is
 *    returned as an explicit pin;
 * 3. the pinned slot named by `context`;
 * 4. the most recent item of the domain, when the parameter allows it and
 *    the last committed operation created an item of that domain;
 * 5. an overflow identifier of the same name;
 * 6. the catalog default.
 *
 * A required parameter left empty is a `MissingContext` failure. The
 * resolver never picks between two matching names.
 */

import {
  IDENTIFIER_SLOTS,
  isIdentifierKey,
  parseSlotRef,
  sameValue,
  toContextValue,
  type ContextValue,
  type DomainName,
  type SlotRef,
} from "../context/domains.js";
import type { ContextStore, RecentItem } from "../context/store.js";
import type { ExplicitPin, Harvester } from "../harvest/harvester.js";
import type { OperationRegistry } from "../registry/catalog.js";
import type { OperationDescriptor, OperationParam, NameLookup } from "../schemas/operation.js";
import type { OperationInvoker } from "../transport/invoker.js";
import { silentLogger, type Logger } from "../logging/console.js";
import type { Candidate, ResolutionFailure } from "./failures.js";

export type ArgSource = "explicit" | "lookup" | "pinned" | "recent" | "overflow" | "default";

export type ResolveResult =
  | {
      success: true;
      args: Record<string, unknown>;
      sources: Record<string, ArgSource>;
      /** Caller-supplied values and name matches, to pin once the call succeeds. */
      explicit: ExplicitPin[];
    }
  | { success: false; failure: ResolutionFailure };

export interface ResolveOptions {
  signal?: AbortSignal;
}

export interface ResolverOptions {
  /** Used for name lookups; without it names are matched against the recent list only. */
  invoker?: OperationInvoker;
  logger?: Logger;
}

type ParamOutcome =
  | { value: unknown; source: ArgSource; pins?: ExplicitPin[] }
  | { failure: ResolutionFailure }
  | undefined;

function isEmpty(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "string" && value.trim() === "");
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function lookupDomain(lookup: NameLookup, slot: SlotRef | undefined): DomainName | undefined {
  return IDENTIFIER_SLOTS[lookup.idField]?.domain ?? slot?.domain;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readItems(payload: unknown, listField: string): Record<string, unknown>[] {
  const list = isRecord(payload) ? payload[listField] : payload;
  if (!Array.isArray(list)) return [];
  return list.filter(isRecord);
}

export class Resolver {
  private readonly invoker?: OperationInvoker;
  private readonly logger: Logger;

  constructor(
    private readonly store: ContextStore,
    private readonly registry: OperationRegistry,
    private readonly harvester: Harvester,
    options: ResolverOptions = {},
  ) {
    this.invoker = options.invoker;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve the arguments of one operation.
   *
   * Unknown operations pass their arguments through; empty identifier-shaped
   * arguments are filled from the store by exact name.
   */
  async resolve(
    operation: string,
    partialArgs: Record<string, unknown>,
    options: ResolveOptions = {},
  ): Promise<ResolveResult> {
    const descriptor = this.registry.get(operation);
    if (!descriptor) {
      return this.passThrough(partialArgs);
    }

    const args: Record<string, unknown> = {};
    const sources: Record<string, ArgSource> = {};
    const explicit: ExplicitPin[] = [];
    const declared = new Set(descriptor.params.map(param => param.name));
    const nameArgs = new Set(
      descriptor.params.flatMap(param => (param.lookup ? [param.lookup.nameArg] : [])),
    );

    for (const [key, value] of Object.entries(partialArgs)) {
      if (!declared.has(key) && !nameArgs.has(key) && !isEmpty(value)) {
        args[key] = value;
        sources[key] = "explicit";
      }
    }

    for (const param of descriptor.params) {
      const outcome = await this.resolveParam(descriptor, param, partialArgs, options);
      if (outcome === undefined) {
        if (param.required) {
          return {
            success: false,
            failure: {
              kind: "MissingContext",
              operation,
              parameter: param.name,
              domain: param.context ? parseSlotRef(param.context)?.domain : undefined,
            },
          };
        }
        continue;
      }
      if ("failure" in outcome) {
        return { success: false, failure: outcome.failure };
      }

      args[param.name] = outcome.value;
      sources[param.name] = outcome.source;

      const slot = param.context ? parseSlotRef(param.context) : undefined;
      const value = toContextValue(outcome.value);
      if (slot && value !== undefined && outcome.source === "explicit") {
        explicit.push({ slot, value });
      }
      explicit.push(...(outcome.pins ?? []));
    }

    return { success: true, args, sources, explicit };
  }

  private async resolveParam(
    descriptor: OperationDescriptor,
    param: OperationParam,
    partialArgs: Record<string, unknown>,
    options: ResolveOptions,
  ): Promise<ParamOutcome> {
    const supplied = partialArgs[param.name];
    if (!isEmpty(supplied)) {
      return { value: supplied, source: "explicit" };
    }

    const slot = param.context ? parseSlotRef(param.context) : undefined;

    if (param.lookup) {
      const name = partialArgs[param.lookup.nameArg];
      if (typeof name === "string" && name.trim() !== "") {
        return this.lookupByName(descriptor.name, param, param.lookup, slot, name, options);
      }
    }

    if (slot) {
      const pinned = this.store.get(slot.domain, slot.field);
      if (pinned !== undefined) {
        return { value: pinned, source: "pinned" };
      }

      if (param.fallback === "recent" && this.followsCreate(slot.domain)) {
        const head = this.store.getRecent(slot.domain)[0];
        const recent = head?.[slot.field];
        if (recent !== undefined) {
          return { value: recent, source: "recent" };
        }
      }
    } else if (isIdentifierKey(param.name)) {
      const overflow = this.store.getOverflow(param.name);
      if (overflow !== undefined) {
        return { value: overflow, source: "overflow" };
      }
    }

    if (param.default !== undefined) {
      return { value: param.default, source: "default" };
    }
    return undefined;
  }

  /** True when the last committed operation created an item of the domain. */
  private followsCreate(domain: DomainName): boolean {
    const last = this.store.lastOperation();
    return last?.kind === "create" && last.domain === domain;
  }

  private async lookupByName(
    operation: string,
    param: OperationParam,
    lookup: NameLookup,
    slot: SlotRef | undefined,
    name: string,
    options: ResolveOptions,
  ): Promise<ParamOutcome> {
    const domain = lookupDomain(lookup, slot);
    const candidates = await this.listCandidates(lookup, domain, options);
    const wanted = normalizeName(name);
    const matches = candidates.filter(candidate => normalizeName(candidate.name) === wanted);

    if (matches.length === 0) {
      return { failure: { kind: "MissingContext", operation, parameter: param.name, domain, name } };
    }
    if (matches.length > 1) {
      return {
        failure: { kind: "Disambiguation", operation, parameter: param.name, name, domain, candidates: matches },
      };
    }

    const [match] = matches;
    // Pinned with the harvest of a successful call, not before.
    const pins: ExplicitPin[] = domain
      ? [
          { slot: { domain, field: "id" }, value: match.id },
          { slot: { domain, field: "name" }, value: match.name },
        ]
      : [];
    return { value: match.id, source: "lookup", pins };
  }

  /**
   * Candidates for a name lookup: the list operation's items, or the
   * domain's recent list when the list cannot be fetched.
   */
  private async listCandidates(
    lookup: NameLookup,
    domain: DomainName | undefined,
    options: ResolveOptions,
  ): Promise<Candidate[]> {
    if (this.invoker) {
      const listArgs = await this.resolve(lookup.operation, {}, options);
      if (listArgs.success) {
        const result = await this.invoker.invoke(lookup.operation, listArgs.args, { signal: options.signal });
        if (result.ok) {
          this.harvester.harvest(lookup.operation, result.payload, {
            domain,
            kind: this.registry.get(lookup.operation)?.kind,
          });
          return this.toCandidates(readItems(result.payload, lookup.listField), lookup.idField, lookup.nameField);
        }
        this.logger.warn("Name lookup failed, matching recent items", {
          operation: lookup.operation,
          code: result.error.code,
        });
      }
    }

    if (!domain) return [];
    return this.toCandidates(this.store.getRecent(domain), "id", "name");
  }

  private toCandidates(
    items: ReadonlyArray<Record<string, unknown> | RecentItem>,
    idField: string,
    nameField: string,
  ): Candidate[] {
    const candidates: Candidate[] = [];
    for (const item of items) {
      const id = toContextValue(item[idField]);
      const name = item[nameField];
      if (id === undefined || typeof name !== "string") continue;
      if (candidates.some(existing => sameValue(existing.id, id))) continue;
      candidates.push({ id, name });
    }
    return candidates;
  }

  private passThrough(partialArgs: Record<string, unknown>): ResolveResult {
    const args: Record<string, unknown> = {};
    const sources: Record<string, ArgSource> = {};

    for (const [key, value] of Object.entries(partialArgs)) {
      if (!isEmpty(value)) {
        args[key] = value;
        sources[key] = "explicit";
        continue;
      }
      if (!isIdentifierKey(key)) continue;

      const slot = IDENTIFIER_SLOTS[key];
      const stored: ContextValue | undefined = slot
        ? this.store.get(slot.domain, slot.field)
        : this.store.getOverflow(key);
      if (stored !== undefined) {
        args[key] = stored;
        sources[key] = slot ? "pinned" : "overflow";
      }
    }

    return { success: true, args, sources, explicit: [] };
  }
}
