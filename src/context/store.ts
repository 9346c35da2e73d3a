/**
 * Context Store — versioned, namespaced key/value state for one session.
 *
 * Each domain holds a pinned record (the current identifiers used as
 * defaults), a most-recent-first list of previously seen items, and for
 * long-running domains a status slot. Identifier-shaped keys without a
 * domain go to the overflow bucket; every harvested identifier is mirrored
 * into `last.id`.
 *
 * Mutations are applied through transactions: a transaction works on a
 * draft copy and is swapped in whole on commit, bumping `revision` once.
 * A reader never observes a partially applied batch.
 */

import {
  STATUS_DOMAINS,
  sameValue,
  type ContextValue,
  type DomainName,
  type Provenance,
} from "./domains.js";

/** A pinned value with its provenance tag. */
export interface PinnedEntry {
  value: ContextValue;
  provenance: Provenance;
  updatedAt: string;
}

/** One entry of a domain's recent list: plain identifier/handle fields. */
export type RecentItem = Record<string, ContextValue>;

/** Normalized lifecycle of a long-running operation. */
export type LifecycleState = "in_progress" | "completed" | "failed" | "cancelled";

export interface StatusEntry {
  state: LifecycleState;
  /** Status string as the platform reported it. */
  detail?: string;
  updatedAt: string;
}

export interface DomainState {
  pinned: Record<string, PinnedEntry>;
  recent: RecentItem[];
  status?: StatusEntry;
}

/** The last identifier harvested, whatever its kind. */
export interface LastIdentifier {
  key: string;
  value: ContextValue;
}

/** The last operation whose result was committed to the store. */
export interface LastOperation {
  name: string;
  domain?: DomainName;
  kind?: string;
}

/** Full store contents; also the serialized snapshot shape. */
export interface ContextState {
  revision: number;
  domains: Record<DomainName, DomainState>;
  overflow: Record<string, ContextValue>;
  lastId?: LastIdentifier;
  lastOperation?: LastOperation;
}

export interface ContextStoreOptions {
  /** Cap on each domain's recent list (default: 25). */
  maxRecent?: number;
  /** Clock used for timestamps. */
  now?: () => Date;
}

export interface ClearOptions {
  /** Only drop these pinned fields. Omit to drop the whole pinned record. */
  fields?: string[];
  /** Also drop the recent list. Pinned clears leave it untouched otherwise. */
  recent?: boolean;
  /** Also drop the status slot. */
  status?: boolean;
}

const DEFAULT_MAX_RECENT = 25;

function emptyDomain(): DomainState {
  return { pinned: {}, recent: [] };
}

export function emptyContextState(): ContextState {
  return {
    revision: 0,
    domains: {
      project: emptyDomain(),
      compile: emptyDomain(),
      backtest: emptyDomain(),
      optimization: emptyDomain(),
      live: emptyDomain(),
      file: emptyDomain(),
      object: emptyDomain(),
      ai: emptyDomain(),
      server: emptyDomain(),
      lean: emptyDomain(),
    },
    overflow: {},
  };
}

/** Identity of a recent item: its id, falling back to its handles. */
export function recentIdentity(item: RecentItem): ContextValue | undefined {
  return item["id"] ?? item["name"] ?? item["key"] ?? item["path"];
}

function sameItem(a: RecentItem, b: RecentItem): boolean {
  return sameValue(recentIdentity(a), recentIdentity(b));
}

/**
 * Mutation handle passed to {@link ContextStore.transact}.
 * Reads through the transaction see its own uncommitted writes.
 */
export class ContextTransaction {
  private dirty = false;

  constructor(
    private readonly draft: ContextState,
    private readonly maxRecent: number,
    private readonly timestamp: string,
  ) {}

  get changed(): boolean {
    return this.dirty;
  }

  get(domain: DomainName, field: string): ContextValue | undefined {
    return this.draft.domains[domain].pinned[field]?.value;
  }

  getSlot(domain: DomainName, field: string): PinnedEntry | undefined {
    return this.draft.domains[domain].pinned[field];
  }

  getRecent(domain: DomainName): readonly RecentItem[] {
    return this.draft.domains[domain].recent;
  }

  set(domain: DomainName, field: string, value: ContextValue, provenance: Provenance = "inferred"): void {
    this.draft.domains[domain].pinned[field] = { value, provenance, updatedAt: this.timestamp };
    this.dirty = true;
  }

  /** Prepend an item, moving an existing entry with the same identity to the front. */
  pushRecent(domain: DomainName, item: RecentItem): void {
    if (recentIdentity(item) === undefined) return;
    const state = this.draft.domains[domain];
    const previous = state.recent.find(existing => sameItem(existing, item));
    const merged = previous ? { ...previous, ...item } : { ...item };
    state.recent = [merged, ...state.recent.filter(existing => !sameItem(existing, item))]
      .slice(0, this.maxRecent);
    this.dirty = true;
  }

  /**
   * Replace the head of the recent list with a server-ordered list.
   * Earlier entries not present in the new list are kept behind it.
   */
  mergeRecent(domain: DomainName, items: RecentItem[]): void {
    const usable = items.filter(item => recentIdentity(item) !== undefined);
    if (usable.length === 0) return;
    const state = this.draft.domains[domain];
    const rest = state.recent.filter(existing => !usable.some(item => sameItem(existing, item)));
    state.recent = [...usable.map(item => ({ ...item })), ...rest].slice(0, this.maxRecent);
    this.dirty = true;
  }

  /** Insert an item directly behind the head unless it is already listed. */
  retainRecent(domain: DomainName, item: RecentItem): void {
    const state = this.draft.domains[domain];
    if (recentIdentity(item) === undefined) return;
    if (state.recent.some(existing => sameItem(existing, item))) return;
    state.recent = [...state.recent.slice(0, 1), { ...item }, ...state.recent.slice(1)]
      .slice(0, this.maxRecent);
    this.dirty = true;
  }

  removeRecent(domain: DomainName, predicate: (item: RecentItem) => boolean): void {
    const state = this.draft.domains[domain];
    const kept = state.recent.filter(item => !predicate(item));
    if (kept.length !== state.recent.length) {
      state.recent = kept;
      this.dirty = true;
    }
  }

  clear(domain: DomainName, options: ClearOptions = {}): void {
    const state = this.draft.domains[domain];
    if (options.fields) {
      for (const field of options.fields) {
        if (field in state.pinned) {
          delete state.pinned[field];
          this.dirty = true;
        }
      }
    } else if (Object.keys(state.pinned).length > 0) {
      state.pinned = {};
      this.dirty = true;
    }
    if (options.recent && state.recent.length > 0) {
      state.recent = [];
      this.dirty = true;
    }
    if (options.status && state.status) {
      delete state.status;
      this.dirty = true;
    }
  }

  setStatus(domain: DomainName, state: LifecycleState, detail?: string): void {
    if (!STATUS_DOMAINS.includes(domain)) return;
    this.draft.domains[domain].status = { state, detail, updatedAt: this.timestamp };
    this.dirty = true;
  }

  setOverflow(key: string, value: ContextValue): void {
    this.draft.overflow[key] = value;
    this.dirty = true;
  }

  setLastId(key: string, value: ContextValue): void {
    this.draft.lastId = { key, value };
    this.dirty = true;
  }

  setLastOperation(operation: LastOperation): void {
    this.draft.lastOperation = { ...operation };
    this.dirty = true;
  }
}

/**
 * Session context store.
 *
 * Reads of absent data return `undefined`, never a placeholder, so an
 * absent slot is distinguishable from a stored `""` or `0`.
 */
export class ContextStore {
  private state: ContextState;
  private readonly maxRecent: number;
  private readonly now: () => Date;

  constructor(options: ContextStoreOptions = {}, initial?: ContextState) {
    this.maxRecent = options.maxRecent ?? DEFAULT_MAX_RECENT;
    this.now = options.now ?? (() => new Date());
    this.state = initial ? structuredClone(initial) : emptyContextState();
  }

  /** Rebuild a store from a snapshot taken with {@link snapshot}. */
  static fromSnapshot(snapshot: ContextState, options: ContextStoreOptions = {}): ContextStore {
    return new ContextStore(options, snapshot);
  }

  /** Number of committed transactions that changed the store. */
  get revision(): number {
    return this.state.revision;
  }

  get(domain: DomainName, field: string): ContextValue | undefined {
    return this.state.domains[domain].pinned[field]?.value;
  }

  getSlot(domain: DomainName, field: string): PinnedEntry | undefined {
    const entry = this.state.domains[domain].pinned[field];
    return entry ? { ...entry } : undefined;
  }

  getPinned(domain: DomainName): Record<string, ContextValue> {
    const pinned: Record<string, ContextValue> = {};
    for (const [field, entry] of Object.entries(this.state.domains[domain].pinned)) {
      pinned[field] = entry.value;
    }
    return pinned;
  }

  getRecent(domain: DomainName): RecentItem[] {
    return this.state.domains[domain].recent.map(item => ({ ...item }));
  }

  getStatus(domain: DomainName): StatusEntry | undefined {
    const status = this.state.domains[domain].status;
    return status ? { ...status } : undefined;
  }

  getOverflow(key: string): ContextValue | undefined {
    return this.state.overflow[key];
  }

  lastId(): LastIdentifier | undefined {
    return this.state.lastId ? { ...this.state.lastId } : undefined;
  }

  lastOperation(): LastOperation | undefined {
    return this.state.lastOperation ? { ...this.state.lastOperation } : undefined;
  }

  set(domain: DomainName, field: string, value: ContextValue, provenance: Provenance = "inferred"): void {
    this.transact(tx => tx.set(domain, field, value, provenance));
  }

  pushRecent(domain: DomainName, item: RecentItem): void {
    this.transact(tx => tx.pushRecent(domain, item));
  }

  clear(domain: DomainName, options: ClearOptions = {}): void {
    this.transact(tx => tx.clear(domain, options));
  }

  setStatus(domain: DomainName, state: LifecycleState, detail?: string): void {
    this.transact(tx => tx.setStatus(domain, state, detail));
  }

  /**
   * Apply a batch of mutations atomically.
   *
   * The callback works on a draft; if it throws, the store is left untouched.
   * The revision advances once, and only when something changed.
   */
  transact<T>(fn: (tx: ContextTransaction) => T): T {
    const draft = structuredClone(this.state);
    const tx = new ContextTransaction(draft, this.maxRecent, this.now().toISOString());
    const result = fn(tx);
    if (tx.changed) {
      draft.revision = this.state.revision + 1;
      this.state = draft;
    }
    return result;
  }

  /** Serializable copy of the full store contents. */
  snapshot(): ContextState {
    return structuredClone(this.state);
  }
}
