/**
 * Trading session — composition root for one conversation.
 *
 * A request runs resolve → invoke → harvest → reset under the session lock,
 * so the harvest of request N is committed before request N+1 resolves.
 * Long-running operations are then handed to the supervisor and polled
 * outside the lock.
 */

import type { ContextValue, DomainName } from "../context/domains.js";
import { ContextStore, type ClearOptions, type StatusEntry } from "../context/store.js";
import { Harvester } from "../harvest/harvester.js";
import { Resolver, type ArgSource } from "../resolve/resolver.js";
import { describeFailure, type SessionFailure } from "../resolve/failures.js";
import { ResetPolicy } from "../reset/policy.js";
import {
  OperationSupervisor,
  type PendingOperation,
  type SupervisorOptions,
  type SupervisedHandle,
} from "../supervisor/supervisor.js";
import type { OperationRegistry } from "../registry/catalog.js";
import type { OperationInvoker } from "../transport/invoker.js";
import { silentLogger, type Logger } from "../logging/console.js";

export interface TradingSessionOptions {
  registry: OperationRegistry;
  invoker: OperationInvoker;
  supervisor: SupervisorOptions;
  /** Restored store; a fresh one is created otherwise. */
  store?: ContextStore;
  logger?: Logger;
  /** Called after every committed request, e.g. to persist a snapshot. */
  onCommit?: (store: ContextStore) => Promise<void>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Wait for long-running operations to finish (default: true). */
  wait?: boolean;
}

export interface ExecuteSuccess {
  success: true;
  operation: string;
  args: Record<string, unknown>;
  sources: Record<string, ArgSource>;
  payload: unknown;
  /** Lifecycle of a long-running operation. */
  status?: StatusEntry;
  /** Id of a pending supervised operation when not waiting. */
  pendingId?: string;
  attempts?: number;
}

export interface ExecuteFailure {
  success: false;
  operation: string;
  failure: SessionFailure;
  /** The single question or statement to put to the user. */
  question: string;
}

export type ExecuteOutcome = ExecuteSuccess | ExecuteFailure;

interface Committed {
  outcome: ExecuteOutcome;
  handle?: SupervisedHandle;
  domain?: DomainName;
}

export class TradingSession {
  readonly store: ContextStore;
  readonly harvester: Harvester;
  readonly resolver: Resolver;
  readonly resetPolicy: ResetPolicy;
  readonly supervisor: OperationSupervisor;
  private readonly registry: OperationRegistry;
  private readonly invoker: OperationInvoker;
  private readonly logger: Logger;
  private readonly onCommit?: (store: ContextStore) => Promise<void>;
  private lock?: Promise<void>;

  constructor(options: TradingSessionOptions) {
    this.registry = options.registry;
    this.invoker = options.invoker;
    this.logger = options.logger ?? silentLogger;
    this.onCommit = options.onCommit;
    this.store = options.store ?? new ContextStore();
    this.harvester = new Harvester(this.store);
    this.resolver = new Resolver(this.store, this.registry, this.harvester, {
      invoker: this.invoker,
      logger: this.logger,
    });
    this.resetPolicy = new ResetPolicy(this.store);
    this.supervisor = new OperationSupervisor(
      this.store,
      this.registry,
      this.resolver,
      this.harvester,
      this.invoker,
      { ...options.supervisor, logger: options.supervisor.logger ?? this.logger },
    );
  }

  /**
   * Run one operation with a partial argument set.
   */
  async execute(
    operation: string,
    args: Record<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<ExecuteOutcome> {
    const committed = await this.withLock(() => this.commit(operation, args, options));
    await this.persist();

    const { outcome, handle, domain } = committed;
    if (!handle || !outcome.success) {
      return outcome;
    }
    if (options.wait === false) {
      void this.settleInBackground(operation, handle);
      return outcome;
    }

    const supervised = await handle.outcome;
    await this.persist();
    if (supervised.kind === "failure") {
      return this.fail(operation, supervised.failure);
    }
    return {
      ...outcome,
      payload: supervised.payload,
      status: domain ? this.store.getStatus(domain) : undefined,
      pendingId: undefined,
      attempts: supervised.attempts,
    };
  }

  /** Explicit user override of one context slot. */
  async pin(domain: DomainName, field: string, value: ContextValue): Promise<void> {
    await this.withLock(async () => {
      this.harvester.pin(domain, { [field]: value });
    });
    await this.persist();
  }

  async clear(domain: DomainName, options: ClearOptions = {}): Promise<void> {
    await this.withLock(async () => {
      this.resetPolicy.clear(domain, options);
    });
    await this.persist();
  }

  pending(): PendingOperation[] {
    return this.supervisor.pending();
  }

  cancel(id: string): boolean {
    return this.supervisor.cancel(id);
  }

  private async commit(
    operation: string,
    partialArgs: Record<string, unknown>,
    options: ExecuteOptions,
  ): Promise<Committed> {
    const descriptor = this.registry.get(operation);
    const domain = descriptor?.domain;

    const resolved = await this.resolver.resolve(operation, partialArgs, { signal: options.signal });
    if (!resolved.success) {
      return { outcome: this.fail(operation, resolved.failure) };
    }

    const result = await this.invoker.invoke(operation, resolved.args, { signal: options.signal });
    if (!result.ok) {
      return {
        outcome: this.fail(operation, {
          kind: "InvocationError",
          operation,
          domain,
          code: result.error.code,
          message: result.error.message,
          hint: result.error.hint ?? "",
          status: result.error.status,
        }),
      };
    }

    const report = this.harvester.harvest(operation, result.payload, {
      domain,
      kind: descriptor?.kind,
      explicit: resolved.explicit,
    });
    this.resetPolicy.onOperationCompleted(operation, { domain, args: resolved.args, report });

    const outcome: ExecuteSuccess = {
      success: true,
      operation,
      args: resolved.args,
      sources: resolved.sources,
      payload: result.payload,
    };

    const longRunning = descriptor?.longRunning;
    if (!descriptor || !longRunning) {
      this.logger.info("Operation completed", { operation, revision: this.store.revision });
      return { outcome };
    }

    const state = this.supervisor.record(descriptor, result.payload);
    outcome.status = this.store.getStatus(longRunning.domain);
    if (state !== "in_progress") {
      outcome.attempts = 1;
      return { outcome, domain: longRunning.domain };
    }

    const handle = this.supervisor.track(descriptor, { args: resolved.args, payload: result.payload }, {
      signal: options.signal,
    });
    outcome.pendingId = handle.id;
    this.logger.info("Supervising long-running operation", { operation, id: handle.id });
    return { outcome, handle, domain: longRunning.domain };
  }

  /** Persist the final status of an operation nobody is waiting on. */
  private async settleInBackground(operation: string, handle: SupervisedHandle): Promise<void> {
    try {
      const supervised = await handle.outcome;
      if (supervised.kind === "failure") {
        this.logger.warn("Background operation did not complete", { operation, kind: supervised.failure.kind });
      }
    } catch (err) {
      this.logger.error("Background operation failed", {
        operation,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    await this.persist();
  }

  private fail(operation: string, failure: SessionFailure): ExecuteFailure {
    this.logger.warn("Operation did not complete", { operation, kind: failure.kind });
    return { success: false, operation, failure, question: describeFailure(failure) };
  }

  /** Serialize store-changing work; only one request holds the lock. */
  private async withLock<T>(task: () => Promise<T>): Promise<T> {
    while (this.lock) {
      await this.lock;
    }

    let release: () => void = () => {};
    this.lock = new Promise<void>(resolve => {
      release = resolve;
    });

    try {
      return await task();
    } finally {
      this.lock = undefined;
      release();
    }
  }

  private async persist(): Promise<void> {
    if (!this.onCommit) return;
    try {
      await this.onCommit(this.store);
    } catch (err) {
      this.logger.error("Failed to persist session context", {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}
