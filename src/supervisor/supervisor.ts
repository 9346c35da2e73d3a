/**
 * Operation Supervisor — polls long-running operations to a terminal state.
 *
 * The initial call is made by the caller and handed over with its result;
 * when that result is still in progress the supervisor polls the declared
 * poll operation on an exponential backoff schedule. Every poll result is
 * harvested and recorded in the domain's status slot. Each supervised
 * operation is an independent task; none of them holds the session lock.
 * Once the project or item being polled is no longer the pinned one, poll
 * results only refresh recent lists.
 */

import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";
import { sameValue, toContextValue, type ContextValue, type DomainName } from "../context/domains.js";
import type { ContextStore, LifecycleState } from "../context/store.js";
import type { Harvester } from "../harvest/harvester.js";
import type { Resolver } from "../resolve/resolver.js";
import type { Cancelled, InvocationError, ResolutionFailure, Timeout } from "../resolve/failures.js";
import type { OperationRegistry } from "../registry/catalog.js";
import type { LongRunning, OperationDescriptor } from "../schemas/operation.js";
import type { InvocationFault, OperationInvoker } from "../transport/invoker.js";
import { silentLogger, type Logger } from "../logging/console.js";
import { backoffDelay, type BackoffSchedule } from "./backoff.js";
import { classifyStatus, readPath } from "./status.js";

export interface SupervisorOptions extends BackoffSchedule {
  /** Total invocations allowed, the initial call included. */
  maxAttempts?: number;
  /** Wall-clock budget from the initial call, in ms. */
  deadlineMs?: number;
  /** Injectable for tests. */
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  now?: () => number;
  logger?: Logger;
}

export type TerminalState = Exclude<LifecycleState, "in_progress">;

export type SupervisedOutcome =
  | { kind: "terminal"; state: TerminalState; detail?: string; payload: unknown; attempts: number }
  | { kind: "failure"; failure: Timeout | Cancelled | InvocationError | ResolutionFailure; attempts: number };

/** Public view of a pending supervised operation. */
export interface PendingOperation {
  id: string;
  operation: string;
  domain: DomainName;
  attempts: number;
  state: LifecycleState;
  detail?: string;
  startedAt: string;
}

export interface SupervisedHandle {
  id: string;
  outcome: Promise<SupervisedOutcome>;
}

export interface InitialCall {
  args: Record<string, unknown>;
  payload: unknown;
}

/** Pins a poll result belongs to. */
interface PollScope {
  projectId?: ContextValue;
  id?: ContextValue;
}

interface Tracked {
  info: PendingOperation;
  controller: AbortController;
}

const DEFAULT_MAX_ATTEMPTS = 30;

function defaultSleep(ms: number, signal: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

/** Faults worth another poll rather than an immediate failure. */
function isTransient(fault: InvocationFault): boolean {
  return (fault.status !== undefined && fault.status >= 500) || fault.code === "api-request-error" || fault.code === "api-timeout";
}

function sameSlot(a: ContextValue | undefined, b: ContextValue | undefined): boolean {
  return a === undefined ? b === undefined : sameValue(a, b);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Find a carried value in the initial arguments or result: top level, one
 * nested object down, or the first element of a nested list.
 */
function findCarried(key: string, sources: unknown[]): unknown {
  for (const source of sources) {
    const direct = toContextValue(readPath(source, key));
    if (direct !== undefined) return direct;
    if (!isRecord(source)) continue;
    for (const nested of Object.values(source)) {
      const candidate = Array.isArray(nested) ? nested[0] : nested;
      const value = toContextValue(readPath(candidate, key));
      if (value !== undefined) return value;
    }
  }
  return undefined;
}

export class OperationSupervisor {
  private readonly tracked = new Map<string, Tracked>();
  private readonly schedule: BackoffSchedule;
  private readonly maxAttempts?: number;
  private readonly deadlineMs?: number;
  private readonly sleep: (ms: number, signal: AbortSignal) => Promise<void>;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(
    private readonly store: ContextStore,
    private readonly registry: OperationRegistry,
    private readonly resolver: Resolver,
    private readonly harvester: Harvester,
    private readonly invoker: OperationInvoker,
    options: SupervisorOptions,
  ) {
    this.schedule = {
      initialIntervalMs: options.initialIntervalMs,
      maxIntervalMs: options.maxIntervalMs,
      multiplier: options.multiplier,
    };
    this.deadlineMs = options.deadlineMs;
    this.maxAttempts = options.maxAttempts ?? (options.deadlineMs === undefined ? DEFAULT_MAX_ATTEMPTS : undefined);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Record the status of a long-running operation's initial result.
   *
   * @returns The lifecycle state of the result
   */
  record(descriptor: OperationDescriptor, payload: unknown): LifecycleState {
    const longRunning = descriptor.longRunning;
    if (!longRunning) return "completed";
    const { state, detail } = classifyStatus(payload, longRunning.status);
    this.store.setStatus(longRunning.domain, state, detail);
    return state;
  }

  /**
   * Supervise an operation whose initial call already returned. The initial
   * call counts as the first attempt.
   */
  track(descriptor: OperationDescriptor, initial: InitialCall, options: { signal?: AbortSignal } = {}): SupervisedHandle {
    const longRunning = descriptor.longRunning;
    if (!longRunning) {
      throw new Error(`Operation '${descriptor.name}' is not long-running`);
    }

    const id = randomUUID();
    const controller = new AbortController();
    const signal = options.signal ? AbortSignal.any([options.signal, controller.signal]) : controller.signal;
    const classified = classifyStatus(initial.payload, longRunning.status);
    const info: PendingOperation = {
      id,
      operation: descriptor.name,
      domain: longRunning.domain,
      attempts: 1,
      state: classified.state,
      detail: classified.detail,
      startedAt: new Date(this.now()).toISOString(),
    };
    this.tracked.set(id, { info, controller });

    const outcome = this.poll(descriptor, longRunning, initial, info, signal).finally(() => {
      this.tracked.delete(id);
    });
    return { id, outcome };
  }

  /** Stop waiting on a pending operation. Status already recorded stays. */
  cancel(id: string): boolean {
    const entry = this.tracked.get(id);
    if (!entry) return false;
    entry.controller.abort();
    return true;
  }

  pending(): PendingOperation[] {
    return [...this.tracked.values()].map(entry => ({ ...entry.info }));
  }

  private async poll(
    descriptor: OperationDescriptor,
    longRunning: LongRunning,
    initial: InitialCall,
    info: PendingOperation,
    signal: AbortSignal,
  ): Promise<SupervisedOutcome> {
    const domain = longRunning.domain;
    const started = this.now();
    // Taken before the first await, i.e. right after the initial call was committed.
    let scope = this.scopeOf(domain);
    let detached = false;
    let payload = initial.payload;
    let classified = classifyStatus(payload, longRunning.status);

    const pollName = longRunning.poll ?? descriptor.name;
    const pollKind = this.registry.get(pollName)?.kind;
    const carried: Record<string, unknown> = {};
    for (const key of longRunning.carry) {
      const value = findCarried(key, [initial.args, initial.payload]);
      if (value !== undefined) carried[key] = value;
    }

    for (;;) {
      const state = classified.state;
      if (state !== "in_progress") {
        this.logger.info("Long-running operation finished", {
          operation: descriptor.name,
          state,
          attempts: info.attempts,
        });
        return { kind: "terminal", state, detail: classified.detail, payload, attempts: info.attempts };
      }

      const attempts = info.attempts;
      if (this.maxAttempts !== undefined && attempts >= this.maxAttempts) {
        return this.timeout(descriptor, domain, attempts, classified.detail);
      }

      const wait = backoffDelay(this.schedule, attempts - 1);
      if (this.deadlineMs !== undefined && this.now() - started + wait > this.deadlineMs) {
        return this.timeout(descriptor, domain, attempts, classified.detail);
      }

      if (signal.aborted) {
        return this.cancelled(descriptor, domain, attempts);
      }
      try {
        await this.sleep(wait, signal);
      } catch (err) {
        if (signal.aborted) return this.cancelled(descriptor, domain, attempts);
        throw err;
      }
      if (signal.aborted) {
        return this.cancelled(descriptor, domain, attempts);
      }

      const resolved = await this.resolver.resolve(pollName, carried, { signal });
      if (!resolved.success) {
        return { kind: "failure", failure: resolved.failure, attempts };
      }

      info.attempts = attempts + 1;
      const result = await this.invoker.invoke(pollName, resolved.args, { signal });
      if (!result.ok) {
        if (signal.aborted) return this.cancelled(descriptor, domain, info.attempts);
        if (isTransient(result.error)) {
          this.logger.warn("Transient poll failure, retrying", { operation: pollName, code: result.error.code });
          continue;
        }
        return {
          kind: "failure",
          attempts: info.attempts,
          failure: {
            kind: "InvocationError",
            operation: pollName,
            domain,
            code: result.error.code,
            message: result.error.message,
            hint: result.error.hint ?? "",
            status: result.error.status,
          },
        };
      }

      payload = result.payload;
      classified = classifyStatus(payload, longRunning.status);
      if (!detached && !this.inScope(domain, scope)) {
        detached = true;
        this.logger.info("Context changed while polling; results only refresh recent items", {
          operation: descriptor.name,
          domain,
        });
      }
      this.harvester.harvest(pollName, payload, { domain, kind: pollKind, detached });
      if (!detached) scope = this.scopeOf(domain);
      this.store.setStatus(domain, classified.state, classified.detail);
      info.state = classified.state;
      info.detail = classified.detail;
    }
  }

  private scopeOf(domain: DomainName): PollScope {
    return { projectId: this.store.get("project", "id"), id: this.store.get(domain, "id") };
  }

  /** False once a reset or a newer pin replaced the project or item being polled. */
  private inScope(domain: DomainName, scope: PollScope): boolean {
    const current = this.scopeOf(domain);
    return sameSlot(current.projectId, scope.projectId) && sameSlot(current.id, scope.id);
  }

  private timeout(descriptor: OperationDescriptor, domain: DomainName, attempts: number, lastState?: string): SupervisedOutcome {
    this.logger.warn("Long-running operation timed out", { operation: descriptor.name, attempts });
    return { kind: "failure", attempts, failure: { kind: "Timeout", operation: descriptor.name, domain, attempts, lastState } };
  }

  private cancelled(descriptor: OperationDescriptor, domain: DomainName, attempts: number): SupervisedOutcome {
    return { kind: "failure", attempts, failure: { kind: "Cancelled", operation: descriptor.name, domain, attempts } };
  }
}
