/**
 * Reset Policy — narrows the session context when top-level resources are
 * created or destroyed.
 *
 * Triggers are a static table keyed by operation name. Every rule is
 * idempotent: running the same trigger twice leaves the same store as
 * running it once. Rules never throw.
 */

import {
  PROJECT_SCOPED_DOMAINS,
  sameValue,
  toContextValue,
  type ContextValue,
  type DomainName,
} from "../context/domains.js";
import type { ClearOptions, ContextStore, ContextTransaction } from "../context/store.js";
import type { HarvestReport } from "../harvest/harvester.js";

export interface CompletedOperation {
  /** Domain the operation worked on. */
  domain?: DomainName;
  /** Arguments the operation was invoked with. */
  args: Record<string, unknown>;
  /** What the harvest of its result changed. */
  report?: HarvestReport;
}

type ResetRule = (tx: ContextTransaction, completed: CompletedOperation) => void;

/** Pinned slots only; recent lists survive. */
function clearPinned(...domains: DomainName[]): ResetRule {
  return tx => {
    for (const domain of domains) tx.clear(domain);
  };
}

function clearFields(domain: DomainName, ...fields: string[]): ResetRule {
  return tx => tx.clear(domain, { fields });
}

/** The project the operation targeted: its argument, else the pinned one. */
function targetProject(tx: ContextTransaction, args: Record<string, unknown>): ContextValue | undefined {
  return toContextValue(args["projectId"]) ?? tx.get("project", "id");
}

const deleteProject: ResetRule = (tx, { args }) => {
  const projectId = targetProject(tx, args);
  if (projectId === undefined) return;

  const isPinnedProject = sameValue(tx.get("project", "id"), projectId);
  for (const domain of PROJECT_SCOPED_DOMAINS) {
    const owner = tx.get(domain, "projectId");
    if (owner === undefined ? isPinnedProject : sameValue(owner, projectId)) {
      tx.clear(domain);
    }
    tx.removeRecent(domain, item => sameValue(item["projectId"], projectId));
  }
  if (isPinnedProject) {
    tx.clear("project");
  }
  tx.removeRecent("project", item => sameValue(item["id"], projectId));
};

/** The harvest already pinned the new deployment; keep the one it replaced. */
const createLive: ResetRule = (tx, { report }) => {
  const replaced = report?.changes.find(
    change => change.domain === "live" && change.field === "id" && change.previous !== undefined,
  );
  const previous = replaced?.previous;
  if (previous === undefined) return;
  tx.retainRecent("live", { id: previous });
};

const noop: ResetRule = () => {};

const RESET_RULES: Readonly<Record<string, ResetRule>> = {
  create_project: clearPinned("compile", "backtest", "optimization"),
  delete_project: deleteProject,
  create_compile: noop,
  create_backtest: noop,
  create_optimization: noop,
  create_live_algorithm: createLive,
  stop_live_algorithm: clearFields("live", "id"),
  liquidate_live_algorithm: clearFields("live", "id"),
  abort_optimization: clearPinned("optimization"),
  delete_backtest: clearPinned("backtest"),
  delete_optimization: clearPinned("optimization"),
  delete_file: clearPinned("file"),
  delete_object: clearPinned("object"),
};

export class ResetPolicy {
  constructor(private readonly store: ContextStore) {}

  /** Operations that trigger a reset. */
  triggers(): string[] {
    return Object.keys(RESET_RULES);
  }

  /**
   * Apply the reset rule for a completed operation, if it has one.
   *
   * @returns Whether a rule exists for the operation
   */
  onOperationCompleted(operation: string, completed: CompletedOperation = { args: {} }): boolean {
    const rule = RESET_RULES[operation];
    if (!rule) return false;
    this.store.transact(tx => rule(tx, completed));
    return true;
  }

  /** Explicit clear requested by the user. */
  clear(domain: DomainName, options: ClearOptions = {}): void {
    this.store.clear(domain, options);
  }
}
