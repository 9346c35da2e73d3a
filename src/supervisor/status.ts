/**
 * Lifecycle classification of platform status strings.
 */

import type { LifecycleState } from "../context/store.js";
import type { StatusRules } from "../schemas/operation.js";

export interface Classified {
  state: LifecycleState;
  /** The status string as reported. */
  detail?: string;
}

/** `"Runtime Error"` → `"runtimeerror"`, `"Completed."` → `"completed"`. */
function normalize(status: string): string {
  return status.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function matches(status: string, tokens: readonly string[]): boolean {
  const normalized = normalize(status);
  return tokens.some(token => {
    const expected = normalize(token);
    return expected.length > 0 && normalized.startsWith(expected);
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/** Read a dot path (`optimizations.0.status`) from a payload. */
export function readPath(payload: unknown, path: string): unknown {
  let current: unknown = payload;
  for (const part of path.split(".")) {
    if (Array.isArray(current)) {
      const index = Number(part);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isRecord(current)) {
      current = current[part];
    } else {
      return undefined;
    }
  }
  return current;
}

/**
 * Classify a result payload. Unknown or missing statuses count as still in
 * progress; the supervisor's budget decides when to give up.
 */
export function classifyStatus(payload: unknown, rules: StatusRules): Classified {
  let detail: string | undefined;
  for (const field of rules.fields) {
    const value = readPath(payload, field);
    if (typeof value === "string" && value.trim() !== "") {
      detail = value.trim();
      break;
    }
  }

  if (detail !== undefined) {
    if (matches(detail, rules.failed)) return { state: "failed", detail };
    if (matches(detail, rules.cancelled)) return { state: "cancelled", detail };
    if (matches(detail, rules.completed)) return { state: "completed", detail };
  }
  if (rules.completedFlag && readPath(payload, rules.completedFlag) === true) {
    return { state: "completed", detail };
  }
  return { state: "in_progress", detail };
}
