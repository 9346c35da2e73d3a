/**
 * Failure outcomes of a session operation, and the single question each
 * one puts back to the user.
 */

import type { ContextValue, DomainName } from "../context/domains.js";

/** No explicit value and no safe default for a required parameter. */
export interface MissingContext {
  kind: "MissingContext";
  operation: string;
  parameter: string;
  domain?: DomainName;
  /** Name that was looked up without a match, if any. */
  name?: string;
}

export interface Candidate {
  id: ContextValue;
  name: string;
}

/** A name matched more than one entity. */
export interface Disambiguation {
  kind: "Disambiguation";
  operation: string;
  parameter: string;
  name: string;
  domain?: DomainName;
  candidates: Candidate[];
}

/** The remote call failed. */
export interface InvocationError {
  kind: "InvocationError";
  operation: string;
  domain?: DomainName;
  code: string;
  message: string;
  hint: string;
  status?: number;
}

/** Polling budget ran out before a terminal status. */
export interface Timeout {
  kind: "Timeout";
  operation: string;
  domain: DomainName;
  attempts: number;
  lastState?: string;
}

/** The caller stopped waiting. */
export interface Cancelled {
  kind: "Cancelled";
  operation: string;
  domain: DomainName;
  attempts: number;
}

export type ResolutionFailure = MissingContext | Disambiguation;
export type SessionFailure = ResolutionFailure | InvocationError | Timeout | Cancelled;

function article(domain: string): string {
  return /^[aeiou]/.test(domain) ? "an" : "a";
}

/**
 * Render a failure as one question or statement for the user.
 */
export function describeFailure(failure: SessionFailure): string {
  switch (failure.kind) {
    case "MissingContext": {
      if (failure.name !== undefined) {
        const what = failure.domain ?? "item";
        return `No ${what} named "${failure.name}" was found. Which ${what} did you mean for '${failure.parameter}'?`;
      }
      if (failure.domain) {
        return `Which ${failure.domain} should '${failure.operation}' use? Please provide '${failure.parameter}'.`;
      }
      return `Please provide '${failure.parameter}' for '${failure.operation}'.`;
    }
    case "Disambiguation": {
      const options = failure.candidates.map(c => `"${c.name}" (${c.id})`).join(", ");
      return `More than one ${failure.domain ?? "item"} is named "${failure.name}": ${options}. Which one should be used for '${failure.parameter}'?`;
    }
    case "InvocationError":
      return failure.hint.length > 0 ? `${failure.message} ${failure.hint}` : failure.message;
    case "Timeout":
      return `The ${failure.domain} is still running after ${failure.attempts} checks${failure.lastState ? ` (last status: ${failure.lastState})` : ""}. Check again later with the ${failure.domain} read tool.`;
    case "Cancelled":
      return `Stopped waiting for ${article(failure.domain)} ${failure.domain} after ${failure.attempts} checks; the remote job was not cancelled.`;
  }
}
