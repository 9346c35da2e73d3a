/**
 * Persisted session context snapshot.
 */

import { z } from "zod";
import { DOMAINS } from "../context/domains.js";

const ContextValue = z.union([z.string(), z.number()]);

const PinnedEntry = z.object({
  value: ContextValue,
  provenance: z.enum(["explicit", "inferred"]),
  updatedAt: z.string(),
});

const StatusEntry = z.object({
  state: z.enum(["in_progress", "completed", "failed", "cancelled"]),
  detail: z.string().optional(),
  updatedAt: z.string(),
});

const DomainState = z.object({
  pinned: z.record(z.string(), PinnedEntry).default({}),
  recent: z.array(z.record(z.string(), ContextValue)).default([]),
  status: StatusEntry.optional(),
});

const emptyDomain = { pinned: {}, recent: [] };

export const ContextStateSchema = z.object({
  revision: z.number().int().nonnegative(),
  domains: z.object({
    project: DomainState.default(emptyDomain),
    compile: DomainState.default(emptyDomain),
    backtest: DomainState.default(emptyDomain),
    optimization: DomainState.default(emptyDomain),
    live: DomainState.default(emptyDomain),
    file: DomainState.default(emptyDomain),
    object: DomainState.default(emptyDomain),
    ai: DomainState.default(emptyDomain),
    server: DomainState.default(emptyDomain),
    lean: DomainState.default(emptyDomain),
  }),
  overflow: z.record(z.string(), ContextValue).default({}),
  lastId: z.object({ key: z.string(), value: ContextValue }).optional(),
  lastOperation: z.object({
    name: z.string(),
    domain: z.enum(DOMAINS).optional(),
    kind: z.string().optional(),
  }).optional(),
});

export const SessionSnapshot = z.object({
  version: z.literal(1),
  savedAt: z.string(),
  state: ContextStateSchema,
});
export type SessionSnapshot = z.infer<typeof SessionSnapshot>;
