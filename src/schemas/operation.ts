/**
 * Operation catalog schema — remote operations described as data.
 *
 * Each entry declares the endpoint, the parameter list, and how parameters
 * map onto session context. Adding an operation is a catalog entry, not a
 * code path.
 */

import { z } from "zod";
import { DOMAINS } from "../context/domains.js";

export const DomainNameSchema = z.enum(DOMAINS);

export const ParamType = z.enum(["string", "number", "integer", "boolean", "object", "array"]);
export type ParamType = z.infer<typeof ParamType>;

/** Lookup of an identifier by a human-readable name through a list operation. */
export const NameLookup = z.object({
  /** Argument carrying the name, e.g. `projectName`. */
  nameArg: z.string().min(1),
  /** List operation returning the candidates. */
  operation: z.string().min(1),
  /** Key under which the candidates are listed (e.g. `projects`). */
  listField: z.string().min(1),
  /** Identifier key on each candidate. */
  idField: z.string().min(1),
  /** Name key on each candidate. */
  nameField: z.string().min(1).default("name"),
});
export type NameLookup = z.infer<typeof NameLookup>;

export const OperationParam = z.object({
  name: z.string().min(1),
  type: ParamType.default("string"),
  required: z.boolean().default(false),
  description: z.string().default(""),
  /** Context slot supplying the default, as `domain.field` (e.g. `project.id`). */
  context: z.string().regex(/^[a-z]+\.[A-Za-z]+$/).optional(),
  lookup: NameLookup.optional(),
  /** Allow the most recent item of the domain as a last resort. */
  fallback: z.literal("recent").optional(),
  default: z.unknown().optional(),
});
export type OperationParam = z.infer<typeof OperationParam>;

/** Mapping from platform status strings to lifecycle states. */
export const StatusRules = z.object({
  /** Dot paths probed in order for the status string. */
  fields: z.array(z.string().min(1)).min(1),
  /** Dot path of a boolean that marks completion. */
  completedFlag: z.string().optional(),
  completed: z.array(z.string()).default([]),
  failed: z.array(z.string()).default([]),
  cancelled: z.array(z.string()).default([]),
});
export type StatusRules = z.infer<typeof StatusRules>;

export const LongRunning = z.object({
  domain: DomainNameSchema,
  /** Operation polled for progress; defaults to the operation itself. */
  poll: z.string().optional(),
  /** Poll arguments copied from the initial call's arguments or result. */
  carry: z.array(z.string()).default([]),
  status: StatusRules,
});
export type LongRunning = z.infer<typeof LongRunning>;

export const OperationKind = z.enum([
  "create",
  "read",
  "list",
  "update",
  "delete",
  "stop",
  "liquidate",
  "abort",
  "action",
]);
export type OperationKind = z.infer<typeof OperationKind>;

export const OperationDescriptor = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/),
  title: z.string().min(1),
  description: z.string().default(""),
  /** Platform endpoint path; absent for operations served locally. */
  endpoint: z.string().startsWith("/").optional(),
  domain: DomainNameSchema.optional(),
  kind: OperationKind.default("action"),
  readOnly: z.boolean().default(false),
  /** Stamp the request with the configured `codeSourceId`. */
  codeSource: z.boolean().default(false),
  encoding: z.enum(["json", "multipart"]).default("json"),
  timeoutMs: z.number().int().positive().optional(),
  params: z.array(OperationParam).default([]),
  longRunning: LongRunning.optional(),
});
export type OperationDescriptor = z.infer<typeof OperationDescriptor>;

export const OperationCatalog = z.object({
  version: z.literal(1),
  operations: z.array(OperationDescriptor),
});
export type OperationCatalog = z.infer<typeof OperationCatalog>;
