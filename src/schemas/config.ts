/**
 * Session configuration schema.
 *
 * Config is an optional YAML file overlaid with environment variables;
 * every field has a default except the platform credentials.
 */

import { z } from "zod";

/** Platform API access. */
export const ApiConfig = z.object({
  /** API root; endpoints are appended to it. */
  baseUrl: z.string().url().default("https://www.quantconnect.com/api/v2"),
  userId: z.string().default(""),
  apiToken: z.string().default(""),
  /** Per-request timeout (ms). */
  timeoutMs: z.number().int().positive().default(30_000),
});
export type ApiConfig = z.infer<typeof ApiConfig>;

/** Polling of long-running operations. */
export const SupervisorConfig = z.object({
  initialIntervalMs: z.number().int().positive().default(2_000),
  maxIntervalMs: z.number().int().positive().default(30_000),
  multiplier: z.number().min(1).default(2),
  /** Total invocations, the initial call included. */
  maxAttempts: z.number().int().positive().default(30),
  /** Wall-clock budget (ms); unlimited when absent. */
  deadlineMs: z.number().int().positive().optional(),
}).refine(s => s.maxIntervalMs >= s.initialIntervalMs, {
  message: "maxIntervalMs must be at least initialIntervalMs",
  path: ["maxIntervalMs"],
});
export type SupervisorConfig = z.infer<typeof SupervisorConfig>;

export const ContextConfig = z.object({
  /** Cap on each domain's recent list. */
  maxRecent: z.number().int().positive().default(25),
  /** Persist the session context here between runs. */
  snapshotPath: z.string().optional(),
});
export type ContextConfig = z.infer<typeof ContextConfig>;

export const LoggingConfig = z.object({
  /** Log tool inputs and outputs as structured events. */
  structured: z.boolean().default(false),
  /** Directory for daily JSONL event files; stderr only when absent. */
  eventsDir: z.string().optional(),
});
export type LoggingConfig = z.infer<typeof LoggingConfig>;

/** Top-level session configuration. */
export const SessionConfig = z.object({
  api: ApiConfig.default({}),
  /** Stamped as `codeSourceId` on code-changing requests. */
  agentName: z.string().min(1).default("MCP Server"),
  supervisor: SupervisorConfig.default({}),
  context: ContextConfig.default({}),
  logging: LoggingConfig.default({}),
});
export type SessionConfig = z.infer<typeof SessionConfig>;
