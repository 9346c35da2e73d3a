/**
 * Config manager — loads, validates and queries session configuration.
 *
 * Sources, lowest precedence first: schema defaults, the YAML config file,
 * environment variables.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { SessionConfig } from "../schemas/config.js";

export type Env = Record<string, string | undefined>;

export interface ConfigIssue {
  path: string;
  message: string;
}

/** Environment variables and the config path each one sets. */
const ENV_OVERRIDES: ReadonlyArray<{ name: string; path: string[]; parse?: (raw: string) => unknown }> = [
  { name: "QUANTCONNECT_USER_ID", path: ["api", "userId"] },
  { name: "QUANTCONNECT_API_TOKEN", path: ["api", "apiToken"] },
  { name: "QUANTCONNECT_API_URL", path: ["api", "baseUrl"] },
  { name: "AGENT_NAME", path: ["agentName"] },
  { name: "MCP_STRUCTURED_LOGS", path: ["logging", "structured"], parse: raw => raw === "1" || raw.toLowerCase() === "true" },
  { name: "TRADING_SESSION_SNAPSHOT", path: ["context", "snapshotPath"] },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(configPath, "utf-8");
  } catch (err) {
    throw new Error(`Failed to read config file: ${configPath}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new Error(`Invalid YAML in config file: ${configPath}`, { cause: err });
  }
  if (raw === null || raw === undefined) return {};
  if (!isRecord(raw)) {
    throw new Error(`Config file must contain a mapping: ${configPath}`);
  }
  return raw;
}

function setKeyPath(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj;
  for (const part of path.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  const last = path[path.length - 1];
  if (last !== undefined) current[last] = value;
}

/** Overlay recognized environment variables onto raw config. */
export function applyEnv(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const merged = structuredClone(raw);
  for (const override of ENV_OVERRIDES) {
    const value = env[override.name];
    if (value === undefined || value === "") continue;
    setKeyPath(merged, override.path, override.parse ? override.parse(value) : value);
  }
  return merged;
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): ConfigIssue[] {
  return issues.map(i => ({ path: i.path.join("."), message: i.message }));
}

/**
 * Load the session configuration.
 *
 * @param configPath - Optional YAML file
 * @throws Error listing schema violations
 */
export async function loadConfig(configPath?: string, env: Env = process.env): Promise<SessionConfig> {
  const raw = configPath ? await readConfigFile(configPath) : {};
  const result = SessionConfig.safeParse(applyEnv(raw, env));
  if (!result.success) {
    const detail = formatIssues(result.error.issues)
      .map(issue => `${issue.path}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

/**
 * Validate a config file against the schema, without environment overrides.
 */
export async function validateConfigFile(configPath: string): Promise<{ valid: boolean; issues: ConfigIssue[] }> {
  const raw = await readConfigFile(configPath);
  const result = SessionConfig.safeParse(raw);
  if (!result.success) {
    return { valid: false, issues: formatIssues(result.error.issues) };
  }
  return { valid: true, issues: [] };
}

/**
 * Get a value from a loaded config using a dot-notation path,
 * e.g. "supervisor.maxAttempts".
 */
export function getConfigValue(config: SessionConfig, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/** Credentials are only needed once a request reaches the platform. */
export function missingCredentials(config: SessionConfig): string[] {
  const missing: string[] = [];
  if (config.api.userId === "") missing.push("QUANTCONNECT_USER_ID");
  if (config.api.apiToken === "") missing.push("QUANTCONNECT_API_TOKEN");
  return missing;
}
