/**
 * Tool result envelope shared by every MCP tool:
 * `{ success, error: { code, message, hint }, data }`.
 */

export interface ToolError {
  code: string;
  message: string;
  hint: string;
}

export type JsonValue = string | number | boolean | JsonValue[] | { [key: string]: JsonValue };

export interface ToolResult {
  success: boolean;
  error: ToolError;
  data: { [key: string]: JsonValue };
}

/**
 * Make a payload safe for clients that reject nulls: `null`/`undefined`
 * become `""`, dates become ISO strings, binary data becomes base64, sets
 * become arrays.
 */
export function sanitize(value: unknown): JsonValue {
  if (value === null || value === undefined) return "";
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : "";
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array) return Buffer.from(value).toString("base64");
  if (Array.isArray(value)) return value.map(sanitize);
  if (value instanceof Set) return [...value].map(sanitize);
  if (typeof value === "object") {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = sanitize(item);
    }
    return result;
  }
  return String(value);
}

/** Lists and scalars are wrapped under `wrapKey` so `data` is always an object. */
function toData(payload: unknown, wrapKey: string): { [key: string]: JsonValue } {
  const sanitized = sanitize(payload);
  if (typeof sanitized === "object" && !Array.isArray(sanitized)) return sanitized;
  return { [wrapKey]: sanitized };
}

export function successResult(payload: unknown, wrapKey = "result"): ToolResult {
  return {
    success: true,
    error: { code: "", message: "", hint: "" },
    data: toData(payload, wrapKey),
  };
}

export function errorResult(code: string, message: string, hint = "", data: unknown = {}): ToolResult {
  return {
    success: false,
    error: { code, message, hint },
    data: toData(data, "result"),
  };
}
