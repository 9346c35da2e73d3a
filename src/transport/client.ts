/**
 * Platform client — HTTP transport for catalog operations.
 *
 * Every operation is a POST to `<baseUrl><endpoint>` authenticated with the
 * platform's timestamped hash: `Authorization: Basic base64(userId:hash)`
 * where `hash = sha256("<apiToken>:<timestamp>")`, plus a `Timestamp`
 * header carrying the same Unix time.
 */

import { createHash } from "node:crypto";
import type { OperationRegistry } from "../registry/catalog.js";
import type { OperationDescriptor } from "../schemas/operation.js";
import type { InvocationFault, InvocationResult, InvokeOptions, OperationInvoker } from "./invoker.js";

export interface PlatformClientOptions {
  baseUrl: string;
  userId: string;
  apiToken: string;
  /** Per-request timeout unless the operation declares its own (ms). */
  timeoutMs: number;
  /** Stamped as `codeSourceId` on operations that declare `codeSource`. */
  agentName: string;
  /** Seconds since epoch; injectable for tests. */
  now?: () => number;
}

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Build the platform's authentication headers. */
export function authHeaders(userId: string, apiToken: string, timestamp: number): Record<string, string> {
  const hash = createHash("sha256").update(`${apiToken}:${timestamp}`).digest("hex");
  const credentials = Buffer.from(`${userId}:${hash}`).toString("base64");
  return {
    "Authorization": `Basic ${credentials}`,
    "Timestamp": String(timestamp),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Pull a readable message out of an error body. */
function errorDetail(body: unknown): string {
  if (!isRecord(body)) return "";
  for (const key of ["message", "error", "errors", "details"]) {
    const value = body[key];
    if (typeof value === "string" && value !== "") return value;
    if (Array.isArray(value) && value.length > 0) return value.map(item => String(item)).join("; ");
  }
  return "";
}

function parseBody(text: string): unknown {
  if (text.trim() === "") return {};
  try {
    return JSON.parse(text);
  } catch {
    return { result: text };
  }
}

function fault(code: string, message: string, hint: string, status?: number): InvocationResult {
  const error: InvocationFault = { code, message, hint };
  if (status !== undefined) error.status = status;
  return { ok: false, error };
}

export class PlatformClient implements OperationInvoker {
  private readonly baseUrl: string;
  private readonly now: () => number;

  constructor(
    private readonly registry: OperationRegistry,
    private readonly options: PlatformClientOptions,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  async invoke(operation: string, args: Record<string, unknown>, options: InvokeOptions = {}): Promise<InvocationResult> {
    const descriptor = this.registry.get(operation);
    if (!descriptor?.endpoint) {
      return fault("unknown-operation", `Operation '${operation}' has no platform endpoint`, "Check the operation name.");
    }

    const body = this.buildBody(descriptor, args);
    if (typeof body === "string") {
      return fault("validation-error", body, "Set base64Encoded to false when sending plain text.");
    }

    const timeout = AbortSignal.timeout(descriptor.timeoutMs ?? this.options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;
    const headers = authHeaders(this.options.userId, this.options.apiToken, this.now());
    if (!(body instanceof FormData)) {
      headers["Content-Type"] = "application/json";
    }

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${descriptor.endpoint}`, {
        method: "POST",
        headers,
        body: body instanceof FormData ? body : JSON.stringify(body),
        signal,
      });
    } catch (err) {
      if (options.signal?.aborted) {
        return fault("cancelled", `Request for '${operation}' was cancelled`, "");
      }
      if (timeout.aborted) {
        return fault("api-timeout", `Request for '${operation}' timed out`, "Retry later; the platform may be busy.");
      }
      const message = err instanceof Error ? err.message : String(err);
      return fault("api-request-error", message, "Check network connectivity to the platform.");
    }

    const text = await response.text();
    const payload = parseBody(text);

    if (!response.ok) {
      const detail = errorDetail(payload) || text || response.statusText;
      return fault(
        "api-http-error",
        `HTTP ${response.status}: ${detail}`,
        "Verify credentials and payload fields for this platform call.",
        response.status,
      );
    }

    if (isRecord(payload) && payload["success"] === false) {
      return fault(
        "api-error",
        errorDetail(payload) || `Operation '${operation}' was rejected by the platform`,
        "Check the arguments against the operation's parameters.",
      );
    }

    return { ok: true, payload };
  }

  /** JSON body, multipart form, or a validation message. */
  private buildBody(descriptor: OperationDescriptor, args: Record<string, unknown>): Record<string, unknown> | FormData | string {
    const fields: Record<string, unknown> = { ...args };
    if (descriptor.codeSource) {
      fields["codeSourceId"] = this.options.agentName;
    }
    if (descriptor.encoding === "json") {
      return fields;
    }

    const form = new FormData();
    const encoded = fields["base64Encoded"] === true;
    delete fields["base64Encoded"];

    for (const [key, value] of Object.entries(fields)) {
      if (value === undefined || value === null) continue;
      if (key !== "objectData") {
        form.append(key, typeof value === "string" ? value : JSON.stringify(value));
        continue;
      }
      const data = typeof value === "string" ? value : JSON.stringify(value);
      if (encoded && (data.length % 4 !== 0 || !BASE64.test(data))) {
        return "objectData must be valid base64 when base64Encoded is true";
      }
      const bytes = Buffer.from(data, encoded ? "base64" : "utf-8");
      form.append(key, new Blob([bytes]), key);
    }
    return form;
  }
}
