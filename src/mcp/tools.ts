import { z, type ZodTypeAny } from "zod";
import { ErrorCode, McpError, type CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { DOMAINS, IDENTIFIER_SLOTS, parseSlotRef } from "../context/domains.js";
import type { ExecuteOutcome } from "../orchestrator/session.js";
import type { OperationDescriptor, OperationParam } from "../schemas/operation.js";
import { errorResult, successResult, type ToolResult } from "../tools/envelope.js";
import { SERVER_VERSION } from "../version.js";
import { toCallToolResult, type SessionMcpContext } from "./shared.js";

const domainSchema = z.enum(DOMAINS);

const readContextInputSchema = {
  domain: domainSchema.optional().describe("Only return this domain"),
};

const pinInputSchema = {
  domain: domainSchema,
  field: z.string().min(1).describe("Pinned field, e.g. id or name"),
  value: z.union([z.string().min(1), z.number()]),
};

const clearInputSchema = {
  domain: domainSchema,
  fields: z.array(z.string()).optional().describe("Only clear these pinned fields"),
  recent: z.boolean().optional().describe("Also clear the recent list"),
  status: z.boolean().optional().describe("Also clear the status slot"),
};

const cancelInputSchema = {
  id: z.string().min(1).describe("Id from list_pending_operations"),
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Zod type of one catalog parameter. Integers are plain numbers for client compatibility. */
function paramSchema(param: OperationParam): ZodTypeAny {
  let schema: ZodTypeAny;
  switch (param.type) {
    case "number":
    case "integer":
      schema = z.number();
      break;
    case "boolean":
      schema = z.boolean();
      break;
    case "object":
      schema = z.record(z.string(), z.unknown());
      break;
    case "array":
      schema = z.array(z.unknown());
      break;
    default:
      schema = z.string();
  }

  const notes = [param.description];
  if (param.context) notes.push(`Defaults to the session's ${param.context}.`);
  const description = notes.filter(note => note !== "").join(" ");
  // Every parameter is optional at the protocol level; the resolver decides what is missing.
  return schema.optional().describe(description);
}

/** Raw input shape of a catalog operation, lookup name arguments included. */
export function operationInputShape(descriptor: OperationDescriptor): Record<string, ZodTypeAny> {
  const shape: Record<string, ZodTypeAny> = {};
  for (const param of descriptor.params) {
    shape[param.name] = paramSchema(param);
    if (param.lookup && !(param.lookup.nameArg in shape)) {
      const domain = IDENTIFIER_SLOTS[param.lookup.idField]?.domain
        ?? (param.context ? parseSlotRef(param.context)?.domain : undefined)
        ?? "item";
      shape[param.lookup.nameArg] = z.string().optional()
        .describe(`Name of the ${domain}, used instead of ${param.name}.`);
    }
  }
  return shape;
}

/** Map a session outcome onto the tool envelope. */
export function outcomeToToolResult(outcome: ExecuteOutcome): ToolResult {
  if (outcome.success) {
    const extras: Record<string, unknown> = {};
    if (outcome.status) extras["lifecycle"] = outcome.status;
    if (outcome.pendingId) extras["pendingId"] = outcome.pendingId;
    const payload = outcome.payload;
    return successResult(isRecord(payload) ? { ...payload, ...extras } : { result: payload, ...extras });
  }

  const { failure, question } = outcome;
  switch (failure.kind) {
    case "MissingContext":
      return errorResult("missing-context", `No value for '${failure.parameter}'`, question, {
        parameter: failure.parameter,
        domain: failure.domain,
      });
    case "Disambiguation":
      return errorResult("disambiguation", `'${failure.name}' matches ${failure.candidates.length} items`, question, {
        parameter: failure.parameter,
        candidates: failure.candidates,
      });
    case "InvocationError":
      return errorResult(failure.code, failure.message, failure.hint);
    case "Timeout":
      return errorResult("timeout", `${failure.operation} did not finish`, question, {
        attempts: failure.attempts,
        lastState: failure.lastState,
      });
    case "Cancelled":
      return errorResult("cancelled", `Stopped waiting for ${failure.operation}`, question, {
        attempts: failure.attempts,
      });
  }
}

async function logStructured(
  ctx: SessionMcpContext,
  kind: "input" | "output",
  tool: string,
  value: unknown,
): Promise<void> {
  if (!ctx.config.logging.structured) return;
  try {
    if (ctx.events) {
      if (kind === "input") {
        await ctx.events.logToolInput(tool, ctx.actor, isRecord(value) ? value : {});
      } else {
        await ctx.events.logToolOutput(tool, ctx.actor, value);
      }
    } else {
      ctx.logger.info(`tool-${kind}`, { tool, [kind === "input" ? "arguments" : "result"]: value });
    }
  } catch (err) {
    ctx.logger.error("Failed to write structured tool log", {
      tool,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

async function runTool(
  ctx: SessionMcpContext,
  tool: string,
  input: Record<string, unknown>,
  handler: () => Promise<ToolResult>,
): Promise<CallToolResult> {
  await logStructured(ctx, "input", tool, input);
  let result: ToolResult;
  try {
    result = await handler();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    ctx.logger.error("Tool failed", { tool, error: message });
    throw new McpError(ErrorCode.InternalError, `${tool} failed: ${message}`);
  }
  await logStructured(ctx, "output", tool, result);
  return toCallToolResult(result);
}

/** One tool per catalog operation. */
export function registerCatalogTools(server: McpServer, ctx: SessionMcpContext): void {
  for (const descriptor of ctx.registry.list()) {
    if (!descriptor.endpoint) continue;
    server.registerTool(descriptor.name, {
      title: descriptor.title,
      description: descriptor.description || descriptor.title,
      inputSchema: operationInputShape(descriptor),
      annotations: { title: descriptor.title, readOnlyHint: descriptor.readOnly },
    }, async (input, extra) => runTool(ctx, descriptor.name, input, async () => {
      const outcome = await ctx.session.execute(descriptor.name, input, { signal: extra.signal });
      if (outcome.success && outcome.attempts !== undefined) {
        await ctx.events?.log("operation.supervised", ctx.actor, {
          operation: descriptor.name,
          attempts: outcome.attempts,
          state: outcome.status?.state,
        });
      }
      return outcomeToToolResult(outcome);
    }));
  }
}

/** Tools served locally from the session. */
export function registerSessionTools(server: McpServer, ctx: SessionMcpContext): void {
  const { session } = ctx;

  server.registerTool("read_session_context", {
    title: "Read session context",
    description: "Show the identifiers the session will use as defaults",
    inputSchema: readContextInputSchema,
    annotations: { readOnlyHint: true },
  }, async (input) => runTool(ctx, "read_session_context", input, async () => {
    const snapshot = session.store.snapshot();
    if (!input.domain) return successResult(snapshot);
    return successResult({ domain: input.domain, ...snapshot.domains[input.domain] });
  }));

  server.registerTool("pin_context_value", {
    title: "Pin context value",
    description: "Set the current value of a context slot, e.g. the project to work on",
    inputSchema: pinInputSchema,
  }, async (input) => runTool(ctx, "pin_context_value", input, async () => {
    await session.pin(input.domain, input.field, input.value);
    await ctx.events?.log("context.pinned", ctx.actor, { domain: input.domain, field: input.field, value: input.value });
    return successResult({ domain: input.domain, pinned: session.store.getPinned(input.domain) });
  }));

  server.registerTool("clear_session_context", {
    title: "Clear session context",
    description: "Forget the current value of a domain",
    inputSchema: clearInputSchema,
  }, async (input) => runTool(ctx, "clear_session_context", input, async () => {
    await session.clear(input.domain, { fields: input.fields, recent: input.recent, status: input.status });
    await ctx.events?.log("context.cleared", ctx.actor, { domain: input.domain, fields: input.fields ?? [] });
    return successResult({ domain: input.domain, pinned: session.store.getPinned(input.domain) });
  }));

  server.registerTool("list_pending_operations", {
    title: "List pending operations",
    description: "Long-running operations the session is still polling",
    inputSchema: {},
    annotations: { readOnlyHint: true },
  }, async () => runTool(ctx, "list_pending_operations", {}, async () =>
    successResult({ pending: session.pending() })));

  server.registerTool("cancel_pending_operation", {
    title: "Stop waiting for an operation",
    description: "Stop polling a long-running operation; the remote job keeps running",
    inputSchema: cancelInputSchema,
  }, async (input) => runTool(ctx, "cancel_pending_operation", input, async () => {
    if (!session.cancel(input.id)) {
      return errorResult("not-found", `No pending operation '${input.id}'`, "Call list_pending_operations for current ids.");
    }
    return successResult({ id: input.id, cancelled: true });
  }));

  server.registerTool("read_mcp_server_version", {
    title: "Read MCP server version",
    description: "Version of this MCP server",
    inputSchema: {},
    annotations: { readOnlyHint: true },
  }, async () => runTool(ctx, "read_mcp_server_version", {}, async () =>
    successResult({ version: SERVER_VERSION, source: "local" })));
}
