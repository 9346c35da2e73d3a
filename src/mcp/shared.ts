import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ContextStore } from "../context/store.js";
import { SnapshotFile } from "../context/snapshot.js";
import { EventLogger } from "../events/logger.js";
import { createConsoleLogger, type Logger } from "../logging/console.js";
import { TradingSession } from "../orchestrator/session.js";
import { loadOperationRegistry, type OperationRegistry } from "../registry/catalog.js";
import type { SessionConfig } from "../schemas/config.js";
import type { ToolResult } from "../tools/envelope.js";
import { PlatformClient } from "../transport/client.js";
import type { OperationInvoker } from "../transport/invoker.js";

export interface SessionMcpOptions {
  config: SessionConfig;
  /** Catalog file; the bundled catalog when absent. */
  catalogPath?: string;
  /** Preloaded registry, e.g. in tests. */
  registry?: OperationRegistry;
  /** Transport override; the platform client when absent. */
  invoker?: OperationInvoker;
  logger?: Logger;
}

export interface SessionMcpContext {
  config: SessionConfig;
  registry: OperationRegistry;
  session: TradingSession;
  logger: Logger;
  /** Structured tool-input/tool-output log, when enabled. */
  events?: EventLogger;
  /** Recorded as the actor of structured events. */
  actor: string;
}

export async function createSessionMcpContext(options: SessionMcpOptions): Promise<SessionMcpContext> {
  const { config } = options;
  const logger = options.logger ?? createConsoleLogger();
  const registry = options.registry ?? await loadOperationRegistry(options.catalogPath);
  const invoker = options.invoker ?? new PlatformClient(registry, {
    baseUrl: config.api.baseUrl,
    userId: config.api.userId,
    apiToken: config.api.apiToken,
    timeoutMs: config.api.timeoutMs,
    agentName: config.agentName,
  });

  const snapshotPath = config.context.snapshotPath;
  const snapshot = snapshotPath ? new SnapshotFile(snapshotPath, { logger }) : undefined;
  const saved = snapshot ? await snapshot.load() : undefined;
  const store = new ContextStore({ maxRecent: config.context.maxRecent }, saved);

  const session = new TradingSession({
    registry,
    invoker,
    store,
    logger,
    supervisor: config.supervisor,
    onCommit: snapshot ? current => snapshot.save(current.snapshot()) : undefined,
  });

  const events = config.logging.structured && config.logging.eventsDir
    ? new EventLogger(config.logging.eventsDir)
    : undefined;

  return { config, registry, session, logger, events, actor: config.agentName };
}

/** Render a tool envelope as MCP tool content. */
export function toCallToolResult(result: ToolResult): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}
