import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { SERVER_NAME, SERVER_VERSION } from "../version.js";
import { createSessionMcpContext, type SessionMcpContext, type SessionMcpOptions } from "./shared.js";
import { registerCatalogTools, registerSessionTools } from "./tools.js";
import { registerSessionResources } from "./resources.js";

export class SessionMcpServer {
  readonly server: McpServer;
  private ctx?: SessionMcpContext;
  private readonly options: SessionMcpOptions;

  constructor(options: SessionMcpOptions) {
    this.options = options;
    this.server = new McpServer({
      name: SERVER_NAME,
      version: SERVER_VERSION,
    }, {
      capabilities: {
        resources: {},
        tools: {},
      },
    });
  }

  /** Session behind the server; available once started. */
  get context(): SessionMcpContext | undefined {
    return this.ctx;
  }

  async start(transport: Transport): Promise<void> {
    this.ctx = await createSessionMcpContext(this.options);

    registerSessionResources(this.server, this.ctx);
    registerCatalogTools(this.server, this.ctx);
    registerSessionTools(this.server, this.ctx);

    this.ctx.logger.info("Session MCP server ready", { tools: this.ctx.registry.list().length });
    await this.server.connect(transport);
  }

  async stop(): Promise<void> {
    if (this.ctx) {
      for (const pending of this.ctx.session.pending()) {
        this.ctx.session.cancel(pending.id);
      }
    }
    await this.server.close();
  }
}
