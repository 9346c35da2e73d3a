import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ResourceTemplate } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { DOMAINS, isDomainName } from "../context/domains.js";
import type { SessionMcpContext } from "./shared.js";

export const CONTEXT_URI = "session://context";

function jsonContents(uri: URL, value: unknown) {
  return {
    contents: [{ uri: uri.href, mimeType: "application/json", text: JSON.stringify(value, null, 2) }],
  };
}

export function registerSessionResources(server: McpServer, ctx: SessionMcpContext): void {
  server.registerResource("session-context", CONTEXT_URI, {
    description: "Full session context snapshot",
    mimeType: "application/json",
  }, async (uri) => jsonContents(uri, ctx.session.store.snapshot()));

  const domainTemplate = new ResourceTemplate("session://context/{domain}", {
    list: async () => ({
      resources: DOMAINS.map(domain => ({ uri: `${CONTEXT_URI}/${domain}`, name: domain })),
    }),
  });

  server.registerResource("session-context-domain", domainTemplate, {
    description: "Pinned values, recent items and status of one domain",
    mimeType: "application/json",
  }, async (uri, variables) => {
    const raw = variables["domain"];
    const domain = Array.isArray(raw) ? raw[0] : raw;
    if (domain === undefined || !isDomainName(domain)) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown context domain: ${String(domain)}`);
    }
    return jsonContents(uri, {
      domain,
      pinned: ctx.session.store.getPinned(domain),
      recent: ctx.session.store.getRecent(domain),
      status: ctx.session.store.getStatus(domain) ?? null,
    });
  });
}
