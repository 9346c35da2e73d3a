export { SessionMcpServer } from "./adapter.js";
export { registerSessionResources, CONTEXT_URI } from "./resources.js";
export { registerCatalogTools, registerSessionTools, operationInputShape, outcomeToToolResult } from "./tools.js";
export { createSessionMcpContext, toCallToolResult } from "./shared.js";
export type { SessionMcpContext, SessionMcpOptions } from "./shared.js";
