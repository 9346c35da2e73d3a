/**
 * Tool result envelopes shared by every MCP tool.
 */

export {
  sanitize,
  successResult,
  errorResult,
  type ToolError,
  type ToolResult,
  type JsonValue,
} from "./envelope.js";
