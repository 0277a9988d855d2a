export type { Result } from "./result.js";
export { Ok, Err, andThen, tryCatch, tryCatchAsync } from "./result.js";

export type { TextContent, ToolResponse, Failure } from "./mcp.js";
export {
  failureMessage,
  errorResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { bootstrapServer, runServer, McpServer } from "./server.js";
