export type { Result } from "./result.js";
export { Ok, Err, tryCatch, toError } from "./result.js";

export type { TextContent, ToolResponse, ToolError, ErrorContent } from "./mcp.js";
export { errorResponse, successResponse } from "./mcp.js";

export type { ServerOptions } from "./server.js";
export { startServer, runServer, McpServer } from "./server.js";
