/**
 * Tool responses carry the same answer twice: as text for the agent reading
 * the transcript, and as structured content matching the tool's output schema.
 */

export interface TextContent {
  type: "text";
  text: string;
}

export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

/** Anything with a message; a `code` is forwarded so clients can branch on it. */
export interface ToolError {
  message: string;
  code?: string;
}

export interface ErrorContent extends Record<string, unknown> {
  success: false;
  error: string;
  code?: string;
}

export function errorResponse(error: string | ToolError): ToolResponse<ErrorContent> {
  const { message, code } = typeof error === "string" ? { message: error, code: undefined } : error;
  const structuredContent: ErrorContent = { success: false, error: message };
  if (code !== undefined) structuredContent.code = code;
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent,
    isError: true,
  };
}

export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: { ...data, success: true },
  };
}
