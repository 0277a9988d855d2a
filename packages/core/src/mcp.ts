/**
 * MCP (Model Context Protocol) response utilities.
 * Helpers that turn engine results into tool responses.
 */

import type { Result } from "./result.js";

export interface TextContent {
  type: "text";
  text: string;
}

/**
 * MCP tool response structure.
 * A type alias rather than an interface so it stays assignable to the SDK's open result shape.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

/**
 * Anything a tool can report as a failure: a bare string, an Error,
 * or a structured error value carrying a message.
 */
export type Failure = string | { message: string };

export function failureMessage(failure: Failure): string {
  return typeof failure === "string" ? failure : failure.message;
}

/**
 * Create an error response. Text is prefixed with "Error:" and isError is set.
 */
export function errorResponse(message: string): ToolResponse<{ success: false; error: string }> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

/**
 * Convert a Result to a tool response carrying structured data next to the text.
 */
export function resultToStructuredResponse<T, E extends Failure, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return {
      content: [{ type: "text", text }],
      structuredContent: { ...data, success: true },
    };
  }
  return errorResponse(failureMessage(result.error));
}
