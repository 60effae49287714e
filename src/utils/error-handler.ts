import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/**
 * AnkiConnect failure: unreachable endpoint, error payload or unexpected result shape.
 */
export class AnkiConnectError extends Error {
  constructor(
    message: string,
    readonly action: string
  ) {
    super(message);
    this.name = "AnkiConnectError";
  }
}

/**
 * Deck selection that is neither "all" nor a comma-separated list of indices.
 */
export class SelectionError extends Error {
  constructor(readonly input: string) {
    super(`Invalid deck selection: "${input}" (expected "all" or indices such as "0,2,5")`);
    this.name = "SelectionError";
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createSuccessResponse(data: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(data, null, 2),
      },
    ],
  };
}

export function createErrorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: message,
      },
    ],
    isError: true,
  };
}

/**
 * Converts an error thrown inside a tool handler into an MCP error result.
 */
export function handleApiError(error: unknown, operation: string): CallToolResult {
  console.error(`${operation} failed:`, error);

  if (error instanceof AnkiConnectError) {
    return createErrorResponse(
      `${operation} failed: AnkiConnect "${error.action}" returned an error: ${error.message}`
    );
  }

  return createErrorResponse(`${operation} failed: ${getErrorMessage(error)}`);
}
