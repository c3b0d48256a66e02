/**
 * Response formatting utilities for MCP tool calls.
 * @internal
 */
import type { CallToolResult } from '@kvctl/commands-core';

/**
 * Creates an error response for MCP tool calls.
 * @param message - Error message to return to the caller
 */
export function createErrorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: message,
      },
    ],
    isError: true,
  };
}

/**
 * Creates a success response for MCP tool calls.
 *
 * The optional additional text carries hints, such as the config entry to
 * add after creating a namespace.
 * @param text - Primary response text
 * @param additionalText - Optional secondary text block
 */
export function createTextResponse(
  text: string,
  additionalText?: string,
): CallToolResult {
  const content: Array<{ type: 'text'; text: string }> = [
    {
      type: 'text',
      text,
    },
  ];

  if (additionalText) {
    content.push({
      type: 'text',
      text: additionalText,
    });
  }

  return { content };
}
