/**
 * Error Response Utilities
 *
 * Utilities for creating structured success and error responses for MCP tools
 */

import { ErrorCode } from './error-codes.js';
import { McpError } from './mcp-error.js';

/**
 * MCP Tool Response type
 */
export interface McpToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Create a structured error response for MCP tools
 *
 * @param error - Error to convert to structured response
 * @param includeStack - Whether to include stack trace (default: process.env.NODE_ENV !== 'production')
 * @returns Structured MCP tool response with isError flag
 */
export function createErrorResponse(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): McpToolResponse {
  let mcpError: McpError;
  if (error instanceof McpError) {
    mcpError = error;
  } else if (error instanceof Error) {
    mcpError = McpError.fromError(error);
  } else {
    mcpError = new McpError(String(error), ErrorCode.UNKNOWN_ERROR);
  }

  const structured = mcpError.toStructured();

  if (!includeStack) {
    delete structured.stack;
  }

  const textParts: string[] = [
    `Error: ${structured.error}`,
    `Code: ${structured.code}`,
    `Severity: ${structured.severity}`,
  ];

  if (structured.details && Object.keys(structured.details).length > 0) {
    textParts.push(`Details: ${JSON.stringify(structured.details, null, 2)}`);
  }

  if (includeStack && structured.stack) {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return {
    content: [
      {
        type: 'text',
        text: textParts.join('\n'),
      },
    ],
    structuredContent: structured,
    isError: true,
  };
}

/**
 * Create a success response with structured output
 *
 * @param output - Output data to return
 * @returns Structured MCP tool response
 */
export function createSuccessResponse(output: Record<string, unknown>): McpToolResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    structuredContent: output,
    isError: false,
  };
}
