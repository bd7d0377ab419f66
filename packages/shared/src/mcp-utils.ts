/**
 * MCP Utility Functions
 *
 * Shared helpers for MCP server responses
 */

import { errorMessage } from './errors.js';
import { sanitizeError } from './validation.js';

export type McpTextContent = {
  type: 'text';
  text: string;
};

export type McpToolResponse = {
  content: McpTextContent[];
  isError?: true;
};

/**
 * Create a successful MCP response carrying plain text
 */
export function createMcpTextResponse(text: string): McpToolResponse {
  return {
    content: [{ type: 'text', text }],
  };
}

export interface McpErrorResponseOptions {
  /** Redact emails, tokens and paths from the message (default true) */
  sanitize?: boolean;
}

/**
 * Create an MCP error response.
 *
 * Errors a tool raises about its own input echo that input back, so tools
 * pass `sanitize: false` for them; unexpected failures keep the default.
 */
export function createMcpErrorResponse(
  error: unknown,
  options: McpErrorResponseOptions = {}
): McpToolResponse & { isError: true } {
  const { sanitize = true } = options;
  return {
    content: [{ type: 'text', text: sanitize ? sanitizeError(error) : errorMessage(error) }],
    isError: true,
  };
}

/**
 * Get current ISO timestamp
 */
export function now(): string {
  return new Date().toISOString();
}
