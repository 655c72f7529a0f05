/**
 * MCP Error Handling
 * Custom error classes and error response formatting
 */

import type { MCPError, MCPErrorCode } from '../models/mcp.js';

export class MCPException extends Error {
  public readonly code: MCPErrorCode;
  public readonly data?: Record<string, unknown>;

  constructor(code: MCPErrorCode, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'MCPException';
    this.code = code;
    this.data = data;
  }

  toJSON(): MCPError {
    return {
      code: this.code,
      message: this.message,
      ...(this.data && { data: this.data }),
    };
  }
}

// Pre-defined error factories
export const MCPErrors = {
  invalidRequest: (message: string = 'Invalid request format', issues?: string[]) =>
    new MCPException('INVALID_REQUEST', message, issues && { issues }),

  toolNotFound: (toolName: string) =>
    new MCPException('TOOL_NOT_FOUND', `Tool "${toolName}" not found`),

  invalidParams: (message: string, issues?: string[]) =>
    new MCPException('INVALID_PARAMS', message, issues && { issues }),

  internalError: (message: string = 'Internal server error') =>
    new MCPException('INTERNAL_ERROR', message),
};

/**
 * Format an error for an MCP error result
 */
export function formatErrorResponse(error: unknown): MCPError {
  if (error instanceof MCPException) {
    return error.toJSON();
  }

  // Handle unexpected errors
  const message =
    error instanceof Error ? error.message : 'An unexpected error occurred';

  return {
    code: 'INTERNAL_ERROR',
    message,
  };
}
