/**
 * MCP Protocol Handlers
 * Handles tools/list and tools/call requests
 */

import {
  ToolCallRequestSchema,
  type MCPToolListResponse,
  type MCPToolCallResponse,
} from '../models/mcp.js';
import { toolRegistry } from './registry.js';
import { MCPErrors, MCPException } from './errors.js';

/**
 * Handle tools/list request
 * Returns all registered tools with their definitions
 */
export async function handleToolsList(): Promise<MCPToolListResponse> {
  const tools = toolRegistry.listTools();
  return { tools };
}

/**
 * Handle tools/call request
 * Validates the request shape, then executes the named tool
 */
export async function handleToolsCall(
  request: unknown
): Promise<MCPToolCallResponse> {
  const parsed = ToolCallRequestSchema.safeParse(request);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || 'request'}: ${issue.message}`
    );
    throw MCPErrors.invalidRequest(`Invalid tools/call request: ${issues.join('; ')}`, issues);
  }

  const { name, arguments: args = {} } = parsed.data.params;

  const tool = toolRegistry.get(name);
  if (!tool) {
    throw MCPErrors.toolNotFound(name);
  }

  try {
    return await tool.handler(args);
  } catch (error) {
    if (error instanceof MCPException) {
      throw error;
    }

    // Wrap unexpected errors
    const message =
      error instanceof Error ? error.message : 'Tool execution failed';
    throw MCPErrors.internalError(`Tool "${name}" failed: ${message}`);
  }
}
