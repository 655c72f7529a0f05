/**
 * MCP Protocol Types
 * Based on the Model Context Protocol specification
 */

import { z } from 'zod';

// Tool parameter schema
export const ToolParameterSchema = z.object({
  type: z.string(),
  description: z.string().optional(),
  required: z.array(z.string()).optional(),
  properties: z.record(z.unknown()).optional(),
});

// Tool definition schema
export const ToolDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  inputSchema: ToolParameterSchema,
});

// Tool call request schema
export const ToolCallRequestSchema = z.object({
  method: z.literal('tools/call'),
  params: z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).optional(),
  }),
});

// Types derived from schemas
export type ToolParameter = z.infer<typeof ToolParameterSchema>;
export type ToolDefinition = z.infer<typeof ToolDefinitionSchema>;
export type ToolCallRequest = z.infer<typeof ToolCallRequestSchema>;

// Response types
export interface MCPToolListResponse {
  tools: ToolDefinition[];
}

// Aliases rather than interfaces so they fit the SDK's open result objects
export type MCPContent = {
  type: 'text';
  text: string;
};

export type MCPToolCallResponse = {
  content: MCPContent[];
  isError?: boolean;
};

// Error types
export interface MCPError {
  code: string;
  message: string;
  data?: Record<string, unknown>;
}

export type MCPErrorCode =
  | 'INVALID_REQUEST'
  | 'TOOL_NOT_FOUND'
  | 'INVALID_PARAMS'
  | 'INTERNAL_ERROR';

// Tool handler type
export type ToolHandler = (
  args: Record<string, unknown>
) => Promise<MCPToolCallResponse>;

// Tool registry entry
export interface ToolRegistryEntry {
  definition: ToolDefinition;
  handler: ToolHandler;
}
