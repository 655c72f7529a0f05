/**
 * MCP Module Exports
 */

export { toolRegistry, ToolRegistry } from './registry.js';
export { handleToolsList, handleToolsCall } from './handlers.js';
export { MCPException, MCPErrors, formatErrorResponse } from './errors.js';
export * from '../models/mcp.js';
