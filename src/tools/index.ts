/**
 * Tools Index
 * Registers all available MCP tools
 */

import { toolRegistry } from '../mcp/index.js';
import { autosuggestTool } from './autosuggest.js';
import { convertTo3waTool, convertToCoordinatesTool } from './convert.js';
import { availableLanguagesTool, gridSectionTool } from './reference.js';
import {
  didYouMeanTool,
  findPossible3waTool,
  isPossible3waTool,
} from './text-detection.js';

export const geocoderTools = [
  convertTo3waTool,
  convertToCoordinatesTool,
  autosuggestTool,
  availableLanguagesTool,
  gridSectionTool,
  findPossible3waTool,
  isPossible3waTool,
  didYouMeanTool,
];

/**
 * Register all tools with the registry
 */
export function registerAllTools(): void {
  for (const tool of geocoderTools) {
    if (!toolRegistry.has(tool.definition.name)) {
      toolRegistry.register(tool);
    }
  }
}
