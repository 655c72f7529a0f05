/**
 * Tool Registry
 * Name-keyed lookup of the geocoder tools exposed over MCP
 */

import {
  ToolDefinitionSchema,
  type ToolDefinition,
  type ToolRegistryEntry,
} from '../models/mcp.js';

class ToolRegistry {
  private entries = new Map<string, ToolRegistryEntry>();

  register(entry: ToolRegistryEntry): void {
    const { name } = entry.definition;
    const definition = ToolDefinitionSchema.safeParse(entry.definition);
    if (!definition.success) {
      const problems = definition.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Invalid definition for tool "${name}": ${problems}`);
    }
    if (this.entries.has(name)) {
      throw new Error(`Tool "${name}" is already registered`);
    }
    this.entries.set(name, entry);
  }

  get(name: string): ToolRegistryEntry | undefined {
    return this.entries.get(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Definitions in registration order. */
  listTools(): ToolDefinition[] {
    return Array.from(this.entries.values(), (entry) => entry.definition);
  }

  get size(): number {
    return this.entries.size;
  }

  // Used by tests to start from a clean slate
  clear(): void {
    this.entries.clear();
  }
}

export const toolRegistry = new ToolRegistry();

export { ToolRegistry };
