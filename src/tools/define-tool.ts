/**
 * Tool helpers
 * Argument validation and result formatting shared by every geocoder tool
 */

import type { z, ZodTypeAny } from 'zod';
import { DecodeError, GeocoderApiException } from '../errors.js';
import { MCPErrors } from '../mcp/errors.js';
import type {
  MCPError,
  MCPToolCallResponse,
  ToolDefinition,
  ToolRegistryEntry,
} from '../models/mcp.js';

export function jsonContent(payload: unknown): MCPToolCallResponse {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
  };
}

export function errorContent({ code, message, data }: MCPError): MCPToolCallResponse {
  return {
    content: [
      { type: 'text', text: JSON.stringify({ error: code, message, ...(data && { data }) }) },
    ],
    isError: true,
  };
}

/**
 * Build a registry entry whose handler validates its arguments against
 * `schema` before calling `run`. Service and decode failures are reported
 * as error content; anything else propagates to handleToolsCall.
 */
export function defineTool<S extends ZodTypeAny>(
  definition: ToolDefinition,
  schema: S,
  run: (input: z.infer<S>) => Promise<unknown>
): ToolRegistryEntry {
  return {
    definition,
    handler: async (args) => {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(
          (issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`
        );
        return errorContent(MCPErrors.invalidParams(issues.join('; '), issues).toJSON());
      }

      try {
        return jsonContent(await run(parsed.data));
      } catch (error) {
        if (error instanceof GeocoderApiException || error instanceof DecodeError) {
          return errorContent(error.toJSON());
        }
        throw error;
      }
    },
  };
}
