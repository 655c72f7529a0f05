/**
 * Autosuggest Tool
 * Suggestions for incomplete or mistyped three-word addresses
 */

import { z } from 'zod';
import { RequestOptions } from '../options/request-options.js';
import { getGeocodingClient } from './client.js';
import { defineTool } from './define-tool.js';

export const autosuggestSchema = z
  .object({
    input: z.string().min(1),
    focusLatitude: z.number().min(-90).max(90).optional(),
    focusLongitude: z.number().min(-180).max(180).optional(),
    clipToCountry: z.array(z.string().length(2)).min(1).optional(),
    nResults: z.number().int().min(1).max(100).optional(),
    language: z.string().min(2).optional(),
  })
  .refine(
    (input) => (input.focusLatitude === undefined) === (input.focusLongitude === undefined),
    { message: 'focusLatitude and focusLongitude must be given together', path: ['focusLatitude'] }
  );

export type AutosuggestInput = z.infer<typeof autosuggestSchema>;

export function buildAutosuggestOptions(input: AutosuggestInput): RequestOptions {
  let options = RequestOptions.create();
  if (input.focusLatitude !== undefined && input.focusLongitude !== undefined) {
    options = options.focus({ lat: input.focusLatitude, lng: input.focusLongitude });
  }
  if (input.clipToCountry) {
    options = options.clipToCountry(...input.clipToCountry);
  }
  if (input.nResults !== undefined) {
    options = options.nResults(input.nResults);
  }
  if (input.language) {
    options = options.language(input.language);
  }
  return options;
}

export const autosuggestTool = defineTool(
  {
    name: 'autosuggest',
    description:
      'Suggest complete three-word addresses for partial or misspelt input, optionally near a focus point or inside given countries.',
    inputSchema: {
      type: 'object',
      properties: {
        input: { type: 'string', description: 'Partial address, e.g. "filled.count.so"' },
        focusLatitude: { type: 'number', description: 'Latitude to rank suggestions by proximity' },
        focusLongitude: { type: 'number', description: 'Longitude to rank suggestions by proximity' },
        clipToCountry: {
          type: 'array',
          items: { type: 'string' },
          description: 'ISO 3166-1 alpha-2 country codes to restrict suggestions to',
        },
        nResults: { type: 'number', description: 'Number of suggestions (default 3)' },
        language: { type: 'string', description: 'ISO 639-1 code of the word list' },
      },
      required: ['input'],
    },
  },
  autosuggestSchema,
  async (input) => getGeocodingClient().autosuggest(input.input, buildAutosuggestOptions(input))
);
