/**
 * Reference Data Tools
 * available_languages and grid_section
 */

import { z } from 'zod';
import { getGeocodingClient } from './client.js';
import { defineTool } from './define-tool.js';

export const availableLanguagesTool = defineTool(
  {
    name: 'available_languages',
    description: 'List the languages (and locales) three-word addresses are available in.',
    inputSchema: { type: 'object', properties: {} },
  },
  z.object({}),
  async () => getGeocodingClient().availableLanguages()
);

export const gridSectionSchema = z
  .object({
    southLat: z.number().min(-90).max(90),
    westLng: z.number().min(-180).max(180),
    northLat: z.number().min(-90).max(90),
    eastLng: z.number().min(-180).max(180),
    format: z.enum(['json', 'geojson']).default('json'),
  })
  .refine((box) => box.southLat <= box.northLat, {
    message: 'southLat must not be greater than northLat',
    path: ['southLat'],
  });

export const gridSectionTool = defineTool(
  {
    name: 'grid_section',
    description:
      'Return the 3m grid lines inside a bounding box. The service limits the box to a few square kilometres.',
    inputSchema: {
      type: 'object',
      properties: {
        southLat: { type: 'number', description: 'Latitude of the south-west corner' },
        westLng: { type: 'number', description: 'Longitude of the south-west corner' },
        northLat: { type: 'number', description: 'Latitude of the north-east corner' },
        eastLng: { type: 'number', description: 'Longitude of the north-east corner' },
        format: { type: 'string', enum: ['json', 'geojson'] },
      },
      required: ['southLat', 'westLng', 'northLat', 'eastLng'],
    },
  },
  gridSectionSchema,
  async ({ southLat, westLng, northLat, eastLng, format }) =>
    getGeocodingClient().gridSection(
      {
        southwest: { lat: southLat, lng: westLng },
        northeast: { lat: northLat, lng: eastLng },
      },
      format
    )
);
