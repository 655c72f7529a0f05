/**
 * Conversion Tools
 * convert_to_3wa and convert_to_coordinates
 */

import { z } from 'zod';
import { RequestOptions } from '../options/request-options.js';
import { getGeocodingClient } from './client.js';
import { defineTool } from './define-tool.js';

const formatSchema = z.enum(['json', 'geojson']).default('json');

export const convertTo3waSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  language: z.string().min(2).optional(),
  format: formatSchema,
});

export const convertToCoordinatesSchema = z.object({
  words: z.string().min(1),
  format: formatSchema,
});

export const convertTo3waTool = defineTool(
  {
    name: 'convert_to_3wa',
    description:
      'Convert latitude/longitude to the three-word address of the 3m square containing it.',
    inputSchema: {
      type: 'object',
      properties: {
        latitude: { type: 'number', description: 'Latitude, -90 to 90' },
        longitude: { type: 'number', description: 'Longitude, -180 to 180' },
        language: {
          type: 'string',
          description: 'ISO 639-1 code of the word list to answer in (e.g. "en", "fr")',
        },
        format: {
          type: 'string',
          enum: ['json', 'geojson'],
          description: 'Response shape (default json)',
        },
      },
      required: ['latitude', 'longitude'],
    },
  },
  convertTo3waSchema,
  async ({ latitude, longitude, language, format }) => {
    let options = RequestOptions.create().outputFormat(format);
    if (language) {
      options = options.language(language);
    }
    return getGeocodingClient().convertTo3wa({ lat: latitude, lng: longitude }, options);
  }
);

export const convertToCoordinatesTool = defineTool(
  {
    name: 'convert_to_coordinates',
    description:
      'Convert a three-word address such as "filled.count.soap" to coordinates and its 3m square.',
    inputSchema: {
      type: 'object',
      properties: {
        words: { type: 'string', description: 'Three words joined by dots' },
        format: {
          type: 'string',
          enum: ['json', 'geojson'],
          description: 'Response shape (default json)',
        },
      },
      required: ['words'],
    },
  },
  convertToCoordinatesSchema,
  async ({ words, format }) =>
    getGeocodingClient().convertToCoordinates(
      words,
      RequestOptions.create().outputFormat(format)
    )
);
