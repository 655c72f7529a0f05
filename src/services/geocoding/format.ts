/**
 * Response Format Dispatcher
 * Decodes a raw response body into the model for the format the caller
 * asked for. The shape is never guessed from the payload.
 */

import type { z, ZodTypeAny } from 'zod';
import { DecodeError } from '../../errors.js';
import {
  AddressGeoJsonSchema,
  AddressSchema,
  GridSectionGeoJsonSchema,
  GridSectionJsonSchema,
  type GeocodeResult,
  type GridSectionResult,
  type OutputFormat,
} from '../../models/geocoding.js';

/**
 * Parse `raw` against `schema`, throwing DecodeError with one entry per
 * failed path.
 */
export function decodeWith<S extends ZodTypeAny>(
  schema: S,
  raw: unknown,
  expected: string
): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    throw new DecodeError(expected, issues);
  }
  return parsed.data;
}

export function decodeGeocodeResult(
  format: OutputFormat,
  raw: unknown
): GeocodeResult {
  switch (format) {
    case 'json':
      return { format, address: decodeWith(AddressSchema, raw, format) };
    case 'geojson':
      return { format, collection: decodeWith(AddressGeoJsonSchema, raw, format) };
  }
}

export function decodeGridSection(
  format: OutputFormat,
  raw: unknown
): GridSectionResult {
  switch (format) {
    case 'json':
      return { format, grid: decodeWith(GridSectionJsonSchema, raw, format) };
    case 'geojson':
      return { format, grid: decodeWith(GridSectionGeoJsonSchema, raw, format) };
  }
}
