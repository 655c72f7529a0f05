/**
 * Geocoding Types
 * Request values and response schemas for the three-word address service.
 * Response types are derived from the zod schemas that decode them.
 */

import { z } from 'zod';

// ==================== Request values ====================

export interface Coordinates {
  lat: number;
  lng: number;
}

export interface BoundingBox {
  southwest: Coordinates;
  northeast: Coordinates;
}

export interface Circle {
  center: Coordinates;
  radiusMeters: number;
}

// Closure is implicit: the last point is joined back to the first
export type Polygon = readonly Coordinates[];

export type OutputFormat = 'json' | 'geojson';

export type InputType = 'text' | 'vocon-hybrid' | 'nmdp-asr' | 'generic-voice';

// ==================== Shared response pieces ====================

export const CoordinatesSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

export const SquareSchema = z.object({
  southwest: CoordinatesSchema,
  northeast: CoordinatesSchema,
});

export type Square = z.infer<typeof SquareSchema>;

// [lng, lat] as GeoJSON orders them
const PositionSchema = z.array(z.number()).min(2);

// ==================== Address (convert-to-3wa / convert-to-coordinates) ====================

export const AddressSchema = z.object({
  country: z.string(),
  square: SquareSchema,
  nearestPlace: z.string(),
  coordinates: CoordinatesSchema,
  words: z.string(),
  language: z.string(),
  map: z.string(),
});

export type Address = z.infer<typeof AddressSchema>;

export const AddressPropertiesSchema = z.object({
  country: z.string(),
  nearestPlace: z.string(),
  words: z.string(),
  language: z.string(),
  map: z.string(),
});

export const AddressFeatureSchema = z.object({
  type: z.literal('Feature'),
  bbox: z.array(z.number()).length(4).optional(),
  geometry: z.object({
    type: z.literal('Point'),
    coordinates: PositionSchema,
  }),
  properties: AddressPropertiesSchema,
});

export const AddressGeoJsonSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(AddressFeatureSchema).min(1),
});

export type AddressFeature = z.infer<typeof AddressFeatureSchema>;
export type AddressGeoJson = z.infer<typeof AddressGeoJsonSchema>;

export type GeocodeResult =
  | { format: 'json'; address: Address }
  | { format: 'geojson'; collection: AddressGeoJson };

// ==================== Grid section ====================

export const GridLineSchema = z.object({
  start: CoordinatesSchema,
  end: CoordinatesSchema,
});

export const GridSectionJsonSchema = z.object({
  lines: z.array(GridLineSchema),
});

export const GridSectionGeoJsonSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      type: z.literal('Feature'),
      geometry: z.object({
        type: z.literal('MultiLineString'),
        coordinates: z.array(z.array(PositionSchema)),
      }),
      properties: z.record(z.unknown()),
    })
  ),
});

export type GridLine = z.infer<typeof GridLineSchema>;
export type GridSectionJson = z.infer<typeof GridSectionJsonSchema>;
export type GridSectionGeoJson = z.infer<typeof GridSectionGeoJsonSchema>;

export type GridSectionResult =
  | { format: 'json'; grid: GridSectionJson }
  | { format: 'geojson'; grid: GridSectionGeoJson };

// ==================== Autosuggest ====================

export const SuggestionSchema = z.object({
  country: z.string(),
  nearestPlace: z.string(),
  words: z.string(),
  rank: z.number().int(),
  language: z.string(),
  distanceToFocusKm: z.number().optional(),
  square: SquareSchema.optional(),
  coordinates: CoordinatesSchema.optional(),
  map: z.string().optional(),
});

export const AutosuggestResponseSchema = z.object({
  suggestions: z.array(SuggestionSchema),
});

export type Suggestion = z.infer<typeof SuggestionSchema>;
export type AutosuggestResponse = z.infer<typeof AutosuggestResponseSchema>;

// ==================== Languages ====================

export const LanguageSchema = z.object({
  code: z.string(),
  name: z.string(),
  nativeName: z.string(),
  locales: z
    .array(
      z.object({
        code: z.string(),
        name: z.string(),
        nativeName: z.string(),
      })
    )
    .optional(),
});

export const AvailableLanguagesSchema = z.object({
  languages: z.array(LanguageSchema),
});

export type Language = z.infer<typeof LanguageSchema>;
export type AvailableLanguages = z.infer<typeof AvailableLanguagesSchema>;

// ==================== Errors ====================

export const ApiErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export type ApiErrorResponse = z.infer<typeof ApiErrorResponseSchema>;
