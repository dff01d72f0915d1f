/**
 * Input Validation Schemas
 *
 * zod schemas for everything that enters the catalog from outside:
 * coordinates typed on the command line, place records read from NDJSON
 * files and geocoder responses.
 *
 * @module validation/schemas
 */

import { z } from 'zod';

// ============================================================================
// Coordinates
// ============================================================================

/**
 * Geographic coordinate pair
 *
 * Longitude: -180 to +180 (inclusive)
 * Latitude: -90 to +90 (inclusive)
 * NaN and Infinity are rejected; they would break index ordering.
 */
export const CoordinateSchema = z.object({
  lon: z
    .number()
    .refine((val) => Number.isFinite(val), 'Longitude must be a finite number')
    .refine((val) => val >= -180 && val <= 180, 'Longitude must be between -180 and 180'),
  lat: z
    .number()
    .refine((val) => Number.isFinite(val), 'Latitude must be a finite number')
    .refine((val) => val >= -90 && val <= 90, 'Latitude must be between -90 and 90'),
});

export type ValidatedCoordinates = z.infer<typeof CoordinateSchema>;

// ============================================================================
// Places
// ============================================================================

/**
 * Single place record (one NDJSON line)
 */
export const PlaceRecordSchema = CoordinateSchema.extend({
  id: z.string().min(1, 'Place id is required'),
  name: z.string().min(1, 'Place name is required'),
  type: z.string().min(1, 'Place type is required'),
  address: z.string().default(''),
});

export type PlaceRecord = z.infer<typeof PlaceRecordSchema>;

/**
 * NDJSON header line for place files
 */
export const PlacesHeaderSchema = z.object({
  _schema: z.literal('v1'),
  _type: z.literal('Place'),
  _count: z.number().int().nonnegative(),
  _extracted: z.string(),
  _description: z.string().default(''),
});

export type PlacesHeader = z.infer<typeof PlacesHeaderSchema>;

// ============================================================================
// Geocoder Responses
// ============================================================================

/**
 * Nominatim search hit
 *
 * Nominatim returns coordinates as decimal strings.
 */
export const NominatimHitSchema = z.object({
  display_name: z.string().default(''),
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  type: z.string().optional(),
  class: z.string().optional(),
});

export const NominatimResponseSchema = z.array(NominatimHitSchema);

export type NominatimHit = z.infer<typeof NominatimHitSchema>;

// ============================================================================
// Helpers
// ============================================================================

/**
 * Reduce a validation failure to a single readable message
 */
export function formatValidationError(error: unknown): string {
  if (error instanceof z.ZodError) {
    const first = error.errors[0];
    if (!first) {
      return 'Validation error';
    }
    const path = first.path.length > 0 ? `${first.path.join('.')}: ` : '';
    return `${path}${first.message}`;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
