/**
 * Shared constants for place search
 */

// ============================================================================
// Geography
// ============================================================================

/**
 * Approximate kilometres per degree of latitude
 *
 * Used only to size the degree box handed to the index before the exact
 * great-circle filter runs.
 */
export const KM_PER_DEGREE = 111;

/**
 * Default half-size (degrees) of the area searched around a geocoded city
 */
export const DEFAULT_CITY_SPAN_DEGREES = 0.2;

/**
 * Default search centre: Krasnoyarsk city centre [lon, lat]
 */
export const DEFAULT_CENTER = {
  lon: 92.872586,
  lat: 56.0091173,
} as const;

// ============================================================================
// Persistence
// ============================================================================

export const PLACES_SCHEMA_VERSION = 'v1';
