/**
 * kd-places Error Types
 *
 * Custom error classes for index invariant breaches, rejected input and
 * geocoder failures. Normal negative outcomes (a point that is not in the
 * index, an empty tree) are returned as values and never thrown.
 */

import type { Point } from './types.js';

/**
 * Error thrown when the k-d tree reaches a state its invariant rules out
 *
 * This is an assertion failure, not a recoverable condition: it means the
 * tree structure is corrupted or an internal helper was called outside its
 * contract (e.g. minimum search on an absent subtree).
 */
export class IndexInvariantError extends Error {
  /**
   * @param message - What was violated
   * @param depth - Tree depth where the breach was detected
   */
  constructor(
    message: string,
    public readonly depth: number
  ) {
    super(message);
    this.name = 'IndexInvariantError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IndexInvariantError);
    }
  }
}

/**
 * Error thrown when a place carries coordinates outside lon/lat ranges
 */
export class InvalidCoordinateError extends Error {
  constructor(
    message: string,
    public readonly point: Point
  ) {
    super(message);
    this.name = 'InvalidCoordinateError';
  }
}

/**
 * Error thrown when a place id is already present in the catalog
 */
export class DuplicatePlaceError extends Error {
  constructor(public readonly placeId: string) {
    super(`Place already exists: ${placeId}`);
    this.name = 'DuplicatePlaceError';
  }
}

/**
 * Error thrown when a place id is expected but unknown
 */
export class PlaceNotFoundError extends Error {
  constructor(public readonly placeId: string) {
    super(`Place not found: ${placeId}`);
    this.name = 'PlaceNotFoundError';
  }
}

/**
 * Error thrown when the geocoding service fails or answers with garbage
 *
 * RECOVERY:
 * - Check network access to the geocoder base URL
 * - Nominatim rate-limits aggressively; retry later with a lower --limit
 */
export class GeocodingError extends Error {
  constructor(
    message: string,
    public readonly query: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'GeocodingError';
  }
}

/**
 * Error thrown when a place record fails schema validation
 */
export class PlaceValidationError extends Error {
  constructor(
    message: string,
    public readonly placeId: string | undefined
  ) {
    super(message);
    this.name = 'PlaceValidationError';
  }
}
