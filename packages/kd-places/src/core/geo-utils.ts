/**
 * Geographic Utilities
 *
 * The index measures plain planar distances between [lon, lat] pairs. These
 * helpers convert index answers into real-world units and shapes:
 * - haversineKm: great-circle distance in kilometres
 * - degreeBoxesAround: degree rectangles that cover a radius in km
 * - placesToFeatureCollection: GeoJSON export for map viewers
 */

import { distance, featureCollection, point } from '@turf/turf';
import type { FeatureCollection, Point as GeoJSONPoint } from 'geojson';
import { KM_PER_DEGREE } from './constants.js';
import type { Place, PlaceMatch, Point } from './types.js';

// ============================================================================
// Distances
// ============================================================================

/**
 * Great-circle distance between two [lon, lat] points in kilometres
 */
export function haversineKm(from: Point, to: Point): number {
  return distance([from[0], from[1]], [to[0], to[1]], { units: 'kilometers' });
}

// ============================================================================
// Bounding Boxes
// ============================================================================

/**
 * Closed [lon, lat] degree rectangle
 */
export interface DegreeBox {
  readonly min: Point;
  readonly max: Point;
}

const DEG_TO_RAD = Math.PI / 180;

/**
 * Degree rectangles that together contain every point within `radiusKm`
 * great-circle kilometres of a centre
 *
 * Latitude half-height is radiusKm / 111. The longitude half-width is the
 * widest meridian offset on the circle, asin(sin(r) / cos(lat)). A circle that
 * reaches a pole spans every longitude; one that crosses the antimeridian is
 * split into an eastern and a western rectangle.
 */
export function degreeBoxesAround(lon: number, lat: number, radiusKm: number): DegreeBox[] {
  const halfHeight = radiusKm / KM_PER_DEGREE;
  const minLat = Math.max(lat - halfHeight, -90);
  const maxLat = Math.min(lat + halfHeight, 90);

  const reachesPole = lat + halfHeight >= 90 || lat - halfHeight <= -90;
  const ratio = Math.sin(halfHeight * DEG_TO_RAD) / Math.cos(lat * DEG_TO_RAD);
  if (reachesPole || ratio >= 1) {
    return [{ min: [-180, minLat], max: [180, maxLat] }];
  }

  const halfWidth = Math.asin(ratio) / DEG_TO_RAD;
  const west = lon - halfWidth;
  const east = lon + halfWidth;

  if (west < -180) {
    return [
      { min: [west + 360, minLat], max: [180, maxLat] },
      { min: [-180, minLat], max: [east, maxLat] },
    ];
  }
  if (east > 180) {
    return [
      { min: [west, minLat], max: [180, maxLat] },
      { min: [-180, minLat], max: [east - 360, maxLat] },
    ];
  }
  return [{ min: [west, minLat], max: [east, maxLat] }];
}

// ============================================================================
// GeoJSON Export
// ============================================================================

/**
 * Properties attached to every exported place feature
 */
export type PlaceFeatureProperties = {
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly address: string;
  readonly distanceKm?: number;
};

/**
 * Convert places (or search matches) to a GeoJSON FeatureCollection
 *
 * Matches keep their distance as a `distanceKm` property.
 */
export function placesToFeatureCollection(
  items: readonly (Place | PlaceMatch)[]
): FeatureCollection<GeoJSONPoint, PlaceFeatureProperties> {
  const features = items.map((item) => {
    const place = 'place' in item ? item.place : item;
    const properties: PlaceFeatureProperties = {
      id: place.id,
      name: place.name,
      type: place.type,
      address: place.address,
      ...('distanceKm' in item ? { distanceKm: item.distanceKm } : {}),
    };
    return point([place.lon, place.lat], properties, { id: place.id });
  });

  return featureCollection(features);
}
