/**
 * Place Catalog
 *
 * Named places (shops, cafés, hospitals…) indexed by [lon, lat] in k-d trees:
 * one tree over every place plus one tree per place type, so type-filtered
 * nearest searches never rebuild an index.
 *
 * DISTANCES:
 * The trees answer in planar degrees. Everything the catalog returns is
 * converted to great-circle kilometres (haversine) before it leaves.
 *
 * CO-LOCATED PLACES:
 * Places with identical coordinates share one tree node (a bucket). Removing
 * a place empties its bucket slot; the node itself is deleted only when the
 * bucket is empty, so a removal never evicts a neighbour at the same spot.
 */

import type { z } from 'zod';
import { DEFAULT_CITY_SPAN_DEGREES } from '../core/constants.js';
import {
  DuplicatePlaceError,
  InvalidCoordinateError,
  PlaceValidationError,
} from '../core/errors.js';
import { degreeBoxesAround, haversineKm } from '../core/geo-utils.js';
import { KDTree } from '../core/kd-tree.js';
import type { Place, PlaceMatch, Point } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { Geocoder } from '../providers/nominatim-geocoder.js';
import {
  CoordinateSchema,
  PlaceRecordSchema,
  formatValidationError,
  type PlaceRecord,
} from '../validation/schemas.js';

const logger = createLogger({ module: 'place-catalog' });

/**
 * Place as supplied by callers (address optional)
 */
export type PlaceInput = z.input<typeof PlaceRecordSchema>;

export interface GeocoderImportOptions {
  /** City whose centre anchors the search, e.g. "Krasnoyarsk" */
  readonly city: string;
  /** Free-text place type, used both as query and as the stored type */
  readonly type: string;
  /** Maximum hits requested from the geocoder (default: 20) */
  readonly limit?: number;
  /** Half-size of the search box around the centre in degrees (default: 0.2) */
  readonly spanDegrees?: number;
}

// ============================================================================
// Bucketed Index
// ============================================================================

function coordinateKey(lon: number, lat: number): string {
  return `${lon}|${lat}`;
}

/**
 * k-d tree whose nodes hold every place sharing one coordinate pair
 */
class PlaceIndex {
  private readonly tree = new KDTree<Place[]>();
  private readonly buckets = new Map<string, Place[]>();
  private count = 0;

  get size(): number {
    return this.count;
  }

  add(place: Place): void {
    const key = coordinateKey(place.lon, place.lat);
    const bucket = this.buckets.get(key);
    this.count++;

    if (bucket) {
      bucket.push(place);
      return;
    }

    const created = [place];
    this.buckets.set(key, created);
    this.tree.insert([place.lon, place.lat], created);
  }

  remove(place: Place): boolean {
    const key = coordinateKey(place.lon, place.lat);
    const bucket = this.buckets.get(key);
    const position = bucket ? bucket.findIndex((candidate) => candidate.id === place.id) : -1;

    if (!bucket || position === -1) {
      return false;
    }

    bucket.splice(position, 1);
    this.count--;

    if (bucket.length === 0) {
      this.buckets.delete(key);
      this.tree.delete([place.lon, place.lat]);
    }
    return true;
  }

  nearest(target: Point): Place | null {
    const hit = this.tree.nearestNeighbor(target);
    return hit?.payload[0] ?? null;
  }

  range(min: Point, max: Point): Place[] {
    return this.tree.rangeSearch(min, max).flatMap((entry) => entry.payload);
  }
}

// ============================================================================
// Catalog
// ============================================================================

export class PlaceCatalog {
  private readonly places = new Map<string, Place>();
  private readonly index = new PlaceIndex();
  private readonly indexByType = new Map<string, PlaceIndex>();

  /**
   * Rebuild a catalog from persisted records
   */
  static fromRecords(records: readonly PlaceInput[]): PlaceCatalog {
    const catalog = new PlaceCatalog();
    for (const record of records) {
      catalog.addPlace(record);
    }
    return catalog;
  }

  get size(): number {
    return this.places.size;
  }

  // --------------------------------------------------------------------------
  // Mutation
  // --------------------------------------------------------------------------

  /**
   * Validate and index a place
   *
   * @throws {PlaceValidationError} If the record fails validation
   * @throws {DuplicatePlaceError} If the id is already present
   */
  addPlace(input: PlaceInput): Place {
    const parsed = PlaceRecordSchema.safeParse(input);
    if (!parsed.success) {
      throw new PlaceValidationError(
        `Invalid place: ${formatValidationError(parsed.error)}`,
        input.id
      );
    }

    const place: Place = { ...parsed.data };
    if (this.places.has(place.id)) {
      throw new DuplicatePlaceError(place.id);
    }

    this.places.set(place.id, place);
    this.index.add(place);
    this.typeIndex(place.type).add(place);

    logger.debug('Place added', { id: place.id, type: place.type });
    return place;
  }

  /**
   * Remove a place by id
   *
   * @returns true if the place existed
   */
  removePlace(id: string): boolean {
    const place = this.places.get(id);
    if (!place) {
      return false;
    }

    this.places.delete(id);
    this.index.remove(place);

    const byType = this.indexByType.get(place.type);
    if (byType) {
      byType.remove(place);
      if (byType.size === 0) {
        this.indexByType.delete(place.type);
      }
    }

    logger.debug('Place removed', { id, type: place.type });
    return true;
  }

  // --------------------------------------------------------------------------
  // Lookup
  // --------------------------------------------------------------------------

  getPlace(id: string): Place | undefined {
    return this.places.get(id);
  }

  /**
   * All places (or all of one type) in insertion order
   */
  listPlaces(type?: string): Place[] {
    const all = [...this.places.values()];
    return type === undefined ? all : all.filter((place) => place.type === type);
  }

  filterByType(type: string): Place[] {
    return this.listPlaces(type);
  }

  /**
   * Distinct place types, sorted
   */
  getPlaceTypes(): string[] {
    return [...this.indexByType.keys()].sort();
  }

  // --------------------------------------------------------------------------
  // Spatial Queries
  // --------------------------------------------------------------------------

  /**
   * Nearest place to a coordinate, optionally restricted to one type
   *
   * Nearness is decided in planar lon/lat degrees by the index; the returned
   * distance is the great-circle distance in km.
   *
   * @returns Match, or null when the catalog (or the type) is empty
   */
  findNearest(lon: number, lat: number, type?: string): PlaceMatch | null {
    assertCoordinates(lon, lat);

    const source = type === undefined ? this.index : this.indexByType.get(type);
    const place = source?.nearest([lon, lat]) ?? null;
    if (!place) {
      return null;
    }

    return { place, distanceKm: haversineKm([lon, lat], [place.lon, place.lat]) };
  }

  /**
   * Places within `radiusKm` great-circle kilometres of a centre
   *
   * Candidates come from degree boxes around the centre (two when the circle
   * crosses the antimeridian); each is then kept only if its haversine
   * distance is within the radius.
   *
   * @returns Matches sorted by ascending distance
   */
  searchInArea(lon: number, lat: number, radiusKm: number, type?: string): PlaceMatch[] {
    assertCoordinates(lon, lat);
    if (!Number.isFinite(radiusKm) || radiusKm < 0) {
      throw new Error(`Radius must be a non-negative number of km, got ${radiusKm}`);
    }

    const matches: PlaceMatch[] = [];

    for (const { min, max } of degreeBoxesAround(lon, lat, radiusKm)) {
      for (const place of this.searchInBox(min, max, type)) {
        const distanceKm = haversineKm([lon, lat], [place.lon, place.lat]);
        if (distanceKm <= radiusKm) {
          matches.push({ place, distanceKm });
        }
      }
    }

    return matches.sort((a, b) => a.distanceKm - b.distanceKm);
  }

  /**
   * Places inside a closed [lon, lat] degree rectangle
   */
  searchInBox(min: Point, max: Point, type?: string): Place[] {
    const source = type === undefined ? this.index : this.indexByType.get(type);
    return source ? source.range(min, max) : [];
  }

  // --------------------------------------------------------------------------
  // Import / Export
  // --------------------------------------------------------------------------

  /**
   * Import places of one type around a city from a geocoder
   *
   * Ids are derived from type and coordinates, so re-importing the same hits
   * skips them instead of failing. A hit that fails place validation is
   * logged and skipped; the rest of the batch is still imported.
   *
   * @returns Number of places added
   */
  async loadFromGeocoder(geocoder: Geocoder, options: GeocoderImportOptions): Promise<number> {
    const span = options.spanDegrees ?? DEFAULT_CITY_SPAN_DEGREES;
    const log = logger.child({ city: options.city, type: options.type });
    const center = await geocoder.locate(options.city);

    if (!center) {
      log.warn('City not found by geocoder');
      return 0;
    }

    const hits = await geocoder.search(options.type, {
      viewbox: {
        minLon: center.lon - span,
        minLat: center.lat - span,
        maxLon: center.lon + span,
        maxLat: center.lat + span,
      },
      limit: options.limit ?? 20,
    });

    let added = 0;
    for (const hit of hits) {
      const id = `${options.type}:${hit.lon.toFixed(6)},${hit.lat.toFixed(6)}`;
      if (this.places.has(id)) {
        log.debug('Skipping known place', { id });
        continue;
      }

      try {
        this.addPlace({
          id,
          // Unnamed hits are stored under their type
          name: hit.name.trim() || options.type,
          type: options.type,
          lon: hit.lon,
          lat: hit.lat,
          address: hit.displayName,
        });
        added++;
      } catch (error) {
        if (!(error instanceof PlaceValidationError)) {
          throw error;
        }
        log.warn('Skipping invalid geocoder hit', { id, error: error.message });
      }
    }

    log.info('Imported places from geocoder', { found: hits.length, added });
    return added;
  }

  /**
   * Plain records for persistence, in insertion order
   */
  toRecords(): PlaceRecord[] {
    return this.listPlaces().map((place) => ({ ...place }));
  }

  private typeIndex(type: string): PlaceIndex {
    let byType = this.indexByType.get(type);
    if (!byType) {
      byType = new PlaceIndex();
      this.indexByType.set(type, byType);
    }
    return byType;
  }
}

/**
 * @throws {InvalidCoordinateError} For non-finite or out-of-range lon/lat
 */
function assertCoordinates(lon: number, lat: number): void {
  const result = CoordinateSchema.safeParse({ lon, lat });
  if (!result.success) {
    throw new InvalidCoordinateError(formatValidationError(result.error), [lon, lat]);
  }
}
