/**
 * Nominatim Geocoder
 *
 * Resolves place names to coordinates through the OpenStreetMap Nominatim
 * search API. The catalog only depends on the `Geocoder` interface; tests
 * and alternative services plug in their own implementation.
 *
 * API: https://nominatim.org/release-docs/latest/api/Search/
 */

import { GeocodingError } from '../core/errors.js';
import { HTTPClient, type HTTPClientConfig } from '../core/http-client.js';
import { createLogger } from '../core/utils/logger.js';
import {
  NominatimResponseSchema,
  formatValidationError,
  type NominatimHit,
} from '../validation/schemas.js';

const logger = createLogger({ module: 'nominatim-geocoder' });

// ============================================================================
// Types
// ============================================================================

/**
 * Single geocoding hit in [lon, lat] order
 */
export interface GeocodeResult {
  /** Short name: first component of the display name */
  readonly name: string;
  /** Full display name, used as the address */
  readonly displayName: string;
  readonly lon: number;
  readonly lat: number;
}

/**
 * Degree rectangle restricting a search
 */
export interface Viewbox {
  readonly minLon: number;
  readonly minLat: number;
  readonly maxLon: number;
  readonly maxLat: number;
}

export interface GeocodeSearchOptions {
  readonly viewbox?: Viewbox;
  readonly limit?: number;
}

/**
 * Boundary between the catalog and any geocoding service
 */
export interface Geocoder {
  /** Best match for a free-form query, or null when nothing matches */
  locate(query: string): Promise<GeocodeResult | null>;

  /** All matches for a query, optionally bounded to a viewbox */
  search(query: string, options?: GeocodeSearchOptions): Promise<GeocodeResult[]>;
}

export interface NominatimGeocoderConfig {
  readonly baseUrl: string;
  readonly http?: Partial<HTTPClientConfig>;
}

// ============================================================================
// Implementation
// ============================================================================

export class NominatimGeocoder implements Geocoder {
  private readonly baseUrl: string;
  private readonly client: HTTPClient;

  constructor(config: NominatimGeocoderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.client = new HTTPClient(config.http);
  }

  async locate(query: string): Promise<GeocodeResult | null> {
    const hits = await this.search(query, { limit: 1 });
    return hits[0] ?? null;
  }

  async search(query: string, options: GeocodeSearchOptions = {}): Promise<GeocodeResult[]> {
    const url = this.buildSearchUrl(query, options);
    logger.debug('Geocoder search', { query, url });

    let body: unknown;
    try {
      body = await this.client.fetchJSON<unknown>(url);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new GeocodingError(`Geocoder request failed: ${cause.message}`, query, cause);
    }

    const parsed = NominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new GeocodingError(
        `Unexpected geocoder response: ${formatValidationError(parsed.error)}`,
        query
      );
    }

    const results = parsed.data.map(toGeocodeResult);
    logger.info('Geocoder search complete', { query, results: results.length });
    return results;
  }

  /**
   * Build a Nominatim /search URL
   *
   * Nominatim expects viewbox as "minLon,minLat,maxLon,maxLat"; bounded=1
   * restricts hits to that box instead of merely preferring it.
   */
  buildSearchUrl(query: string, options: GeocodeSearchOptions = {}): string {
    const params = new URLSearchParams({ q: query, format: 'json' });

    if (options.viewbox) {
      const { minLon, minLat, maxLon, maxLat } = options.viewbox;
      params.set('viewbox', `${minLon},${minLat},${maxLon},${maxLat}`);
      params.set('bounded', '1');
      params.set('addressdetails', '1');
    }
    if (options.limit !== undefined) {
      params.set('limit', String(options.limit));
    }

    return `${this.baseUrl}/search?${params.toString()}`;
  }
}

function toGeocodeResult(hit: NominatimHit): GeocodeResult {
  const name = hit.display_name.split(',')[0]?.trim() ?? '';
  return {
    name: name || hit.display_name,
    displayName: hit.display_name,
    lon: hit.lon,
    lat: hit.lat,
  };
}
