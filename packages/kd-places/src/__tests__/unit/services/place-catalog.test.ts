/**
 * PlaceCatalog Unit Tests
 *
 * Runs against the bundled sample places (central Krasnoyarsk). Distances
 * quoted in comments are great-circle kilometres.
 */

import { describe, it, expect, afterEach, beforeEach, vi } from 'vitest';
import {
  DuplicatePlaceError,
  InvalidCoordinateError,
  PlaceValidationError,
} from '../../../core/errors.js';
import { SAMPLE_DATA_FILE } from '../../../cli/lib/context.js';
import { loadCatalog } from '../../../cli/lib/ndjson.js';
import type { GeocodeResult, Geocoder } from '../../../providers/nominatim-geocoder.js';
import { resetLogWriter, setLogWriter } from '../../../core/utils/logger.js';
import { PlaceCatalog } from '../../../services/place-catalog.js';
import { captureWriter, type CapturedLog } from '../../utils/log-capture.js';

type Identified = { readonly id: string } | { readonly place: { readonly id: string } };

function ids(items: readonly Identified[]): string[] {
  return items.map((item) => ('place' in item ? item.place.id : item.id));
}

describe('PlaceCatalog', () => {
  let catalog: PlaceCatalog;

  beforeEach(async () => {
    catalog = await loadCatalog(SAMPLE_DATA_FILE);
  });

  describe('lookup', () => {
    it('loads every sample place in file order', () => {
      expect(catalog.size).toBe(8);
      expect(ids(catalog.listPlaces()).slice(0, 3)).toEqual(['shop-1', 'cafe-1', 'hospital-1']);
    });

    it('lists distinct types sorted', () => {
      expect(catalog.getPlaceTypes()).toEqual([
        'beauty salon',
        'cafe',
        'hospital',
        'pharmacy',
        'restaurant',
        'shop',
      ]);
    });

    it('filters by type', () => {
      expect(ids(catalog.filterByType('cafe'))).toEqual(['cafe-1', 'cafe-2']);
      expect(catalog.listPlaces('museum')).toEqual([]);
    });

    it('gets a place by id', () => {
      expect(catalog.getPlace('pharmacy-1')?.name).toBe('Pharmacy');
      expect(catalog.getPlace('missing')).toBeUndefined();
    });
  });

  describe('addPlace', () => {
    it('defaults the address to an empty string', () => {
      const place = catalog.addPlace({
        id: 'kiosk-1',
        name: 'Kiosk',
        type: 'shop',
        lon: 92.9,
        lat: 56.0,
      });

      expect(place.address).toBe('');
      expect(catalog.size).toBe(9);
    });

    it('rejects a duplicate id', () => {
      expect(() =>
        catalog.addPlace({ id: 'cafe-1', name: 'Copy', type: 'cafe', lon: 92.8, lat: 56.0 })
      ).toThrow(DuplicatePlaceError);
    });

    it('rejects coordinates out of range', () => {
      expect(() =>
        catalog.addPlace({ id: 'bad', name: 'Bad', type: 'cafe', lon: 92.8, lat: 100 })
      ).toThrow(new PlaceValidationError('Invalid place: lat: Latitude must be between -90 and 90', 'bad'));
    });
  });

  describe('removePlace', () => {
    it('removes a place from every index', () => {
      expect(catalog.removePlace('pharmacy-1')).toBe(true);

      expect(catalog.getPlace('pharmacy-1')).toBeUndefined();
      expect(catalog.getPlaceTypes()).not.toContain('pharmacy');
      expect(catalog.findNearest(92.88, 56.01, 'pharmacy')).toBeNull();
      expect(catalog.findNearest(92.881, 56.011)?.place.id).not.toBe('pharmacy-1');
    });

    it('returns false for an unknown id', () => {
      expect(catalog.removePlace('missing')).toBe(false);
      expect(catalog.size).toBe(8);
    });

    it('keeps a co-located place when its neighbour is removed', () => {
      catalog.addPlace({
        id: 'pharmacy-2',
        name: 'Night pharmacy',
        type: 'pharmacy',
        lon: 92.88,
        lat: 56.01,
      });

      expect(catalog.removePlace('pharmacy-1')).toBe(true);
      expect(catalog.findNearest(92.88, 56.01)?.place.id).toBe('pharmacy-2');
      expect(ids(catalog.searchInBox([92.88, 56.01], [92.88, 56.01]))).toEqual(['pharmacy-2']);
    });
  });

  describe('findNearest', () => {
    it('finds the nearest place of any type', () => {
      const match = catalog.findNearest(92.881, 56.011);

      expect(match?.place.id).toBe('pharmacy-1');
      expect(match?.distanceKm).toBeCloseTo(0.13, 2);
    });

    it('restricts to one type', () => {
      expect(catalog.findNearest(92.881, 56.011, 'cafe')?.place.id).toBe('cafe-1');
    });

    it('returns null for an unknown type', () => {
      expect(catalog.findNearest(92.881, 56.011, 'museum')).toBeNull();
    });

    it('rejects invalid coordinates', () => {
      expect(() => catalog.findNearest(92.88, 91)).toThrow(InvalidCoordinateError);
      expect(() => catalog.findNearest(Number.NaN, 56)).toThrow(InvalidCoordinateError);
    });
  });

  describe('searchInArea', () => {
    it('returns places within the radius, nearest first', () => {
      // pharmacy 0, cafe-1 1.11, shop-2 1.27, restaurant 1.67, shop-1 1.86
      const matches = catalog.searchInArea(92.88, 56.01, 2);

      expect(ids(matches)).toEqual(['pharmacy-1', 'cafe-1', 'shop-2', 'restaurant-1', 'shop-1']);
      expect(matches[0].distanceKm).toBe(0);
      expect(matches[1].distanceKm).toBeCloseTo(1.112, 2);
    });

    it('drops box corners beyond the radius', () => {
      // shop-2 is inside the degree box but 1.27 km away
      expect(ids(catalog.searchInArea(92.88, 56.01, 1.2))).toEqual(['pharmacy-1', 'cafe-1']);
    });

    it('restricts to one type', () => {
      expect(ids(catalog.searchInArea(92.88, 56.01, 2, 'shop'))).toEqual(['shop-2', 'shop-1']);
    });

    it('finds places across the antimeridian', () => {
      const world = PlaceCatalog.fromRecords([
        { id: 'date-line-west', name: 'West', type: 'buoy', lon: 179.8, lat: 0 },
        { id: 'date-line-east', name: 'East', type: 'buoy', lon: -179.9, lat: 0 },
        { id: 'far-east', name: 'Far', type: 'buoy', lon: -179, lat: 0 },
      ]);

      const matches = world.searchInArea(179.9, 0, 50);

      // 0.1 and 0.2 degrees of longitude on the equator
      expect(ids(matches)).toEqual(['date-line-west', 'date-line-east']);
      expect(matches[1].distanceKm).toBeCloseTo(22.239, 2);
    });

    it('keeps places at the edge of a wide high-latitude circle', () => {
      const arctic = PlaceCatalog.fromRecords([
        { id: 'arctic-near', name: 'Near', type: 'station', lon: 26, lat: 80 },
        { id: 'arctic-far', name: 'Far', type: 'station', lon: 30, lat: 80 },
      ]);

      // 26 degrees east along 80N is 497.9 km; 30 degrees is 572.9 km
      const matches = arctic.searchInArea(0, 80, 500);

      expect(ids(matches)).toEqual(['arctic-near']);
      expect(matches[0].distanceKm).toBeCloseTo(497.85, 0);
    });

    it('searches every longitude when the circle covers a pole', () => {
      const polar = PlaceCatalog.fromRecords([
        { id: 'across-pole', name: 'Across', type: 'station', lon: 180, lat: 89.5 },
      ]);

      // 1 degree up to the pole, 0.5 degrees down the opposite meridian
      const matches = polar.searchInArea(0, 89, 200);

      expect(ids(matches)).toEqual(['across-pole']);
      expect(matches[0].distanceKm).toBeCloseTo(166.79, 1);
    });

    it('rejects a negative radius', () => {
      expect(() => catalog.searchInArea(92.88, 56.01, -1)).toThrow(
        'Radius must be a non-negative number of km, got -1'
      );
    });
  });

  describe('searchInBox', () => {
    it('includes places on the edges', () => {
      const places = catalog.searchInBox([92.86, 56.01], [92.88, 56.02]);

      expect(ids(places).sort()).toEqual(['cafe-1', 'pharmacy-1', 'restaurant-1']);
    });

    it('returns nothing for an unknown type', () => {
      expect(catalog.searchInBox([90, 50], [95, 60], 'museum')).toEqual([]);
    });
  });

  describe('persistence', () => {
    it('round-trips through records', () => {
      const copy = PlaceCatalog.fromRecords(catalog.toRecords());

      expect(copy.listPlaces()).toEqual(catalog.listPlaces());
    });
  });

  describe('loadFromGeocoder', () => {
    const center: GeocodeResult = {
      name: 'Krasnoyarsk',
      displayName: 'Krasnoyarsk, Krasnoyarsk Krai, Russia',
      lon: 92.87,
      lat: 56.01,
    };

    const hits: GeocodeResult[] = [
      { name: 'Cafe Sever', displayName: 'Cafe Sever, Mira Ave, Krasnoyarsk', lon: 92.881, lat: 56.012 },
      { name: 'Cafe Yug', displayName: 'Cafe Yug, Lenina St, Krasnoyarsk', lon: 92.86, lat: 56.005 },
    ];

    afterEach(() => {
      resetLogWriter();
    });

    function fakeGeocoder(found: GeocodeResult | null, results: GeocodeResult[] = hits) {
      const locate = vi.fn().mockResolvedValue(found);
      const search = vi.fn().mockResolvedValue(results);
      const geocoder: Geocoder = { locate, search };
      return { geocoder, locate, search };
    }

    it('adds every hit around the city centre', async () => {
      const { geocoder, locate, search } = fakeGeocoder(center);

      const added = await catalog.loadFromGeocoder(geocoder, { city: 'Krasnoyarsk', type: 'cafe' });

      expect(added).toBe(2);
      expect(locate).toHaveBeenCalledWith('Krasnoyarsk');
      expect(search).toHaveBeenCalledTimes(1);

      const [query, options] = search.mock.calls[0];
      expect(query).toBe('cafe');
      expect(options.limit).toBe(20);
      expect(options.viewbox.minLon).toBeCloseTo(92.67, 9);
      expect(options.viewbox.maxLat).toBeCloseTo(56.21, 9);

      const imported = catalog.getPlace('cafe:92.881000,56.012000');
      expect(imported).toEqual({
        id: 'cafe:92.881000,56.012000',
        name: 'Cafe Sever',
        type: 'cafe',
        lon: 92.881,
        lat: 56.012,
        address: 'Cafe Sever, Mira Ave, Krasnoyarsk',
      });
    });

    it('skips hits that were imported before', async () => {
      const { geocoder } = fakeGeocoder(center);

      await catalog.loadFromGeocoder(geocoder, { city: 'Krasnoyarsk', type: 'cafe' });
      const again = await catalog.loadFromGeocoder(geocoder, { city: 'Krasnoyarsk', type: 'cafe' });

      expect(again).toBe(0);
      expect(catalog.size).toBe(10);
    });

    it('stores an unnamed hit under its type', async () => {
      const { geocoder } = fakeGeocoder(center, [
        hits[0],
        { name: '', displayName: '', lon: 92.9, lat: 56.02 },
      ]);

      const added = await catalog.loadFromGeocoder(geocoder, { city: 'Krasnoyarsk', type: 'cafe' });

      expect(added).toBe(2);
      expect(catalog.getPlace('cafe:92.900000,56.020000')).toMatchObject({
        name: 'cafe',
        address: '',
      });
    });

    it('skips a hit that fails validation and imports the rest', async () => {
      const entries: CapturedLog[] = [];
      setLogWriter(captureWriter(entries));
      const { geocoder } = fakeGeocoder(center, [
        { name: 'Polar cafe', displayName: 'Polar cafe', lon: 92.9, lat: 95 },
        hits[1],
      ]);

      const added = await catalog.loadFromGeocoder(geocoder, { city: 'Krasnoyarsk', type: 'cafe' });

      expect(added).toBe(1);
      expect(catalog.getPlace('cafe:92.860000,56.005000')?.name).toBe('Cafe Yug');
      expect(entries.filter((entry) => entry.level === 'warn')).toEqual([
        {
          level: 'warn',
          message: 'Skipping invalid geocoder hit',
          metadata: {
            module: 'place-catalog',
            city: 'Krasnoyarsk',
            type: 'cafe',
            id: 'cafe:92.900000,95.000000',
            error: 'Invalid place: lat: Latitude must be between -90 and 90',
          },
        },
      ]);
    });

    it('adds nothing when the city is unknown', async () => {
      const { geocoder, search } = fakeGeocoder(null);

      const added = await catalog.loadFromGeocoder(geocoder, { city: 'Atlantis', type: 'cafe' });

      expect(added).toBe(0);
      expect(search).not.toHaveBeenCalled();
    });
  });
});
