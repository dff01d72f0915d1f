/**
 * Geographic Utilities Tests
 */

import { describe, it, expect } from 'vitest';
import { KM_PER_DEGREE } from '../../../core/constants.js';
import {
  degreeBoxesAround,
  haversineKm,
  placesToFeatureCollection,
} from '../../../core/geo-utils.js';
import type { Place } from '../../../core/types.js';

const pharmacy: Place = {
  id: 'pharmacy-1',
  name: 'Pharmacy',
  type: 'pharmacy',
  lon: 92.88,
  lat: 56.01,
  address: 'Mira Ave, 5',
};

describe('haversineKm', () => {
  it('is zero for identical points', () => {
    expect(haversineKm([92.88, 56.01], [92.88, 56.01])).toBe(0);
  });

  it('measures one degree of latitude as about 111.2 km', () => {
    expect(haversineKm([0, 0], [0, 1])).toBeCloseTo(111.195, 2);
  });

  it('shrinks longitude degrees with latitude', () => {
    // 0.03 degrees of longitude at 56.01N
    expect(haversineKm([92.85, 56.01], [92.88, 56.01])).toBeCloseTo(1.865, 2);
  });
});

describe('degreeBoxesAround', () => {
  it('uses radius / 111 for the half-height at the equator', () => {
    const boxes = degreeBoxesAround(10, 0, 111);

    expect(boxes).toHaveLength(1);
    const [{ min, max }] = boxes;
    expect(min[1]).toBeCloseTo(-1, 12);
    expect(max[1]).toBeCloseTo(1, 12);
    expect(min[0]).toBeCloseTo(9, 12);
    expect(max[0]).toBeCloseTo(11, 12);
  });

  it('widens the longitude span away from the equator', () => {
    const [{ min, max }] = degreeBoxesAround(0, 60, KM_PER_DEGREE);

    // asin(sin(1) / cos(60)) = 2.0003 degrees, a little over 1 / cos(60)
    expect(max[0] - min[0]).toBeCloseTo(4.0006, 3);
    expect(max[0] - min[0]).toBeGreaterThan(4);
    expect(max[1] - min[1]).toBeCloseTo(2, 12);
  });

  it('covers every longitude when the circle reaches a pole', () => {
    const boxes = degreeBoxesAround(0, 90, 10);

    expect(boxes).toHaveLength(1);
    expect(boxes[0].min[0]).toBe(-180);
    expect(boxes[0].max[0]).toBe(180);
    expect(boxes[0].min[1]).toBeCloseTo(90 - 10 / 111, 12);
    expect(boxes[0].max[1]).toBe(90);
  });

  it('splits a circle that crosses the antimeridian eastwards', () => {
    const boxes = degreeBoxesAround(179.9, 0, 50);

    expect(boxes).toHaveLength(2);
    expect(boxes[0].min[0]).toBeCloseTo(179.9 - 50 / 111, 9);
    expect(boxes[0].max[0]).toBe(180);
    expect(boxes[1].min[0]).toBe(-180);
    expect(boxes[1].max[0]).toBeCloseTo(179.9 + 50 / 111 - 360, 9);
  });

  it('splits a circle that crosses the antimeridian westwards', () => {
    const boxes = degreeBoxesAround(-179.9, 0, 50);

    expect(boxes).toHaveLength(2);
    expect(boxes[0].min[0]).toBeCloseTo(-179.9 - 50 / 111 + 360, 9);
    expect(boxes[0].max[0]).toBe(180);
    expect(boxes[1].min[0]).toBe(-180);
    expect(boxes[1].max[0]).toBeCloseTo(-179.9 + 50 / 111, 9);
  });
});

describe('placesToFeatureCollection', () => {
  it('exports places as GeoJSON points in lon/lat order', () => {
    const collection = placesToFeatureCollection([pharmacy]);

    expect(collection.type).toBe('FeatureCollection');
    expect(collection.features).toHaveLength(1);

    const [feature] = collection.features;
    expect(feature.id).toBe('pharmacy-1');
    expect(feature.geometry).toEqual({ type: 'Point', coordinates: [92.88, 56.01] });
    expect(feature.properties).toEqual({
      id: 'pharmacy-1',
      name: 'Pharmacy',
      type: 'pharmacy',
      address: 'Mira Ave, 5',
    });
  });

  it('keeps the distance of search matches', () => {
    const collection = placesToFeatureCollection([{ place: pharmacy, distanceKm: 0.25 }]);

    expect(collection.features[0].properties.distanceKm).toBe(0.25);
  });
});
