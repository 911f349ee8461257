/**
 * Geofence evaluation and the point-of-interest index
 */

import { EARTH_RADIUS_METERS } from '@safetrail/shared';
import { GeofenceEvaluator } from '../services/tracking/GeofenceEvaluator';
import { GeoIndex } from '../services/tracking/GeoIndex';
import { ConfigurationError, PointOfInterest } from '../types/tracking';

const tajMahal: PointOfInterest = {
  id: 1,
  name: 'Taj Mahal, Agra',
  latitude: 27.1751,
  longitude: 78.0421,
  radiusMeters: 500,
};

describe('GeofenceEvaluator', () => {
  test('distance between identical points is zero', () => {
    expect(GeofenceEvaluator.distanceMeters(27.1751, 78.0421, 27.1751, 78.0421)).toBe(0);
  });

  test('one degree of latitude along a meridian', () => {
    expect(GeofenceEvaluator.distanceMeters(0, 0, 1, 0)).toBeCloseTo(111194.93, 1);
  });

  test('antipodal points are half the circumference apart', () => {
    expect(GeofenceEvaluator.distanceMeters(0, 0, 0, 180)).toBeCloseTo(Math.PI * EARTH_RADIUS_METERS, 3);
  });

  test('distance is symmetric', () => {
    const there = GeofenceEvaluator.distanceMeters(27.1751, 78.0421, 28.6562, 77.241);
    const back = GeofenceEvaluator.distanceMeters(28.6562, 77.241, 27.1751, 78.0421);
    expect(there).toBeCloseTo(back, 6);
  });

  test('the center of a point of interest is inside its fence', () => {
    expect(GeofenceEvaluator.isInside(tajMahal.latitude, tajMahal.longitude, tajMahal)).toBe(true);
  });

  test('the boundary is inclusive', () => {
    const lat = 27.1791;
    const lon = 78.0421;
    const distance = GeofenceEvaluator.distanceMeters(lat, lon, tajMahal.latitude, tajMahal.longitude);

    expect(GeofenceEvaluator.isInside(lat, lon, { ...tajMahal, radiusMeters: distance })).toBe(true);
    expect(GeofenceEvaluator.isInside(lat, lon, { ...tajMahal, radiusMeters: distance - 0.001 })).toBe(false);
  });

  test('evaluate reports distance and membership together', () => {
    const outside = GeofenceEvaluator.evaluate(27.2, 78.0421, tajMahal);
    expect(outside.insideFence).toBe(false);
    expect(outside.distanceMeters).toBeGreaterThan(2700);
    expect(outside.distanceMeters).toBeLessThan(2800);

    const nearby = GeofenceEvaluator.evaluate(27.1751, 78.0425, tajMahal);
    expect(nearby.insideFence).toBe(true);
    expect(nearby.distanceMeters).toBeLessThan(50);
  });
});

describe('GeoIndex', () => {
  const index = GeoIndex.fromSeed();

  test('loads the seeded landmarks', () => {
    expect(index.list()).toHaveLength(7);
    expect(index.byId(1)).toEqual(tajMahal);
    expect(index.byId(6).name).toBe('India Gate, New Delhi');
  });

  test('unknown ids fall back to the first entry', () => {
    expect(index.has(999)).toBe(false);
    expect(index.byId(999)).toBe(index.defaultEntry());
    expect(index.byId(999).name).toBe('Taj Mahal, Agra');
  });

  test('entries are frozen', () => {
    expect(Object.isFrozen(index.byId(2))).toBe(true);
    expect(Object.isFrozen(index.list())).toBe(true);
  });

  test('rejects an empty list, duplicate ids and non-positive radii', () => {
    expect(() => new GeoIndex([])).toThrow(ConfigurationError);
    expect(() => new GeoIndex([tajMahal, { ...tajMahal, name: 'Copy' }])).toThrow('Duplicate point of interest id: 1');
    expect(() => new GeoIndex([{ ...tajMahal, radiusMeters: 0 }])).toThrow(ConfigurationError);
  });

  test('renders points as GeoJSON in lon/lat order', () => {
    const collection = index.toFeatureCollection();

    expect(collection.type).toBe('FeatureCollection');
    expect(collection.features).toHaveLength(7);
    expect(collection.features[0]).toEqual({
      type: 'Feature',
      id: 1,
      geometry: { type: 'Point', coordinates: [78.0421, 27.1751] },
      properties: { name: 'Taj Mahal, Agra', radiusMeters: 500 },
    });
  });
});
