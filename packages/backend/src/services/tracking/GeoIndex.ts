/**
 * Point of interest registry
 *
 * Fixed set of named landmarks with their safe-zone radius. Unknown ids resolve
 * to the first entry, so lookups made on behalf of stored subjects never fail.
 */

import { Feature, FeatureCollection, Point } from 'geojson';
import { ConfigurationError, PointOfInterest } from '../../types/tracking';
import seedPoints from '../../config/points-of-interest.json';

export class GeoIndex {
  private readonly entries: readonly PointOfInterest[];
  private readonly byIdMap: Map<number, PointOfInterest>;

  constructor(points: readonly PointOfInterest[]) {
    if (points.length === 0) {
      throw new ConfigurationError('At least one point of interest is required');
    }

    this.byIdMap = new Map();
    for (const point of points) {
      if (this.byIdMap.has(point.id)) {
        throw new ConfigurationError(`Duplicate point of interest id: ${point.id}`);
      }
      if (!(point.radiusMeters > 0)) {
        throw new ConfigurationError(`Point of interest ${point.id} must have a positive radius`);
      }
      this.byIdMap.set(point.id, Object.freeze({ ...point }));
    }

    this.entries = Object.freeze(points.map(point => this.byIdMap.get(point.id) ?? point));
  }

  static fromSeed(): GeoIndex {
    return new GeoIndex(seedPoints);
  }

  /**
   * Matching entry, or the default entry for any unknown or invalid id
   */
  byId(id: number): PointOfInterest {
    return this.byIdMap.get(id) ?? this.defaultEntry();
  }

  has(id: number): boolean {
    return this.byIdMap.has(id);
  }

  defaultEntry(): PointOfInterest {
    return this.entries[0];
  }

  list(): readonly PointOfInterest[] {
    return this.entries;
  }

  toFeatureCollection(): FeatureCollection<Point> {
    const features: Feature<Point>[] = this.entries.map(entry => ({
      type: 'Feature',
      id: entry.id,
      geometry: {
        type: 'Point',
        coordinates: [entry.longitude, entry.latitude],
      },
      properties: {
        name: entry.name,
        radiusMeters: entry.radiusMeters,
      },
    }));

    return { type: 'FeatureCollection', features };
  }
}
