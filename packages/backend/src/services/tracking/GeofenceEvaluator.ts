/**
 * Geofence Evaluator
 *
 * Great-circle distance and circular safe-zone membership for points of interest.
 */

import { EARTH_RADIUS_METERS } from '@safetrail/shared';
import { FenceEvaluation, PointOfInterest } from '../../types/tracking';

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

export class GeofenceEvaluator {
  /**
   * Haversine distance in meters between two points given in degrees
   */
  static distanceMeters(lat1: number, lon1: number, lat2: number, lon2: number): number {
    const dLat = toRadians(lat2 - lat1);
    const dLon = toRadians(lon2 - lon1);

    const h = Math.sin(dLat / 2) * Math.sin(dLat / 2) +
              Math.cos(toRadians(lat1)) * Math.cos(toRadians(lat2)) *
              Math.sin(dLon / 2) * Math.sin(dLon / 2);

    // Rounding can push h slightly past 1 for antipodal points
    const a = Math.min(1, Math.max(0, h));
    const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

    return EARTH_RADIUS_METERS * c;
  }

  /**
   * Boundary inclusive: a point exactly `radiusMeters` away is inside
   */
  static isInside(lat: number, lon: number, poi: PointOfInterest): boolean {
    return this.distanceMeters(lat, lon, poi.latitude, poi.longitude) <= poi.radiusMeters;
  }

  static evaluate(lat: number, lon: number, poi: PointOfInterest): FenceEvaluation {
    const distanceMeters = this.distanceMeters(lat, lon, poi.latitude, poi.longitude);
    return {
      distanceMeters,
      insideFence: distanceMeters <= poi.radiusMeters,
    };
  }
}
