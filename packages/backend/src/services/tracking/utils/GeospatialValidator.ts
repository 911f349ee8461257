/**
 * Input validation for location reports
 *
 * Coordinates arrive from untrusted clients; everything is checked before any
 * subject state is touched.
 */

import { Coordinate, InvalidArgumentError } from '../../../types/tracking';

export class GeospatialValidator {
  /**
   * Validate a latitude/longitude pair in degrees
   */
  static validateCoordinate(latitude: number, longitude: number): Coordinate {
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new InvalidArgumentError('Coordinates must be finite numbers');
    }

    if (latitude < -90 || latitude > 90) {
      throw new InvalidArgumentError('Latitude must be between -90 and 90 degrees', { latitude });
    }

    if (longitude < -180 || longitude > 180) {
      throw new InvalidArgumentError('Longitude must be between -180 and 180 degrees', { longitude });
    }

    return { latitude, longitude };
  }

  static requireNumber(value: unknown, field: string): number {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      throw new InvalidArgumentError(`${field} must be a numeric value`, { field });
    }
    return value;
  }

  static requireString(value: unknown, field: string): string {
    if (typeof value !== 'string' || value.trim().length === 0) {
      throw new InvalidArgumentError(`${field} is required`, { field });
    }
    return value;
  }

  static optionalString(value: unknown, field: string): string | undefined {
    if (value === undefined || value === null) return undefined;
    return this.requireString(value, field);
  }

  /**
   * POI ids may arrive as numbers or numeric strings (form posts)
   */
  static requirePoiId(value: unknown): number {
    const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof parsed !== 'number' || !Number.isInteger(parsed)) {
      throw new InvalidArgumentError('poiId must be an integer', { field: 'poiId' });
    }
    return parsed;
  }
}
