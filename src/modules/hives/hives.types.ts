import type { CreationResult } from '../../lib/creation/creation-result';
import type { HiveCreationErrorKind } from '../../lib/creation/creation-status';

/** GeoJSON point; coordinates are [longitude, latitude] (WGS84). */
export interface GeoPoint {
  readonly type: 'Point';
  readonly coordinates: readonly [number, number];
}

export interface Hive {
  readonly id: string;
  readonly userId: string;
  readonly name: string;
  readonly location: GeoPoint | null;
  readonly frameType: string | null;
  readonly installedAt: Date;
}

export type HiveDraft = Omit<Hive, 'id'>;

/**
 * Trimmed caller input. Coordinates are the raw submitted values; the
 * service checks their type, range and pairing.
 */
export interface HiveCreationInput {
  readonly userId: string;
  readonly name: string;
  readonly latitude?: unknown;
  readonly longitude?: unknown;
  readonly frameType?: string | null;
  readonly installedAt?: Date | null;
}

export type HiveCreationResult = CreationResult<Hive, HiveCreationErrorKind>;

export function toGeoPoint(latitude: number, longitude: number): GeoPoint {
  return { type: 'Point', coordinates: [longitude, latitude] };
}

export function latitudeOf(point: GeoPoint): number {
  return point.coordinates[1];
}

export function longitudeOf(point: GeoPoint): number {
  return point.coordinates[0];
}
