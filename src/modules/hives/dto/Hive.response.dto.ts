import { latitudeOf, longitudeOf, type Hive } from '../hives.types';

export interface HiveLocationDto {
  latitude: number;
  longitude: number;
}

export interface HiveDto {
  id: string;
  userId: string;
  name: string;
  location: HiveLocationDto | null;
  frameType: string | null;
  installedAt: string; // ISO-8601
}

export interface CreateHiveResponseDto {
  success: true;
  hive: HiveDto;
}

export interface GetHiveResponseDto {
  success: true;
  hive: HiveDto;
}

export interface ListHivesResponseDto {
  success: true;
  hives: HiveDto[];
}

export function toHiveDto(hive: Hive): HiveDto {
  return {
    id: hive.id,
    userId: hive.userId,
    name: hive.name,
    location: hive.location
      ? {
          latitude: latitudeOf(hive.location),
          longitude: longitudeOf(hive.location),
        }
      : null,
    frameType: hive.frameType,
    installedAt: hive.installedAt.toISOString(),
  };
}
