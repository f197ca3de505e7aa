/**
 * Core types for elevation queries
 * Backend agnostic: nothing here knows about raster formats or HTTP
 */

export interface GeoPoint {
  readonly latitude: number;
  readonly longitude: number;
}

/** Client-ordered points; response array position matches input position */
export type LocationBatch = readonly GeoPoint[];

export interface DatasetHandle {
  readonly name: string;
  /** Absolute dataset directory */
  readonly path: string;
  /** Raster files relative to `path`, sorted */
  readonly files: readonly string[];
}

export type DatasetRegistry = ReadonlyMap<string, DatasetHandle>;

export interface ConfigSnapshot {
  readonly maxLocationsPerRequest: number;
  /** Empty string disables the access-control-allow-origin header */
  readonly corsOrigin: string;
  readonly datasets: DatasetRegistry;
}

/** Name validated against the backend's registry */
export type InterpolationMethod = string;

export interface ElevationResult {
  elevation: number | null;
  location: {
    lat: number;
    lng: number;
  };
}

export type ResponseStatus = 'OK' | 'INVALID_REQUEST' | 'SERVER_ERROR';

export interface ElevationSuccessResponse {
  status: 'OK';
  results: ElevationResult[];
}

export interface ErrorResponse {
  status: Exclude<ResponseStatus, 'OK'>;
  error: string;
}

export type ElevationResponse = ElevationSuccessResponse | ErrorResponse;
