import type { GeoPoint } from '../types/Elevation';
import { type Result, ok, err } from '../types/Result';
import {
  LAT_MAX,
  LAT_MIN,
  LON_MAX,
  LON_MIN,
  MalformedPointError,
  OutOfRangeError,
} from '../utils/errors';

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse decimal text as a float. Returns null for anything that is not a
 * plain decimal number (empty strings, hex, "NaN", "Infinity").
 */
export function parseCoordinate(raw: string): number | null {
  const text = raw.trim();
  if (!DECIMAL_PATTERN.test(text)) {
    return null;
  }
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

function toNumber(raw: string | number): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }
  return parseCoordinate(raw);
}

/**
 * Validate a single lat/lon pair
 *
 * @param position - 1-based index of the point within the batch, used in messages
 */
export function validateGeoPoint(
  latRaw: string | number,
  lonRaw: string | number,
  position: number,
): Result<GeoPoint, MalformedPointError | OutOfRangeError> {
  const latitude = toNumber(latRaw);
  if (latitude === null) {
    return err(new MalformedPointError(position, String(latRaw)));
  }
  const longitude = toNumber(lonRaw);
  if (longitude === null) {
    return err(new MalformedPointError(position, String(lonRaw)));
  }

  const location = `${latRaw},${lonRaw}`;
  if (latitude < LAT_MIN || latitude > LAT_MAX) {
    return err(new OutOfRangeError('latitude', position, location));
  }
  if (longitude < LON_MIN || longitude > LON_MAX) {
    return err(new OutOfRangeError('longitude', position, location));
  }

  return ok(Object.freeze({ latitude, longitude }));
}
