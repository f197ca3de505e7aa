/**
 * LocationParser - Decode the `locations` query parameter
 *
 * Two wire formats share one parameter:
 * - delimited pairs: `lat,lon|lat,lon|...`
 * - a Google encoded polyline, optionally prefixed with `enc:`
 *
 * The format is picked by sniffing for a comma. Polyline characters are all
 * in the range '?'..'~', which excludes ',', so any comma means delimited
 * pairs. A comma-free string that is not a valid polyline fails as a
 * polyline, never as a malformed pair.
 */

import type { GeoPoint, LocationBatch } from '../types/Elevation';
import { type Result, ok, err } from '../types/Result';
import {
  EmptyInputError,
  type LocationParseError,
  PolylineDecodeError,
  SegmentFormatError,
  TooManyLocationsError,
} from '../utils/errors';
import { countPolylinePoints, decodePolyline, PolylineFormatError } from '../utils/polyline';
import { parseCoordinate, validateGeoPoint } from './GeoPointValidator';

const POLYLINE_PREFIX = 'enc:';
const SEGMENT_SEPARATOR = '|';

export type LocationFormat = 'delimited' | 'polyline';

/**
 * Pick the sub-parser for a raw locations string
 */
export function detectLocationFormat(raw: string): LocationFormat {
  return raw.includes(',') ? 'delimited' : 'polyline';
}

/**
 * Parse and validate the locations parameter
 *
 * @param maxLocations - Largest batch accepted; larger batches fail before per-point work
 */
export function parseLocations(
  raw: string | undefined,
  maxLocations: number,
): Result<LocationBatch, LocationParseError> {
  if (!raw) {
    return err(new EmptyInputError());
  }

  return detectLocationFormat(raw) === 'delimited'
    ? parseDelimitedLocations(raw, maxLocations)
    : parsePolylineLocations(raw, maxLocations);
}

function trimSeparators(raw: string): string {
  let start = 0;
  let end = raw.length;
  while (start < end && raw[start] === SEGMENT_SEPARATOR) start++;
  while (end > start && raw[end - 1] === SEGMENT_SEPARATOR) end--;
  return raw.slice(start, end);
}

/**
 * Parse `lat,lon` pairs delimited by `|`
 */
export function parseDelimitedLocations(
  raw: string,
  maxLocations: number,
): Result<LocationBatch, LocationParseError> {
  const segments = trimSeparators(raw).split(SEGMENT_SEPARATOR);

  if (segments.length > maxLocations) {
    return err(new TooManyLocationsError(segments.length, maxLocations));
  }

  const points: GeoPoint[] = [];
  for (const [i, segment] of segments.entries()) {
    const position = i + 1;
    const comma = segment.indexOf(',');
    if (comma === -1) {
      return err(new SegmentFormatError(position, segment, true));
    }

    // Split on the first comma only; anything after a second comma lands in lon and fails there
    const latText = segment.slice(0, comma);
    const lonText = segment.slice(comma + 1);
    if (parseCoordinate(latText) === null || parseCoordinate(lonText) === null) {
      return err(new SegmentFormatError(position, segment));
    }

    const point = validateGeoPoint(latText, lonText, position);
    if (!point.ok) {
      return point;
    }
    points.push(point.value);
  }

  return ok(points);
}

/**
 * Parse a Google encoded polyline (precision 5), with or without the `enc:` prefix
 *
 * Decoded points go through the same range validation as delimited pairs.
 */
export function parsePolylineLocations(
  raw: string,
  maxLocations: number,
): Result<LocationBatch, LocationParseError> {
  const encoded = raw.startsWith(POLYLINE_PREFIX) ? raw.slice(POLYLINE_PREFIX.length) : raw;

  // Counting is a single scan, so oversize input is rejected before decoding
  const count = countPolylinePoints(encoded);
  if (count > maxLocations) {
    return err(new TooManyLocationsError(count, maxLocations));
  }

  let decoded: [number, number][];
  try {
    decoded = decodePolyline(encoded);
  } catch (error) {
    if (error instanceof PolylineFormatError) {
      return err(new PolylineDecodeError());
    }
    throw error;
  }

  if (decoded.length === 0) {
    return err(new PolylineDecodeError());
  }

  const points: GeoPoint[] = [];
  for (const [i, [latitude, longitude]] of decoded.entries()) {
    const point = validateGeoPoint(latitude, longitude, i + 1);
    if (!point.ok) {
      return point;
    }
    points.push(point.value);
  }

  return ok(points);
}
