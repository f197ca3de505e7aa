/**
 * Codec for Google's encoded polyline format
 *
 * Each coordinate is scaled by 10^precision, delta-encoded against the
 * previous point, zig-zag encoded, and written as 5-bit chunks offset by 63.
 * Chunks with the 0x20 bit set continue the current value.
 */

const CHAR_OFFSET = 63;
const CHUNK_BITS = 5;
const CHUNK_MASK = 0x1f;
const CONTINUE_BIT = 0x20;
const MIN_CHAR = CHAR_OFFSET;
const MAX_CHAR = 126;
// 7 chunks = 35 bits, well past any valid scaled coordinate delta
const MAX_CHUNKS_PER_VALUE = 7;

export class PolylineFormatError extends Error {
  constructor(
    message: string,
    readonly index: number,
  ) {
    super(message);
    this.name = 'PolylineFormatError';
  }
}

/**
 * Count the points in an encoded polyline without decoding it
 *
 * Every value ends with exactly one chunk lacking the continuation bit, and
 * every point has two values. A malformed string may give an approximate
 * count; decodePolyline reports the actual problem.
 */
export function countPolylinePoints(encoded: string): number {
  let terminators = 0;
  for (let i = 0; i < encoded.length; i++) {
    if (encoded.charCodeAt(i) - CHAR_OFFSET < CONTINUE_BIT) {
      terminators++;
    }
  }
  return Math.ceil(terminators / 2);
}

/**
 * Decode an encoded polyline into [lat, lng] pairs
 *
 * @throws PolylineFormatError on characters outside '?'..'~', a truncated
 * value, an over-long value, or a trailing latitude without longitude
 */
export function decodePolyline(encoded: string, precision: number = 5): [number, number][] {
  const factor = Math.pow(10, precision);
  const coordinates: [number, number][] = [];
  let index = 0;
  let lat = 0;
  let lng = 0;

  const readValue = (): number => {
    let result = 0;
    let scale = 1;
    let chunks = 0;
    let byte: number;

    do {
      if (index >= encoded.length) {
        throw new PolylineFormatError('Polyline ends in the middle of a value', index);
      }
      const code = encoded.charCodeAt(index);
      if (code < MIN_CHAR || code > MAX_CHAR) {
        throw new PolylineFormatError(`Invalid polyline character '${encoded[index]}'`, index);
      }
      if (++chunks > MAX_CHUNKS_PER_VALUE) {
        throw new PolylineFormatError('Polyline value too long', index);
      }
      index++;
      byte = code - CHAR_OFFSET;
      result += (byte & CHUNK_MASK) * scale;
      scale *= 1 << CHUNK_BITS;
    } while (byte >= CONTINUE_BIT);

    // Zig-zag: odd values are negative
    return result % 2 === 1 ? -(result + 1) / 2 : result / 2;
  };

  while (index < encoded.length) {
    lat += readValue();
    if (index >= encoded.length) {
      throw new PolylineFormatError('Polyline has a latitude without a longitude', index);
    }
    lng += readValue();
    coordinates.push([lat / factor, lng / factor]);
  }

  return coordinates;
}

function encodeValue(delta: number): string {
  let value = delta < 0 ? -2 * delta - 1 : 2 * delta;
  let output = '';
  while (value >= CONTINUE_BIT) {
    output += String.fromCharCode((CONTINUE_BIT | (value & CHUNK_MASK)) + CHAR_OFFSET);
    value = Math.floor(value / (1 << CHUNK_BITS));
  }
  return output + String.fromCharCode(value + CHAR_OFFSET);
}

/**
 * Encode [lat, lng] pairs as a polyline
 */
export function encodePolyline(coordinates: readonly (readonly [number, number])[], precision: number = 5): string {
  const factor = Math.pow(10, precision);
  let previousLat = 0;
  let previousLng = 0;
  let output = '';

  for (const [latitude, longitude] of coordinates) {
    const lat = Math.round(latitude * factor);
    const lng = Math.round(longitude * factor);
    output += encodeValue(lat - previousLat) + encodeValue(lng - previousLng);
    previousLat = lat;
    previousLng = lng;
  }

  return output;
}
