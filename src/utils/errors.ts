/**
 * Error taxonomy for elevation queries
 *
 * ClientError subclasses describe faults the client can fix; their messages
 * are returned verbatim. Nothing here knows about HTTP status codes, the
 * query service does that mapping.
 */

export const LAT_MIN = -90;
export const LAT_MAX = 90;
export const LON_MIN = -180;
export const LON_MAX = 180;

const LOCATIONS_HINT = 'Add locations like lat1,lon1|lat2,lon2.';
const ORDER_HINT = 'Provide locations in lat,lon order.';

export type ClientErrorKind =
  | 'EmptyInput'
  | 'SegmentFormat'
  | 'PolylineDecode'
  | 'TooManyLocations'
  | 'OutOfRange'
  | 'MalformedPoint'
  | 'UnsupportedMethod'
  | 'DatasetNotFound'
  | 'BackendInput';

export abstract class ClientError extends Error {
  abstract readonly kind: ClientErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyInputError extends ClientError {
  readonly kind = 'EmptyInput';

  constructor() {
    super('No locations provided. Add locations in a query string: ?locations=lat1,lon1|lat2,lon2.');
  }
}

export class SegmentFormatError extends ClientError {
  readonly kind = 'SegmentFormat';

  constructor(
    readonly position: number,
    readonly segment: string,
    missingComma = false,
  ) {
    super(
      `Unable to parse location '${segment}' in position ${position}.` +
        (missingComma ? ` ${LOCATIONS_HINT}` : ''),
    );
  }
}

export class PolylineDecodeError extends ClientError {
  readonly kind = 'PolylineDecode';

  constructor() {
    super('Unable to parse locations as polyline.');
  }
}

export class TooManyLocationsError extends ClientError {
  readonly kind = 'TooManyLocations';

  constructor(
    readonly count: number,
    readonly limit: number,
  ) {
    super(`Too many locations provided (${count}), the limit is ${limit}.`);
  }
}

export type Axis = 'latitude' | 'longitude';

export class OutOfRangeError extends ClientError {
  readonly kind = 'OutOfRange';

  constructor(
    readonly axis: Axis,
    readonly position: number,
    readonly location: string,
  ) {
    const bound = axis === 'latitude'
      ? `Latitude must be between ${LAT_MIN} and ${LAT_MAX}.`
      : `Longitude must be between ${LON_MIN} and ${LON_MAX}.`;
    super(`Unable to parse location '${location}' in position ${position}. ${bound} ${ORDER_HINT}`);
  }
}

export class MalformedPointError extends ClientError {
  readonly kind = 'MalformedPoint';

  constructor(
    readonly position: number,
    readonly raw: string,
  ) {
    super(`Unable to parse coordinate '${raw}' in position ${position}. ${LOCATIONS_HINT}`);
  }
}

export class UnsupportedMethodError extends ClientError {
  readonly kind = 'UnsupportedMethod';

  constructor(
    readonly method: string,
    readonly supported: readonly string[],
  ) {
    super(
      `Invalid interpolation method '${method}' not recognized. ` +
        `Valid interpolation methods: ${supported.join(', ')}.`,
    );
  }
}

export class DatasetNotFoundError extends ClientError {
  readonly kind = 'DatasetNotFound';

  constructor(readonly dataset: string) {
    super(`Dataset '${dataset}' not in config.`);
  }
}

/** The backend rejected otherwise valid input, e.g. a point outside dataset coverage */
export class BackendInputError extends ClientError {
  readonly kind = 'BackendInput';
}

/** Config file missing, unreadable or structurally invalid */
export class ConfigurationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export type LocationParseError =
  | EmptyInputError
  | SegmentFormatError
  | PolylineDecodeError
  | TooManyLocationsError
  | OutOfRangeError
  | MalformedPointError;
