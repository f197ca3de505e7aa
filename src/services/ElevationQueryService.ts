/**
 * ElevationQueryService - Per-request elevation query pipeline
 *
 * interpolation -> locations -> dataset -> backend -> response.
 * Each step returns a Result; the first failure short-circuits. This is the
 * only place that turns errors into response statuses.
 */

import type { ElevationBackend } from '../backends/ElevationBackend';
import { DEFAULT_INTERPOLATION_METHOD } from '../backends/ElevationBackend';
import type { ElevationResponse, ElevationResult, LocationBatch } from '../types/Elevation';
import { ClientError, ConfigurationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { ConfigurationCache } from './ConfigurationCache';
import { resolveDataset } from './DatasetResolver';
import { validateInterpolation } from './InterpolationValidator';
import { parseLocations } from './LocationParser';

export const SERVER_ERROR_MESSAGE = 'Server error, please retry request.';

export interface ElevationQuery {
  datasetName: string;
  locations?: string;
  interpolation?: string;
}

export interface QueryOutcome {
  status: 200 | 400 | 500;
  body: ElevationResponse;
}

export interface ElevationQueryServiceOptions {
  configCache: ConfigurationCache;
  backend: ElevationBackend;
  /** Rethrow unexpected faults instead of masking them */
  debug?: boolean;
}

export class ElevationQueryService {
  private readonly configCache: ConfigurationCache;
  private readonly backend: ElevationBackend;
  private readonly debug: boolean;
  private readonly logger = createLogger({ component: 'ElevationQueryService' });

  constructor(options: ElevationQueryServiceOptions) {
    this.configCache = options.configCache;
    this.backend = options.backend;
    this.debug = options.debug ?? false;
  }

  /**
   * Answer one elevation query
   *
   * Resolves with the outcome for every client or configuration fault.
   * Rejects only in debug mode, for faults that would otherwise be masked.
   */
  async query(query: ElevationQuery): Promise<QueryOutcome> {
    try {
      return await this.run(query);
    } catch (error) {
      return this.handleFault(error, query);
    }
  }

  private async run(query: ElevationQuery): Promise<QueryOutcome> {
    const method = validateInterpolation(
      query.interpolation ?? DEFAULT_INTERPOLATION_METHOD,
      this.backend.interpolationMethods,
    );
    if (!method.ok) {
      return invalidRequest(method.error);
    }

    const config = await this.configCache.getConfig();

    const batch = parseLocations(query.locations, config.maxLocationsPerRequest);
    if (!batch.ok) {
      return invalidRequest(batch.error);
    }

    const dataset = resolveDataset(query.datasetName, config.datasets);
    if (!dataset.ok) {
      return invalidRequest(dataset.error);
    }

    const lats = batch.value.map((point) => point.latitude);
    const lons = batch.value.map((point) => point.longitude);
    const elevations = await this.backend.compute(lats, lons, dataset.value, method.value);
    if (!elevations.ok) {
      return invalidRequest(elevations.error);
    }

    if (elevations.value.length !== batch.value.length) {
      throw new Error(
        `Backend returned ${elevations.value.length} elevations for ${batch.value.length} locations`,
      );
    }

    this.logger.debug(
      { dataset: query.datasetName, points: batch.value.length, method: method.value },
      'Elevation query answered',
    );

    return {
      status: 200,
      body: { status: 'OK', results: zipResults(batch.value, elevations.value) },
    };
  }

  private handleFault(error: unknown, query: ElevationQuery): QueryOutcome {
    if (error instanceof ClientError) {
      return invalidRequest(error);
    }
    if (error instanceof ConfigurationError) {
      this.logger.error({ error }, 'Configuration error');
      return { status: 500, body: { status: 'SERVER_ERROR', error: error.message } };
    }
    if (this.debug) {
      throw error;
    }
    this.logger.error({ error, dataset: query.datasetName }, 'Unexpected error answering elevation query');
    return { status: 500, body: { status: 'SERVER_ERROR', error: SERVER_ERROR_MESSAGE } };
  }
}

function invalidRequest(error: ClientError): QueryOutcome {
  return { status: 400, body: { status: 'INVALID_REQUEST', error: error.message } };
}

/**
 * Pair each elevation with the point it was computed for, preserving order
 */
export function zipResults(points: LocationBatch, elevations: readonly (number | null)[]): ElevationResult[] {
  return points.map((point, i) => ({
    elevation: elevations[i] ?? null,
    location: { lat: point.latitude, lng: point.longitude },
  }));
}
