import axios from 'axios';
import { z } from 'zod';
import type { DatasetHandle, InterpolationMethod } from '../types/Elevation';
import { type Result, ok, err } from '../types/Result';
import { BackendInputError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import { INTERPOLATION_METHODS, type ElevationBackend } from './ElevationBackend';

/**
 * Raster sampling service client
 *
 * Reading raster tiles and interpolating happens in a separate service; this
 * client sends it the resolved dataset (directory plus file listing) and the
 * validated points:
 *
 *   POST {baseUrl}/sample
 *   { dataset: { name, path, files }, interpolation, lats, lons }
 *   -> 200 { elevations: (number | null)[] }
 *   -> 400 { error: string }   input the service cannot serve
 */

// =============================================================================
// Types
// =============================================================================

export interface RasterServiceBackendOptions {
  /** Service root, e.g. http://localhost:5100 */
  baseUrl: string;
  /** Request timeout in ms (default: 15000) */
  timeout?: number;
}

interface SampleRequest {
  dataset: {
    name: string;
    path: string;
    files: readonly string[];
  };
  interpolation: InterpolationMethod;
  lats: readonly number[];
  lons: readonly number[];
}

const sampleResponseSchema = z.object({
  elevations: z.array(z.number().nullable()),
});

const errorResponseSchema = z.object({
  error: z.string(),
});

// =============================================================================
// Backend Implementation
// =============================================================================

export class RasterServiceBackend implements ElevationBackend {
  readonly interpolationMethods = INTERPOLATION_METHODS;
  private readonly sampleUrl: string;
  private readonly timeout: number;
  private readonly logger = createLogger({ component: 'RasterServiceBackend' });

  constructor(options: RasterServiceBackendOptions) {
    this.sampleUrl = `${options.baseUrl.replace(/\/+$/, '')}/sample`;
    this.timeout = options.timeout ?? 15000;
  }

  async compute(
    lats: readonly number[],
    lons: readonly number[],
    dataset: DatasetHandle,
    method: InterpolationMethod,
  ): Promise<Result<(number | null)[], BackendInputError>> {
    const body: SampleRequest = {
      dataset: { name: dataset.name, path: dataset.path, files: dataset.files },
      interpolation: method,
      lats,
      lons,
    };

    this.logger.debug({ dataset: dataset.name, points: lats.length, method }, 'Sampling elevations');

    let data: unknown;
    try {
      const response = await axios.post<unknown>(this.sampleUrl, body, { timeout: this.timeout });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 400) {
        const rejection = errorResponseSchema.safeParse(error.response.data);
        if (rejection.success) {
          return err(new BackendInputError(rejection.data.error));
        }
      }
      throw error;
    }

    const parsed = sampleResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Raster service returned a malformed response for dataset '${dataset.name}'`);
    }
    return ok(parsed.data.elevations);
  }
}
