import type { DatasetHandle, InterpolationMethod } from '../types/Elevation';
import type { Result } from '../types/Result';
import type { BackendInputError } from '../utils/errors';

/** Interpolation methods understood by the raster sampling service */
export const INTERPOLATION_METHODS = ['nearest', 'bilinear', 'cubic'] as const;

export const DEFAULT_INTERPOLATION_METHOD: InterpolationMethod = 'bilinear';

/**
 * Contract for anything that can sample elevations from a dataset
 *
 * compute() returns one value per input point, in input order; null marks a
 * point with no data. Input the backend cannot serve (outside coverage, say)
 * comes back as a BackendInputError. Anything thrown is a server fault.
 */
export interface ElevationBackend {
  readonly interpolationMethods: readonly InterpolationMethod[];

  compute(
    lats: readonly number[],
    lons: readonly number[],
    dataset: DatasetHandle,
    method: InterpolationMethod,
  ): Promise<Result<(number | null)[], BackendInputError>>;
}
