import type { DatasetHandle, DatasetRegistry } from '../types/Elevation';
import { type Result, ok, err } from '../types/Result';
import { DatasetNotFoundError } from '../utils/errors';

/**
 * Look a dataset up by the name used in request URLs
 */
export function resolveDataset(
  name: string,
  registry: DatasetRegistry,
): Result<DatasetHandle, DatasetNotFoundError> {
  const dataset = registry.get(name);
  return dataset ? ok(dataset) : err(new DatasetNotFoundError(name));
}
