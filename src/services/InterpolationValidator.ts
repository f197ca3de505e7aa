import type { InterpolationMethod } from '../types/Elevation';
import { type Result, ok, err } from '../types/Result';
import { UnsupportedMethodError } from '../utils/errors';

/**
 * Check a method name against the registry published by the backend
 */
export function validateInterpolation(
  name: string,
  supported: readonly InterpolationMethod[],
): Result<InterpolationMethod, UnsupportedMethodError> {
  if (!supported.includes(name)) {
    return err(new UnsupportedMethodError(name, supported));
  }
  return ok(name);
}
