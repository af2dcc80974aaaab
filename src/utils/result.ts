import { mapError } from '../errors';
import { Result } from '../types/common';

/**
 * Run a throwing operation and report its outcome as a Result.
 */
export function attempt<T>(fn: () => T): Result<T> {
  try {
    return { success: true, data: fn() };
  } catch (err) {
    const mapped = mapError(err);
    return {
      success: false,
      error: {
        code: mapped.code,
        message: mapped.message,
        details: mapped.details,
      },
    };
  }
}
