/**
 * Helpers shared by the division controllers
 */

import { fromDivisionError } from '../../middleware/errorHandler.js';
import type { Result } from '../../services/division/index.js';

/**
 * Return the value of a successful result; throw the matching ApiError
 * otherwise (express-async-errors hands it to the error handler).
 */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw fromDivisionError(result.error);
  }
  return result.value;
}
