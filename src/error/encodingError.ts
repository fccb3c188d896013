import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request body cannot be serialized to JSON.
 */
export class EncodingError extends Error {
  /** EncodingError error-name */
  override name = 'EncodingError';
}

/**
 * Type guard for {@link EncodingError}.
 */
export function isEncodingError(error: unknown): error is EncodingError {
  return isErrorType(EncodingError, error);
}
