import { isErrorType } from './isErrorType.js';

/**
 * Error raised when the caller cancels a request through its `AbortSignal`.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  override name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
