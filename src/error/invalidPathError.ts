import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a relative request path starts with `/`, which would drop the base URL's path prefix.
 */
export class InvalidPathError extends Error {
  /** InvalidPathError error-name */
  override name = 'InvalidPathError';
  /** Offending path */
  #path: string;

  /** Creates a new instance of an InvalidPathError for the rejected path */
  constructor(path: string, opts?: ErrorOptions) {
    super(`error path ${JSON.stringify(path)} must be specified without a preceding slash`, opts);
    this.#path = path;
  }

  /** The rejected relative path */
  get path(): string {
    return this.#path;
  }
}

/**
 * Type guard for {@link InvalidPathError}.
 */
export function isInvalidPathError(error: unknown): error is InvalidPathError {
  return isErrorType(InvalidPathError, error);
}
