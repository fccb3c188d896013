import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failure resolving a relative path against the base URL.
 */
export class URLError extends Error {
  /** URLError error-name */
  override name = 'URLError';
  /** Internal URL input for what it looked like */
  #url: string;

  /** Creates a new instance of a URLError with accompanying URL input */
  constructor(message: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
  }

  /** The input that failed to resolve */
  get url(): string {
    return this.#url;
  }
}

/**
 * Extract an {@link URLError} from an unknown error value, following nested causes.
 */
export function getURLError(error: unknown): null | URLError {
  return unwrapErrorType(URLError, error);
}

/**
 * Type guard for {@link URLError}.
 */
export function isURLError(error: unknown): error is URLError {
  return isErrorType(URLError, error);
}
