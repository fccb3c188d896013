/**
 * Error entrypoint: exports the error kinds returned by the client and helpers for identifying and unwrapping them.
 * Use this when you only need error utilities without the core client.
 * @module
 */

/** Error thrown when a request is aborted via AbortController. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';

/** Non-2xx API response with decoded error entries, plus helpers to find and match it. */
export {
  APIError,
  type APIErrorInit,
  type ErrorEntry,
  type ErrorParameter,
  getAPIError,
  isAPIError,
  isError,
} from './apiError.js';

/** Successful response body that didn't decode into the expected shape. */
export { DecodingError, getDecodingError, isDecodingError } from './decodingError.js';

/** Request body that couldn't be serialized. */
export { EncodingError, isEncodingError } from './encodingError.js';

/** Relative path starting with a slash. */
export { InvalidPathError, isInvalidPathError } from './invalidPathError.js';

/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';

/** Error thrown when a request exceeds the configured timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';

/** Token source failure, distinct from failures of the authenticated call. */
export { getTokenError, isTokenError, TokenError } from './tokenError.js';

/** Network, cancellation or body-read failure. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';

/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/** Relative path that couldn't be resolved against the base URL. */
export { getURLError, isURLError, URLError } from './urlError.js';
