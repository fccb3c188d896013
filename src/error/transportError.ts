import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a request that never produced a complete response:
 * network failures, cancellation, timeouts, or a body that broke off mid-read.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  override name = 'TransportError';
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}
