import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a token source fails to produce an access token,
 * as opposed to an authenticated call failing afterwards.
 */
export class TokenError extends Error {
  /** TokenError error-name */
  override name = 'TokenError';
}

/**
 * Type guard for {@link TokenError}.
 */
export function isTokenError(error: unknown): error is TokenError {
  return isErrorType(TokenError, error);
}

/**
 * Extract a {@link TokenError} from an unknown error value, following nested causes.
 */
export function getTokenError(error: unknown): null | TokenError {
  return unwrapErrorType(TokenError, error);
}
