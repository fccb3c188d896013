import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a successful response whose body doesn't decode into the expected shape,
 * either because it isn't JSON or because it fails @standard-schema validation.
 */
export class DecodingError extends Error {
  /** DecodingError error-name */
  override name = 'DecodingError';
  /** Schema validation issues, empty when the body wasn't JSON at all */
  issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the DecodingError, with accompanying issues */
  constructor(message: string, issues: StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; issues: ${JSON.stringify(issues)}` : message, opts);
    this.issues = issues;
  }
}

/**
 * Type guard for {@link DecodingError}.
 */
export function isDecodingError(error: unknown): error is DecodingError {
  return isErrorType(DecodingError, error);
}

/**
 * Extract a {@link DecodingError} from an unknown error value, following nested causes.
 */
export function getDecodingError(error: unknown): null | DecodingError {
  return unwrapErrorType(DecodingError, error);
}
