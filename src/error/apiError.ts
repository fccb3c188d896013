import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Name/value pair attached to an {@link ErrorEntry}. */
export interface ErrorParameter {
  name?: string;
  value?: string;
}

/**
 * One error reported by the eBay API.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/static/handling-error-messages.html
 */
export interface ErrorEntry {
  errorId?: number;
  domain?: string;
  subDomain?: string;
  category?: string;
  message?: string;
  longMessage?: string;
  inputRefIds?: string[];
  outputRefIds?: string[];
  parameters?: ErrorParameter[];
}

/** Constructor input for {@link APIError}. */
export interface APIErrorInit {
  method?: string;
  url?: string;
  status: number;
  statusText?: string;
  errors: ErrorEntry[];
  requestDump: string;
}

/**
 * Error representing a non-2xx eBay API response, with the decoded error entries
 * and a dump of the request that caused it.
 */
export class APIError extends Error {
  /** APIError error-name */
  override name = 'APIError';
  /** Method of the failed request */
  readonly method: string;
  /** Absolute URL of the failed request */
  readonly url: string;
  /** Response status code */
  readonly status: number;
  /** Response status text, when the transport reported one */
  readonly statusText: string;
  /** Decoded error entries, empty when the body wasn't a readable error payload */
  readonly errors: readonly ErrorEntry[];
  /** Dump of the request as it was about to be sent */
  readonly requestDump: string;

  /** Creates a new instance of an APIError from the decoded response */
  constructor(
    { method = '', url = '', status, statusText = '', errors, requestDump }: APIErrorInit,
    opts?: ErrorOptions,
  ) {
    super(`HTTP Error: ${status}${errors.length > 0 ? `; errors: ${JSON.stringify(errors)}` : ''}`, opts);
    this.method = method;
    this.url = url;
    this.status = status;
    this.statusText = statusText;
    this.errors = Object.freeze([...errors]);
    this.requestDump = requestDump;
  }

  /** Error ids of every decoded entry, in order */
  get codes(): number[] {
    return this.errors.flatMap((entry) => (entry.errorId === undefined ? [] : [entry.errorId]));
  }
}

/**
 * Extract an {@link APIError} from an unknown error value, following nested causes.
 */
export function getAPIError(error: unknown): null | APIError {
  return unwrapErrorType(APIError, error);
}

/**
 * Type guard for {@link APIError}.
 */
export function isAPIError(error: unknown): error is APIError {
  return isErrorType(APIError, error);
}

/**
 * Reports whether `error` carries an eBay error entry with any of the given codes.
 * Returns false for `null`, for errors that aren't API errors, and when no codes are given.
 *
 * eBay API docs: https://developer.ebay.com/devzone/xml/docs/Reference/ebay/Errors/errormessages.htm
 */
export function isError(error: unknown, ...codes: number[]): boolean {
  const apiError = getAPIError(error);
  if (!apiError) {
    return false;
  }

  return apiError.errors.some((entry) => entry.errorId !== undefined && codes.includes(entry.errorId));
}
