import { EncodingError } from '../error/encodingError.js';
import { InvalidPathError } from '../error/invalidPathError.js';
import { URLError } from '../error/urlError.js';
import type { HeaderOptions, HttpMethod } from '../types/request.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';
import { mergeHeaderOptions } from './headers.js';
import { applyOpts, type Opt } from './opt.js';

/** A fully-formed request, ready for {@link Client.do}. */
export interface ApiRequest {
  readonly method: HttpMethod;
  readonly url: URL;
  readonly headers: Headers;
  /** JSON-encoded body, `null` when the request has none. */
  readonly body: string | null;
}

/** What every request built against a client starts from. */
export interface RequestBase {
  /** Absolute base URL, ending in `/`. */
  baseUrl: URL;
  /** Default headers, applied before the request's own. */
  headers?: HeaderOptions;
}

const BODYLESS_METHODS: ReadonlySet<HttpMethod> = new Set(['GET', 'HEAD']);

/**
 * Builds an API request.
 *
 * - `path` is resolved against the base URL and must not start with `/`,
 *   which would discard the base URL's own path.
 * - `body`, when given, is serialized with `JSON.stringify`.
 * - `opts` are applied in order to the request's headers and query parameters.
 *
 * @returns `[error, request]`, where error is an {@link InvalidPathError}, {@link URLError} or {@link EncodingError}.
 */
export function newRequest(
  base: RequestBase,
  method: HttpMethod,
  path: string,
  body?: unknown,
  ...opts: Opt[]
): SafeWrap<Error, ApiRequest> {
  if (path.startsWith('/')) {
    return [new InvalidPathError(path), null];
  }

  const [errUrl, url] = safeWrap(() => new URL(path, base.baseUrl));
  if (errUrl) {
    const message = `error resolving ${JSON.stringify(path)} against ${base.baseUrl.href}`;
    return [new URLError(message, path, { cause: errUrl }), null];
  }

  const [errBody, encoded] = encodeBody(method, body);
  if (errBody) {
    return [errBody, null];
  }

  const headers = mergeHeaderOptions(
    { Accept: 'application/json' },
    base.headers,
    encoded === null ? undefined : { 'Content-Type': 'application/json' },
  );

  applyOpts({ headers, searchParams: url.searchParams }, opts);

  return [null, { method, url, headers, body: encoded }];
}

/**
 * Serializes a request body, `null` standing for "no body".
 * `JSON.stringify` leaves `<`, `>` and `&` as they are.
 */
function encodeBody(method: HttpMethod, body: unknown): SafeWrap<EncodingError, string | null> {
  if (body === undefined || body === null) {
    return [null, null];
  }

  if (BODYLESS_METHODS.has(method)) {
    return [new EncodingError(`error method ${method} does not allow a request body`), null];
  }

  const [err, encoded] = safeWrap((): string | undefined => JSON.stringify(body));
  if (err) {
    return [new EncodingError('error encoding request body as JSON', { cause: err }), null];
  }

  if (encoded === undefined) {
    return [new EncodingError(`error request body of type ${typeof body} has no JSON representation`), null];
  }

  return [null, encoded];
}
