/**
 * Core entrypoint: exports the eBay client, request building and per-request options.
 * Import from here if you only need the client without error helpers or OAuth2.
 * @module
 */

/**
 * eBay REST client that:
 * - builds requests against a production, sandbox or custom base URL,
 * - sends them through a pluggable fetch-compatible transport,
 * - decodes eBay error payloads and validates successful bodies via schemas.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}.
 */
export { BaseURL, Client, type ClientOptions, SandboxBaseURL } from './client.js';

/** Decodes non-2xx responses into an {@link APIError}. */
export { checkResponse, errorEntrySchema } from './checkResponse.js';

/** Renders a request in HTTP/1.1 wire form. */
export { dumpRequest } from './dumpRequest.js';

/** Per-request options and the helpers to write new ones. */
export { applyOpts, type Opt, type OptTarget, optHeader, optQuery } from './opt.js';

/** Request builder used by {@link Client.newRequest}. */
export { type ApiRequest, newRequest, type RequestBase } from './request.js';
