/**
 * Root entrypoint: re-exports the client, the Buy APIs, OAuth2 token sources and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './buy/index.js';
export * from './core/index.js';
export * from './error/index.js';
export * from './oauth/index.js';

/** Request, transport and logger contracts. */
export type {
  CallOptions,
  EndpointOptions,
  FetchLike,
  HeaderOptions,
  HttpMethod,
  RequestLogger,
} from './types/request.js';

/** Error-first results returned by every call. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
