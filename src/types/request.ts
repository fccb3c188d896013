import type { Opt } from '../core/opt.js';

/** HTTP methods the eBay REST APIs accept. */
export type HttpMethod = 'GET' | 'HEAD' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Header options accepted when configuring default headers. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | undefined>;

/**
 * Fetch-compatible transport used to send requests.
 * The global `fetch` satisfies it, and so does {@link authenticatedFetch}.
 */
export type FetchLike = (request: Request) => Promise<Response>;

/**
 * Minimal logger contract; a `pino` logger satisfies it.
 */
export interface RequestLogger {
  debug(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
}

/** Per-call options understood by {@link Client.do} and every endpoint method. */
export interface CallOptions {
  /** Cancels the call; the error returned wraps the signal's reason. */
  signal?: AbortSignal;
  /**
   * Call timeout in milliseconds, `false` to disable.
   * Falls back to the client's default timeout.
   */
  timeout?: number | false;
}

/** Per-call options of endpoint methods: call options plus request options. */
export interface EndpointOptions extends CallOptions {
  /** Options applied, in order, after the endpoint's own. */
  opts?: Opt[];
}
