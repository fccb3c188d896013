import type { StandardSchemaV1 } from '@standard-schema/spec';
import { BuyAPI } from '../buy/index.js';
import { DecodingError } from '../error/decodingError.js';
import { getTokenError } from '../error/tokenError.js';
import { TransportError } from '../error/transportError.js';
import type { CallOptions, FetchLike, HeaderOptions, HttpMethod, RequestLogger } from '../types/request.js';
import { abortReason, createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { validator } from '../utils/validator.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';
import { checkResponse } from './checkResponse.js';
import { dumpRequest } from './dumpRequest.js';
import type { Opt } from './opt.js';
import { type ApiRequest, newRequest } from './request.js';

/** eBay production REST endpoint. */
export const BaseURL = 'https://api.ebay.com/';

/** eBay sandbox REST endpoint. */
export const SandboxBaseURL = 'https://api.sandbox.ebay.com/';

/** Options shared by every way of constructing a {@link Client}. */
export interface ClientOptions {
  /**
   * Transport used for every request. Defaults to the global `fetch`;
   * pass {@link authenticatedFetch} to send OAuth2 credentials.
   */
  fetch?: FetchLike;
  /** Default headers merged into every request. */
  headers?: HeaderOptions;
  /**
   * Default call timeout in milliseconds.
   * @default false
   */
  timeout?: number | false;
  /** Receives a debug entry per request sent and a warn entry per failed call. */
  logger?: RequestLogger;
}

/**
 * eBay REST API client.
 *
 * Holds only its base URL and transport, both fixed at construction, so a single
 * instance can serve any number of concurrent calls. Every method returns
 * error-first tuples via {@link SafeWrapAsync} or {@link SafeWrap}.
 */
export class Client {
  /** Transport every request goes through. */
  #fetch: FetchLike;
  /** Base URL and default headers requests are built from. */
  #base: { baseUrl: URL; headers?: HeaderOptions };
  /** Default call timeout. */
  #timeout: number | false;
  /** Optional diagnostics sink. */
  #logger?: RequestLogger;

  /** eBay Buy APIs. */
  readonly buy: BuyAPI;

  private constructor(baseUrl: URL, { fetch = globalThis.fetch, headers, timeout = false, logger }: ClientOptions) {
    this.#fetch = fetch;
    this.#base = { baseUrl, headers };
    this.#timeout = timeout;
    this.#logger = logger;
    this.buy = new BuyAPI(this);
  }

  /** Client for the eBay production API. */
  static production(opts: ClientOptions = {}): Client {
    return new Client(new URL(BaseURL), opts);
  }

  /** Client for the eBay sandbox API. */
  static sandbox(opts: ClientOptions = {}): Client {
    return new Client(new URL(SandboxBaseURL), opts);
  }

  /**
   * Client for a custom base URL, e.g. a gateway in front of eBay.
   * The URL must be absolute and end with a trailing slash.
   */
  static custom(baseUrl: string, opts: ClientOptions = {}): SafeWrap<Error, Client> {
    if (!baseUrl.endsWith('/')) {
      return [new Error(`error base URL ${baseUrl} must have a trailing slash`), null];
    }

    const [errUrl, url] = safeWrap(() => new URL(baseUrl));
    if (errUrl) {
      return [new Error(`error base URL ${baseUrl} is not an absolute URL`, { cause: errUrl }), null];
    }

    return [null, new Client(url, opts)];
  }

  /** Base URL every request path is resolved against. */
  get baseUrl(): string {
    return this.#base.baseUrl.href;
  }

  /**
   * Creates an API request against this client's base URL.
   * `path` should always be specified without a preceding slash.
   */
  newRequest(method: HttpMethod, path: string, body?: unknown, ...opts: Opt[]): SafeWrap<Error, ApiRequest> {
    return newRequest(this.#base, method, path, body, ...opts);
  }

  /**
   * Sends an API request and decodes the JSON response with `schema`.
   *
   * Errors:
   * - {@link TransportError} when no complete response arrived (network, cancellation, timeout).
   * - {@link TokenError} as returned by the transport's token source, unless the call was canceled.
   * - {@link APIError} for non-2xx responses.
   * - {@link DecodingError} when a 2xx body isn't JSON or doesn't match `schema`.
   *
   * Without a schema the body is drained and `[null, null]` returned on success.
   */
  do<T extends StandardSchemaV1>(
    request: ApiRequest,
    schema: T,
    opts?: CallOptions,
  ): SafeWrapAsync<Error, StandardSchemaV1.InferOutput<T>>;
  do(request: ApiRequest, schema?: null, opts?: CallOptions): SafeWrapAsync<Error, null>;
  async do(request: ApiRequest, schema?: StandardSchemaV1 | null, opts: CallOptions = {}): SafeWrapAsync<Error, unknown> {
    const dump = dumpRequest(request);
    const timeout = createTimeoutSignal(opts.timeout ?? this.#timeout);
    const merged = mergeSignals([opts.signal, timeout.signal]);

    try {
      const result = await this.#send(request, dump, merged.signal, schema ?? null);
      const [err] = result;
      if (err) {
        // Name and message only: API errors carry the request dump, credentials included.
        this.#logger?.warn(
          { method: request.method, url: request.url.href, err: { name: err.name, message: err.message } },
          'eBay API request failed',
        );
      }

      return result;
    } finally {
      merged.release();
      timeout.release();
    }
  }

  /**
   * Sends the request, checks the response, then drains or decodes its body.
   * Every path reads the body to the end or fails while reading it.
   */
  async #send(
    request: ApiRequest,
    dump: string,
    signal: AbortSignal | null,
    schema: StandardSchemaV1 | null,
  ): SafeWrapAsync<Error, unknown> {
    const { method } = request;
    const url = request.url.href;

    if (signal?.aborted) {
      return [new TransportError(`error ${method} ${url} canceled before sending`, { cause: abortReason(signal) }), null];
    }

    const [errInit, fetchRequest] = safeWrap(
      () => new Request(url, { method, headers: request.headers, body: request.body, signal }),
    );
    if (errInit) {
      return [new TransportError(`error preparing ${method} ${url}`, { cause: errInit }), null];
    }

    this.#logger?.debug({ method, url }, 'sending eBay API request');

    const [errFetch, response] = await safeWrapAsync(() => this.#fetch(fetchRequest));
    if (errFetch) {
      if (signal?.aborted) {
        return [new TransportError(`error sending ${method} ${url}`, { cause: abortReason(signal) }), null];
      }

      const tokenError = getTokenError(errFetch);
      if (tokenError) {
        return [tokenError, null];
      }

      return [new TransportError(`error sending ${method} ${url}`, { cause: errFetch }), null];
    }

    const apiError = await checkResponse(request, response, dump);
    if (signal?.aborted) {
      return [new TransportError(`error reading ${method} ${url} response`, { cause: abortReason(signal) }), null];
    }

    if (apiError) {
      return [apiError, null];
    }

    if (!schema) {
      const [errDrain] = await safeWrapAsync(() => response.arrayBuffer());
      if (errDrain) {
        return [new TransportError(`error reading ${method} ${url} response`, { cause: errDrain }), null];
      }

      return [null, null];
    }

    const [errText, text] = await safeWrapAsync(() => response.text());
    if (errText) {
      const cause = signal?.aborted ? abortReason(signal) : errText;
      return [new TransportError(`error reading ${method} ${url} response`, { cause }), null];
    }

    const [errJson, json] = safeWrap((): unknown => JSON.parse(text));
    if (errJson) {
      return [new DecodingError(`error parsing ${method} ${url} response as JSON`, [], { cause: errJson }), null];
    }

    const [errDecode, decoded] = await validator(json, schema);
    if (errDecode) {
      return [
        new DecodingError(`error decoding ${method} ${url} response`, errDecode.issues, { cause: errDecode }),
        null,
      ];
    }

    return [null, decoded];
  }
}
