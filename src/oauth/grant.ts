import * as oauth from 'oauth4webapi';
import type { FetchLike } from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { OAuth20Endpoint, type OAuthEndpoint, ScopeRoot } from './endpoints.js';
import type { Token } from './tokenSource.js';

/** Application credentials and environment shared by every grant. */
export interface OAuthConfig {
  clientId: string;
  clientSecret: string;
  /**
   * eBay environment to authenticate against.
   * @default OAuth20Endpoint
   */
  endpoint?: OAuthEndpoint;
  /**
   * Scopes requested.
   * @default [ScopeRoot]
   */
  scopes?: string[];
  /** Transport for token requests, defaults to the global `fetch`. */
  fetch?: FetchLike;
}

export function authorizationServer({ endpoint = OAuth20Endpoint }: OAuthConfig): oauth.AuthorizationServer {
  return {
    issuer: new URL(endpoint.tokenURL).origin,
    authorization_endpoint: endpoint.authURL,
    token_endpoint: endpoint.tokenURL,
  };
}

export function oauthClient(config: OAuthConfig): oauth.Client {
  return {
    client_id: config.clientId,
    client_secret: config.clientSecret,
    token_endpoint_auth_method: 'client_secret_basic',
  };
}

export function scopeOf({ scopes = [ScopeRoot] }: OAuthConfig): string {
  return scopes.join(' ');
}

/** Token endpoint request options carrying the configured transport and `signal`. */
export function requestOptions(config: OAuthConfig, signal?: AbortSignal): oauth.TokenEndpointRequestOptions {
  const options: oauth.TokenEndpointRequestOptions = {};
  if (signal) {
    options.signal = signal;
  }

  const { fetch } = config;
  if (fetch) {
    options[oauth.customFetch] = (input: RequestInfo | URL, init?: RequestInit) => fetch(new Request(input, init));
  }

  return options;
}

/** Fields of a successful token endpoint response the grants read. */
export interface TokenResponse {
  readonly access_token: string;
  readonly token_type: string;
  readonly expires_in?: number;
  readonly scope?: string;
  readonly [parameter: string]: unknown;
}

function isErrorResponse(result: TokenResponse | oauth.OAuth2Error): result is oauth.OAuth2Error {
  return typeof result.error === 'string';
}

/**
 * Sends a token request and processes its response into a {@link Token}, turning both thrown failures
 * and OAuth2 error responses into errors naming the grant. Whatever the response leaves out is kept from `previous`.
 */
export async function exchange(
  grant: string,
  send: () => Promise<Response>,
  process: (response: Response) => Promise<TokenResponse | oauth.OAuth2Error>,
  previous: Token | null = null,
): SafeWrapAsync<Error, Token> {
  const [errSend, response] = await safeWrapAsync(send);
  if (errSend) {
    return [new Error(`error requesting ${grant} token`, { cause: errSend }), null];
  }

  const [errProcess, result] = await safeWrapAsync(() => process(response));
  if (errProcess) {
    return [new Error(`error processing ${grant} token response`, { cause: errProcess }), null];
  }

  if (isErrorResponse(result)) {
    const detail = result.error_description ? `: ${result.error_description}` : '';
    return [new Error(`error ${grant} grant rejected with ${result.error}${detail}`), null];
  }

  return [null, toToken(result, previous)];
}

/** Converts a token endpoint response, keeping what the response leaves out from `previous`. */
export function toToken(response: TokenResponse, previous: Token | null = null, now = Date.now()): Token {
  const { refresh_token: refreshToken } = response;

  return {
    accessToken: response.access_token,
    tokenType: response.token_type,
    expiresAt: response.expires_in === undefined ? undefined : new Date(now + response.expires_in * 1000),
    refreshToken: typeof refreshToken === 'string' ? refreshToken : previous?.refreshToken,
    scope: response.scope ?? previous?.scope,
  };
}
