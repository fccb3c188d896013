import * as oauth from 'oauth4webapi';
import { type SafeWrapAsync, safeWrap } from '../utils/wrap.js';
import { OAuth20Endpoint } from './endpoints.js';
import { authorizationServer, exchange, type OAuthConfig, oauthClient, requestOptions, scopeOf } from './grant.js';
import type { Token } from './tokenSource.js';

/** Configuration of the authorization code grant. */
export interface AuthorizationCodeConfig extends OAuthConfig {
  /** The application's RuName, eBay's stand-in for the redirect URI. */
  redirectUri: string;
}

export interface AuthorizationURLOptions {
  /** Opaque value echoed back to the callback, checked by {@link exchangeAuthorizationCode}. */
  state: string;
  /** Overrides the configured scopes for this consent. */
  scopes?: string[];
  /** S256 PKCE challenge of the verifier later passed to {@link exchangeAuthorizationCode}. */
  codeChallenge: string;
}

export interface ExchangeOptions {
  state: string;
  codeVerifier: string;
  signal?: AbortSignal;
}

/**
 * Builds the consent page URL users are sent to.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/static/oauth-consent-request.html
 */
export function authorizationCodeURL(config: AuthorizationCodeConfig, opts: AuthorizationURLOptions): URL {
  const { endpoint = OAuth20Endpoint } = config;
  const url = new URL(endpoint.authURL);
  url.searchParams.set('client_id', config.clientId);
  url.searchParams.set('redirect_uri', config.redirectUri);
  url.searchParams.set('response_type', 'code');
  url.searchParams.set('scope', scopeOf({ ...config, scopes: opts.scopes ?? config.scopes }));
  url.searchParams.set('state', opts.state);
  url.searchParams.set('code_challenge', opts.codeChallenge);
  url.searchParams.set('code_challenge_method', 'S256');

  return url;
}

/**
 * Exchanges the code of the URL eBay redirected the user to for a user token.
 * Fails when the callback carries an error, or a state other than `opts.state`.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/static/oauth-auth-code-grant-request.html
 */
export async function exchangeAuthorizationCode(
  config: AuthorizationCodeConfig,
  callbackUrl: string | URL,
  opts: ExchangeOptions,
): SafeWrapAsync<Error, Token> {
  const as = authorizationServer(config);
  const client = oauthClient(config);

  const [errCallback, params] = safeWrap(() =>
    oauth.validateAuthResponse(as, client, new URL(callbackUrl), opts.state),
  );
  if (errCallback) {
    return [new Error('error validating authorization callback', { cause: errCallback }), null];
  }

  if (!(params instanceof URLSearchParams)) {
    const detail = params.error_description ? `: ${params.error_description}` : '';
    return [new Error(`error authorization denied with ${params.error}${detail}`), null];
  }

  return exchange(
    'authorization code',
    () =>
      oauth.authorizationCodeGrantRequest(
        as,
        client,
        params,
        config.redirectUri,
        opts.codeVerifier,
        requestOptions(config, opts.signal),
      ),
    (res) => oauth.processAuthorizationCodeOAuth2Response(as, client, res),
  );
}
