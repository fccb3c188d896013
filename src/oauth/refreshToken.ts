import * as oauth from 'oauth4webapi';
import { authorizationServer, exchange, type OAuthConfig, oauthClient, requestOptions, scopeOf } from './grant.js';
import { ReuseTokenSource, type Token, type TokenSource, wrapTokenSource } from './tokenSource.js';

/**
 * User token source that starts from `token` and renews it with the refresh token grant once it expires.
 *
 * eBay doesn't rotate refresh tokens, so the refresh token of `token` is kept for every renewal.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/static/oauth-refresh-token-request.html
 */
export function refreshTokenSource(config: OAuthConfig, token: Token): TokenSource {
  const as = authorizationServer(config);
  const client = oauthClient(config);

  return wrapTokenSource(
    new ReuseTokenSource(async (previous, signal) => {
      const refreshToken = previous?.refreshToken;
      if (!refreshToken) {
        return [new Error('error token has expired and carries no refresh token'), null];
      }

      return exchange(
        'refresh token',
        () =>
          oauth.refreshTokenGrantRequest(as, client, refreshToken, {
            ...requestOptions(config, signal),
            additionalParameters: { scope: scopeOf(config) },
          }),
        (res) => oauth.processRefreshTokenResponse(as, client, res),
        previous,
      );
    }, token),
  );
}
