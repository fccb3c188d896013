import * as oauth from 'oauth4webapi';
import { authorizationServer, exchange, type OAuthConfig, oauthClient, requestOptions, scopeOf } from './grant.js';
import { ReuseTokenSource, type TokenSource, wrapTokenSource } from './tokenSource.js';

/**
 * Application token source using the client credentials grant.
 *
 * Tokens are reused until shortly before they expire; failures come back as {@link TokenError}.
 *
 * eBay API docs: https://developer.ebay.com/api-docs/static/oauth-client-credentials-grant.html
 * @example
 * const source = clientCredentialsTokenSource({ clientId, clientSecret, endpoint: OAuth20SandboxEndpoint });
 * const client = Client.sandbox({ fetch: authenticatedFetch(source) });
 */
export function clientCredentialsTokenSource(config: OAuthConfig): TokenSource {
  const as = authorizationServer(config);
  const client = oauthClient(config);

  return wrapTokenSource(
    new ReuseTokenSource((_, signal) => {
      return exchange(
        'client credentials',
        () =>
          oauth.clientCredentialsGrantRequest(
            as,
            client,
            new URLSearchParams({ scope: scopeOf(config) }),
            requestOptions(config, signal),
          ),
        (res) => oauth.processClientCredentialsResponse(as, client, res),
      );
    }),
  );
}
