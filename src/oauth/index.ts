/**
 * OAuth2 entrypoint: token sources for the eBay grants and the transport that sends their tokens.
 * @module
 */

export { calculatePKCECodeChallenge, generateRandomCodeVerifier, generateRandomState } from 'oauth4webapi';
export { authenticatedFetch } from './authenticatedFetch.js';
export {
  type AuthorizationCodeConfig,
  type AuthorizationURLOptions,
  authorizationCodeURL,
  type ExchangeOptions,
  exchangeAuthorizationCode,
} from './authorizationCode.js';
export { clientCredentialsTokenSource } from './clientCredentials.js';
export * from './endpoints.js';
export type { OAuthConfig } from './grant.js';
export { refreshTokenSource } from './refreshToken.js';
export {
  expiryDelta,
  isTokenValid,
  ReuseTokenSource,
  type Token,
  type TokenExchange,
  type TokenSource,
  wrapTokenSource,
} from './tokenSource.js';
