/** Authorization and token URLs of an eBay OAuth2 environment. */
export interface OAuthEndpoint {
  /** Consent page users are redirected to in the authorization code grant. */
  readonly authURL: string;
  /** Token endpoint every grant posts to. */
  readonly tokenURL: string;
}

/** eBay production OAuth2 endpoint. */
export const OAuth20Endpoint: OAuthEndpoint = {
  authURL: 'https://auth.ebay.com/oauth2/authorize',
  tokenURL: 'https://api.ebay.com/identity/v1/oauth2/token',
};

/** eBay sandbox OAuth2 endpoint. */
export const OAuth20SandboxEndpoint: OAuthEndpoint = {
  authURL: 'https://auth.sandbox.ebay.com/oauth2/authorize',
  tokenURL: 'https://api.sandbox.ebay.com/identity/v1/oauth2/token',
};

// eBay API docs: https://developer.ebay.com/api-docs/static/oauth-scopes.html
export const ScopeRoot = 'https://api.ebay.com/oauth/api_scope';
export const ScopeBuyOfferAuction = `${ScopeRoot}/buy.offer.auction`;
export const ScopeBuyGuestOrder = `${ScopeRoot}/buy.guest.order`;
export const ScopeBuyItemFeed = `${ScopeRoot}/buy.item.feed`;
export const ScopeBuyMarketing = `${ScopeRoot}/buy.marketing`;
export const ScopeBuyOrderReadonly = `${ScopeRoot}/buy.order.readonly`;
export const ScopeCommerceIdentityReadonly = `${ScopeRoot}/commerce.identity.readonly`;
