import { describe, expect, it, vi } from 'vitest';
import { TokenError } from '../error/tokenError.js';
import type { FetchLike } from '../types/request.js';
import { OAuth20SandboxEndpoint, ScopeBuyOrderReadonly, ScopeRoot } from './endpoints.js';
import { refreshTokenSource } from './refreshToken.js';
import type { Token } from './tokenSource.js';

function tokenFetch() {
  return vi.fn<FetchLike>(() =>
    Promise.resolve(
      new Response(JSON.stringify({ access_token: 'fresh-token', token_type: 'Bearer', expires_in: 7200 }), {
        headers: { 'Content-Type': 'application/json' },
      }),
    ),
  );
}

const config = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  endpoint: OAuth20SandboxEndpoint,
  scopes: [ScopeRoot, ScopeBuyOrderReadonly],
};

describe('refreshTokenSource', () => {
  it('hands out the initial token while it is valid', async () => {
    const fetch = tokenFetch();
    const initial: Token = {
      accessToken: 'user-token',
      tokenType: 'Bearer',
      expiresAt: new Date(Date.now() + 60_000),
      refreshToken: 'test-refresh',
    };

    const [, token] = await refreshTokenSource({ ...config, fetch }, initial).token();

    expect(token).toBe(initial);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('refreshes an expired token and keeps its refresh token', async () => {
    const fetch = tokenFetch();
    const initial: Token = {
      accessToken: 'user-token',
      tokenType: 'Bearer',
      expiresAt: new Date(Date.now() - 1000),
      refreshToken: 'test-refresh',
      scope: ScopeRoot,
    };

    const [err, token] = await refreshTokenSource({ ...config, fetch }, initial).token();

    expect(err).toBeNull();
    expect(token?.accessToken).toBe('fresh-token');
    expect(token?.refreshToken).toBe('test-refresh');
    expect(token?.scope).toBe(ScopeRoot);

    const sent = fetch.mock.calls[0][0];
    expect(sent.url).toBe('https://api.sandbox.ebay.com/identity/v1/oauth2/token');

    const body = new URLSearchParams(await sent.text());
    expect(body.get('grant_type')).toBe('refresh_token');
    expect(body.get('refresh_token')).toBe('test-refresh');
    expect(body.get('scope')).toBe(`${ScopeRoot} ${ScopeBuyOrderReadonly}`);
  });

  it('fails with a TokenError when an expired token has no refresh token', async () => {
    const fetch = tokenFetch();
    const initial: Token = { accessToken: 'user-token', tokenType: 'Bearer', expiresAt: new Date(Date.now() - 1000) };

    const [err, token] = await refreshTokenSource({ ...config, fetch }, initial).token();

    expect(token).toBeNull();
    expect(err).toBeInstanceOf(TokenError);
    expect(err?.cause instanceof Error && err.cause.message).toBe(
      'error token has expired and carries no refresh token',
    );
    expect(fetch).not.toHaveBeenCalled();
  });
});
