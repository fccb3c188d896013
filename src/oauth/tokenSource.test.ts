import { describe, expect, it, vi } from 'vitest';
import { isAbortError } from '../error/abortError.js';
import { TokenError } from '../error/tokenError.js';
import type { SafeWrap } from '../utils/wrap.js';
import {
  expiryDelta,
  isTokenValid,
  ReuseTokenSource,
  type Token,
  type TokenExchange,
  type TokenSource,
  wrapTokenSource,
} from './tokenSource.js';

function tokenExpiringIn(ms: number, accessToken = 'test-token'): Token {
  return { accessToken, tokenType: 'Bearer', expiresAt: new Date(Date.now() + ms) };
}

describe('isTokenValid', () => {
  it('accepts tokens without an expiry', () => {
    expect(isTokenValid({ accessToken: 'test-token', tokenType: 'Bearer' })).toBe(true);
  });

  it('rejects tokens without an access token', () => {
    expect(isTokenValid({ accessToken: '', tokenType: 'Bearer' })).toBe(false);
  });

  it('treats tokens as expired shortly before their expiry', () => {
    const now = Date.UTC(2026, 0, 1);
    const token: Token = { accessToken: 'test-token', tokenType: 'Bearer', expiresAt: new Date(now + expiryDelta + 1) };

    expect(isTokenValid(token, now)).toBe(true);
    expect(isTokenValid(token, now + 1)).toBe(false);
  });
});

describe('wrapTokenSource', () => {
  it('forwards tokens as they are', async () => {
    const token = tokenExpiringIn(60_000);
    const source: TokenSource = {
      async token() {
        return [null, token];
      },
    };

    const [err, result] = await wrapTokenSource(source).token();

    expect(err).toBeNull();
    expect(result).toBe(token);
  });

  it('wraps failures in a TokenError', async () => {
    const cause = new Error('error requesting client credentials token');
    const source: TokenSource = {
      async token() {
        return [cause, null];
      },
    };

    const [err, result] = await wrapTokenSource(source).token();

    expect(result).toBeNull();
    expect(err).toBeInstanceOf(TokenError);
    expect(err?.message).toBe('error retrieving OAuth2 token');
    expect(err?.cause).toBe(cause);
  });

  it('wraps rejections in a TokenError', async () => {
    const cause = new Error('boom');
    const source: TokenSource = {
      token: () => Promise.reject(cause),
    };

    const [err] = await wrapTokenSource(source).token();

    expect(err).toBeInstanceOf(TokenError);
    expect(err?.cause).toBe(cause);
  });

  it('passes the signal through', async () => {
    const token = vi.fn<TokenSource['token']>(async () => [null, tokenExpiringIn(60_000)]);
    const controller = new AbortController();

    await wrapTokenSource({ token }).token(controller.signal);

    expect(token).toHaveBeenCalledWith(controller.signal);
  });
});

describe('ReuseTokenSource', () => {
  it('hands out a valid initial token without exchanging', async () => {
    const initial = tokenExpiringIn(60_000);
    const exchange = vi.fn<TokenExchange>();
    const source = new ReuseTokenSource(exchange, initial);

    const [, token] = await source.token();

    expect(token).toBe(initial);
    expect(exchange).not.toHaveBeenCalled();
  });

  it('exchanges an expiring token, passing it along', async () => {
    const initial = tokenExpiringIn(expiryDelta / 2, 'old-token');
    const fresh = tokenExpiringIn(60_000, 'fresh-token');
    const exchange = vi.fn<TokenExchange>(async () => [null, fresh]);
    const source = new ReuseTokenSource(exchange, initial);

    const [, token] = await source.token();
    const [, again] = await source.token();

    expect(token).toBe(fresh);
    expect(again).toBe(fresh);
    expect(exchange).toHaveBeenCalledTimes(1);
    expect(exchange).toHaveBeenCalledWith(initial, expect.any(AbortSignal));
  });

  it('shares one exchange between concurrent callers', async () => {
    const fresh = tokenExpiringIn(60_000);
    const exchange = vi.fn<TokenExchange>(async () => [null, fresh]);
    const source = new ReuseTokenSource(exchange);

    const results = await Promise.all([source.token(), source.token(), source.token()]);

    expect(exchange).toHaveBeenCalledTimes(1);
    expect(results.map(([, token]) => token)).toEqual([fresh, fresh, fresh]);
  });

  it('does not remember failed exchanges', async () => {
    const failure = new Error('error requesting client credentials token');
    const fresh = tokenExpiringIn(60_000);
    const exchange = vi
      .fn<TokenExchange>()
      .mockResolvedValueOnce([failure, null])
      .mockResolvedValueOnce([null, fresh]);
    const source = new ReuseTokenSource(exchange);

    const [err] = await source.token();
    const [, token] = await source.token();

    expect(err).toBe(failure);
    expect(token).toBe(fresh);
    expect(exchange).toHaveBeenCalledTimes(2);
  });

  describe('cancellation', () => {
    /** Exchange that stays pending until `settle` resolves its latest call. */
    function pendingExchange() {
      let resolveLatest: (result: SafeWrap<Error, Token>) => void = () => {};
      const exchange = vi.fn<TokenExchange>(
        () =>
          new Promise((resolve) => {
            resolveLatest = resolve;
          }),
      );

      return { exchange, settle: (result: SafeWrap<Error, Token>) => resolveLatest(result) };
    }

    it('ends only the wait of the caller that canceled', async () => {
      const fresh = tokenExpiringIn(60_000);
      const { exchange, settle } = pendingExchange();
      const source = new ReuseTokenSource(exchange);
      const controller = new AbortController();

      const canceled = source.token(controller.signal);
      const waiting = source.token();
      controller.abort();

      const [errCanceled, none] = await canceled;
      expect(none).toBeNull();
      expect(isAbortError(errCanceled)).toBe(true);
      expect(exchange.mock.calls[0][1].aborted).toBe(false);

      settle([null, fresh]);
      const [err, token] = await waiting;

      expect(err).toBeNull();
      expect(token).toBe(fresh);
      expect(exchange).toHaveBeenCalledTimes(1);
    });

    it('aborts the exchange once every caller has canceled, and starts over on the next call', async () => {
      const fresh = tokenExpiringIn(60_000);
      const { exchange, settle } = pendingExchange();
      const source = new ReuseTokenSource(exchange);
      const first = new AbortController();
      const second = new AbortController();

      const calls = [source.token(first.signal), source.token(second.signal)];
      first.abort();
      expect(exchange.mock.calls[0][1].aborted).toBe(false);
      second.abort();
      await Promise.all(calls);
      expect(exchange.mock.calls[0][1].aborted).toBe(true);

      const retried = source.token();
      expect(exchange).toHaveBeenCalledTimes(2);
      settle([null, fresh]);

      const [, token] = await retried;
      expect(token).toBe(fresh);
    });

    it('does not start an exchange for a caller canceled up front', async () => {
      const exchange = vi.fn<TokenExchange>();
      const controller = new AbortController();
      controller.abort();

      const [err] = await new ReuseTokenSource(exchange).token(controller.signal);

      expect(isAbortError(err)).toBe(true);
      expect(exchange).not.toHaveBeenCalled();
    });
  });
});
