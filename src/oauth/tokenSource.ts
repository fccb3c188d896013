import { TokenError } from '../error/tokenError.js';
import { abortReason } from '../utils/signals.js';
import { type SafeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** OAuth2 access token as handed out by a {@link TokenSource}. */
export interface Token {
  accessToken: string;
  /** Token type as reported by the token endpoint; requests always send it as a bearer token. */
  tokenType: string;
  /** Absent when the token endpoint didn't say when the token expires. */
  expiresAt?: Date;
  refreshToken?: string;
  /** Space-separated scopes granted, when reported. */
  scope?: string;
}

/** Anything that can produce an access token on demand. */
export interface TokenSource {
  token(signal?: AbortSignal): SafeWrapAsync<Error, Token>;
}

/** Exchanges for a fresh token, given the last token handed out (if any); `signal` aborts once nobody waits anymore. */
export type TokenExchange = (previous: Token | null, signal: AbortSignal) => SafeWrapAsync<Error, Token>;

/** Tokens are considered expired this long before their actual expiry. */
export const expiryDelta = 10_000;

/**
 * Reports whether `token` can still be used at `now`.
 * A token without an expiry never expires.
 */
export function isTokenValid(token: Token, now = Date.now()): boolean {
  if (!token.accessToken) {
    return false;
  }

  return token.expiresAt === undefined || token.expiresAt.getTime() - expiryDelta > now;
}

/**
 * Wraps a token source so that its failures come back as a {@link TokenError}
 * with the original failure as `cause`. Tokens are forwarded as they are, nothing is cached.
 */
export function wrapTokenSource(source: TokenSource): TokenSource {
  return {
    async token(signal) {
      const [errCall, result] = await safeWrapAsync(() => source.token(signal));
      if (errCall) {
        return [new TokenError('error retrieving OAuth2 token', { cause: errCall }), null];
      }

      const [err, token] = result;
      if (err) {
        return [new TokenError('error retrieving OAuth2 token', { cause: err }), null];
      }

      return [null, token];
    },
  };
}

/** An exchange in flight and the callers waiting on it. */
interface PendingExchange {
  result: SafeWrapAsync<Error, Token>;
  controller: AbortController;
  waiters: number;
}

/**
 * Token source that hands out the current token until it expires, then runs `exchange` for a new one.
 *
 * Concurrent callers asking while an exchange is running share it. A caller's signal only ends
 * that caller's wait; the exchange itself is aborted once every waiting caller has canceled.
 * Failed exchanges are not remembered; the next call tries again.
 */
export class ReuseTokenSource implements TokenSource {
  #exchange: TokenExchange;
  #current: Token | null;
  #pending: PendingExchange | null = null;

  constructor(exchange: TokenExchange, initial: Token | null = null) {
    this.#exchange = exchange;
    this.#current = initial;
  }

  token(signal?: AbortSignal): SafeWrapAsync<Error, Token> {
    const current = this.#current;
    if (current && isTokenValid(current)) {
      return Promise.resolve([null, current]);
    }

    if (signal?.aborted) {
      return Promise.resolve([abortReason(signal), null]);
    }

    const pending = this.#pending ?? this.#start(current);
    return this.#wait(pending, signal);
  }

  #start(previous: Token | null): PendingExchange {
    const controller = new AbortController();
    const pending: PendingExchange = {
      controller,
      waiters: 0,
      result: this.#renew(previous, controller.signal).finally(() => {
        if (this.#pending === pending) {
          this.#pending = null;
        }
      }),
    };
    this.#pending = pending;

    return pending;
  }

  async #wait(pending: PendingExchange, signal?: AbortSignal): SafeWrapAsync<Error, Token> {
    pending.waiters += 1;
    if (!signal) {
      return pending.result;
    }

    let onAbort = () => {};
    const canceled = new Promise<SafeWrap<Error, Token>>((resolve) => {
      onAbort = () => {
        pending.waiters -= 1;
        if (pending.waiters === 0) {
          if (this.#pending === pending) {
            this.#pending = null;
          }

          pending.controller.abort(signal.reason);
        }

        resolve([abortReason(signal), null]);
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([pending.result, canceled]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  async #renew(previous: Token | null, signal: AbortSignal): SafeWrapAsync<Error, Token> {
    const [errCall, result] = await safeWrapAsync(() => this.#exchange(previous, signal));
    if (errCall) {
      return [errCall, null];
    }

    const [err, token] = result;
    if (err) {
      return [err, null];
    }

    this.#current = token;
    return [null, token];
  }
}
