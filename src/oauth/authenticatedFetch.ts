import type { FetchLike } from '../types/request.js';
import type { TokenSource } from './tokenSource.js';

/**
 * Fetch-compatible transport that authenticates every request with a token from `source`.
 *
 * The `Authorization` header is set on a copy, the caller's request is left untouched.
 * When `source` fails the returned promise rejects with its error, which {@link Client.do}
 * hands back as it is for a {@link TokenError}.
 */
export function authenticatedFetch(source: TokenSource, fetch: FetchLike = globalThis.fetch): FetchLike {
  return async (request) => {
    const [err, token] = await source.token(request.signal);
    if (err) {
      throw err;
    }

    const headers = new Headers(request.headers);
    headers.set('Authorization', `Bearer ${token.accessToken}`);

    return fetch(new Request(request, { headers }));
  };
}
