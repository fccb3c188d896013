import { describe, expect, it } from 'vitest';
import { EncodingError } from '../error/encodingError.js';
import { InvalidPathError } from '../error/invalidPathError.js';
import { URLError } from '../error/urlError.js';
import { optHeader, optQuery } from './opt.js';
import { newRequest, type RequestBase } from './request.js';

const base: RequestBase = { baseUrl: new URL('https://api.ebay.com/') };
const prefixed: RequestBase = { baseUrl: new URL('https://gateway.example.com/proxy/ebay/') };

describe('newRequest', () => {
  describe('path resolution', () => {
    it.each([
      ['buy/browse/v1/item/v1|1|0', 'https://api.ebay.com/buy/browse/v1/item/v1|1|0'],
      ['buy/browse/v1/item_summary/search?q=drone', 'https://api.ebay.com/buy/browse/v1/item_summary/search?q=drone'],
      ['', 'https://api.ebay.com/'],
    ])('resolves %j against the base URL', (path, expected) => {
      const [err, request] = newRequest(base, 'GET', path);

      expect(err).toBeNull();
      expect(request?.url.href).toBe(expected);
    });

    it('keeps the base path prefix', () => {
      const [err, request] = newRequest(prefixed, 'GET', 'buy/browse/v1/item/abc');

      expect(err).toBeNull();
      expect(request?.url.href).toBe('https://gateway.example.com/proxy/ebay/buy/browse/v1/item/abc');
    });

    it('follows URL semantics for dot segments and absolute references', () => {
      const [, up] = newRequest(prefixed, 'GET', '../other');
      const [, absolute] = newRequest(prefixed, 'GET', 'https://other.example.com/x');

      expect(up?.url.href).toBe('https://gateway.example.com/proxy/other');
      expect(absolute?.url.href).toBe('https://other.example.com/x');
    });

    it.each(['/buy/browse/v1/item/abc', '/', '//evil.example.com/x'])('rejects %j with InvalidPathError', (path) => {
      const [err, request] = newRequest(prefixed, 'GET', path);

      expect(request).toBeNull();
      expect(err).toBeInstanceOf(InvalidPathError);
    });

    it('rejects unresolvable references with URLError', () => {
      const [err, request] = newRequest(base, 'GET', 'http://[invalid');

      expect(request).toBeNull();
      expect(err).toBeInstanceOf(URLError);
      expect(err instanceof URLError && err.url).toBe('http://[invalid');
      expect(err?.cause).toBeInstanceOf(TypeError);
    });
  });

  describe('body', () => {
    it('has no body and no content type by default', () => {
      const [, request] = newRequest(base, 'GET', 'x');

      expect(request?.body).toBeNull();
      expect(request?.headers.get('accept')).toBe('application/json');
      expect(request?.headers.has('content-type')).toBe(false);
    });

    it('encodes the body as JSON without escaping HTML characters', () => {
      const [err, request] = newRequest(base, 'POST', 'buy/order/v2/guest_checkout_session/initiate', {
        q: '<b>bread & butter</b>',
      });

      expect(err).toBeNull();
      expect(request?.body).toBe('{"q":"<b>bread & butter</b>"}');
      expect(request?.headers.get('content-type')).toBe('application/json');
    });

    it('treats null as no body', () => {
      const [err, request] = newRequest(base, 'POST', 'x', null);

      expect(err).toBeNull();
      expect(request?.body).toBeNull();
    });

    it('fails with EncodingError for values JSON cannot hold', () => {
      const circular: Record<string, unknown> = {};
      circular.self = circular;

      const [errBigInt] = newRequest(base, 'POST', 'x', { amount: 10n });
      const [errCircular] = newRequest(base, 'POST', 'x', circular);
      const [errFunction] = newRequest(base, 'POST', 'x', () => 'no json');

      expect(errBigInt).toBeInstanceOf(EncodingError);
      expect(errCircular).toBeInstanceOf(EncodingError);
      expect(errFunction).toBeInstanceOf(EncodingError);
      expect(errFunction?.message).toBe('error request body of type function has no JSON representation');
    });

    it('fails with EncodingError for a body on GET', () => {
      const [err] = newRequest(base, 'GET', 'x', { q: 'drone' });

      expect(err).toBeInstanceOf(EncodingError);
      expect(err?.message).toBe('error method GET does not allow a request body');
    });

    it('checks the path before encoding the body', () => {
      const [err] = newRequest(base, 'POST', '/x', { amount: 10n });
      expect(err).toBeInstanceOf(InvalidPathError);
    });
  });

  describe('options', () => {
    it('applies options to headers and query parameters in order', () => {
      const [err, request] = newRequest(
        base,
        'GET',
        'buy/browse/v1/item_summary/search?q=drone',
        undefined,
        optQuery('limit', 2),
        optHeader('X-EBAY-C-MARKETPLACE-ID', 'EBAY_US'),
        optHeader('X-EBAY-C-MARKETPLACE-ID', 'EBAY_DE'),
      );

      expect(err).toBeNull();
      expect(request?.url.href).toBe('https://api.ebay.com/buy/browse/v1/item_summary/search?q=drone&limit=2');
      expect(request?.headers.get('x-ebay-c-marketplace-id')).toBe('EBAY_DE');
      expect(request?.method).toBe('GET');
    });

    it('starts from the base headers', () => {
      const [, request] = newRequest(
        { baseUrl: base.baseUrl, headers: { 'Accept-Language': 'en-US', Accept: 'application/hal+json' } },
        'GET',
        'x',
      );

      expect(request?.headers.get('accept-language')).toBe('en-US');
      expect(request?.headers.get('accept')).toBe('application/hal+json');
    });
  });
});
