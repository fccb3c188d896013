import type { ApiRequest } from './request.js';

/**
 * Renders a request in HTTP/1.1 wire form (request line, `Host`, headers, blank line, body)
 * for diagnostics. Headers are included verbatim, credentials too.
 */
export function dumpRequest(request: ApiRequest): string {
  const { method, url, headers, body } = request;
  const lines = [`${method} ${url.pathname}${url.search} HTTP/1.1`, `Host: ${url.host}`];

  for (const [name, value] of headers) {
    lines.push(`${name}: ${value}`);
  }

  return `${lines.join('\r\n')}\r\n\r\n${body ?? ''}`;
}
