import type { HeaderOptions } from '../types/request.js';

/**
 * Normalizes the different header container shapes into a consistent iterable.
 */
function toEntries(headers?: HeaderOptions): Iterable<[string, string | undefined]> {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return headers.entries();
  }

  if (Array.isArray(headers)) {
    return headers.map(([key, value]): [string, string] => [key, value]);
  }

  return Object.entries(headers);
}

/**
 * Merge header layers into a single `Headers` instance; later layers win,
 * and an `undefined` value removes the header set by an earlier layer.
 */
export function mergeHeaderOptions(...layers: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const layer of layers) {
    for (const [key, value] of toEntries(layer)) {
      if (value === undefined) {
        merged.delete(key);
        continue;
      }

      merged.set(key, value);
    }
  }

  return merged;
}

/**
 * Appends `value` to a comma-separated header, keeping whatever the header already holds.
 */
export function appendHeaderValue(headers: Headers, name: string, value: string): void {
  const existing = headers.get(name);
  headers.set(name, existing ? `${existing},${value}` : value);
}
