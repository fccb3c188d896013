/**
 * The parts of an outgoing request an {@link Opt} may touch.
 * Method, body and the resolved URL are out of its reach.
 */
export interface OptTarget {
  readonly headers: Headers;
  readonly searchParams: URLSearchParams;
}

/** Functional option applied to a request before it is sent. */
export type Opt = (target: OptTarget) => void;

/**
 * Applies options left to right and hands back the same target.
 */
export function applyOpts<T extends OptTarget>(target: T, opts: readonly Opt[]): T {
  for (const opt of opts) {
    opt(target);
  }

  return target;
}

/** Sets a query parameter, replacing any earlier value. */
export function optQuery(name: string, value: string | number): Opt {
  return ({ searchParams }) => searchParams.set(name, String(value));
}

/** Sets a header, replacing any earlier value. */
export function optHeader(name: string, value: string): Opt {
  return ({ headers }) => headers.set(name, value);
}
