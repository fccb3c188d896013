/** Any error class, whatever its constructor takes. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Cyclic cause chains end the search instead of looping.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<Error>();
  let current = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
