/** Any error constructor, whatever its constructor parameters. */
export type ErrorClass<T extends Error> = new (...args: never[]) => T;

/**
 * Extract a specific error type from an unknown error value, following nested causes.
 * Matches on `instanceof` first, then on the error `name`, so errors crossing realms or
 * bundles are still recognised.
 */
export function unwrapErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): T | null {
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof errorClass) {
      return current;
    }

    if (current.name === errorClass.name) {
      return current as T;
    }

    seen.add(current);
    current = current.cause;
  }

  return null;
}
