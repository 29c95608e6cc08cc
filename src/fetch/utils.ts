import type { HeaderOptions } from '../types/request.js';

type HeaderValue = string | number | boolean | bigint;

function isHeaderValue(value: unknown): value is HeaderValue {
  const type = typeof value;
  return type === 'string' || type === 'number' || type === 'boolean' || type === 'bigint';
}

function* headerEntries(headers: HeaderOptions | undefined): Generator<[string, unknown]> {
  if (!headers) {
    return;
  }

  if (headers instanceof Headers || Array.isArray(headers)) {
    for (const [key, value] of headers) {
      yield [String(key), value];
    }
    return;
  }

  yield* Object.entries(headers);
}

/**
 * Merges header sets left to right into one `Headers`; later sets win, names compare
 * case-insensitively. A `null`/`undefined` value removes the header an earlier set added.
 * Values that are not primitives are skipped.
 */
export function mergeHeaderOptions(...sets: Array<HeaderOptions | undefined>): Headers {
  const merged = new Headers();

  for (const set of sets) {
    for (const [key, value] of headerEntries(set)) {
      if (value === null || value === undefined) {
        merged.delete(key);
      } else if (isHeaderValue(value)) {
        merged.set(key, String(value));
      }
    }
  }

  return merged;
}
