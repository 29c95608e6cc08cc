import { ConstructURLError } from '../error/constructUrlError.js';
import type { SafeWrap } from './wrap.js';

/** Values accepted for `{placeholder}` replacement and query entries. */
export type ParamValue = string | number | boolean;

/** Query entries; `undefined` and `null` values are skipped. */
export type QueryParams = Readonly<Record<string, ParamValue | null | undefined>>;

/**
 * Fills `{name}` placeholders of a path template with URI-encoded values.
 * Placeholders without a value are left in place.
 */
export function fillPath(template: string, params: Readonly<Record<string, ParamValue>> = {}): string {
  return template.replace(/\{([^{}]+)\}/g, (placeholder, key: string) => {
    const value = params[key];
    return value === undefined ? placeholder : encodeURIComponent(String(value));
  });
}

/**
 * Joins a base URL, a path template and query params into an absolute URL.
 *
 * - `params` replace `{name}` placeholders in `path`.
 * - `query` entries are appended in insertion order; `undefined`/`null` values are skipped.
 * - Slashes between `baseUrl` and `path` are normalized to exactly one.
 * - A placeholder left without a value fails with a {@link ConstructURLError}.
 */
export function constructUrl(
  baseUrl: string,
  path: string,
  params?: Readonly<Record<string, ParamValue>>,
  query?: QueryParams,
): SafeWrap<ConstructURLError, string> {
  let result = fillPath(path, params).replace(/^\/+/, '');

  if (result.includes('{') || result.includes('}')) {
    const missing = Array.from(result.matchAll(/\{([^{}]+)\}/g), (match) => match[1] ?? '');
    return [
      new ConstructURLError(
        missing.length > 0
          ? `error constructing URL, no value for ${missing.join(', ')} in ${result}`
          : `error constructing URL, unbalanced braces in ${result}`,
        result,
        missing,
      ),
      null,
    ];
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value === undefined || value === null) {
      continue;
    }
    searchParams.set(key, String(value));
  }

  const search = searchParams.toString();
  if (search) {
    result += `${result.includes('?') ? '&' : '?'}${search}`;
  }

  return [null, joinUrl(baseUrl, result)];
}

/**
 * Joins a base URL and an already-filled path with exactly one slash between them.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
