import { safeWrap, type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

const NO_BODY_STATUSES = new Set([204, 205, 304]);

function isJsonContentType(contentType: string): boolean {
  const [mediaType = ''] = contentType.toLowerCase().split(';');
  return mediaType.trim() === 'application/json' || mediaType.trim().endsWith('+json');
}

/**
 * Reads a response body once and decodes it.
 *
 * Statuses without a body and empty bodies decode to `null`. A JSON media type must parse.
 * Without any `Content-Type` a body that parses as JSON is taken as JSON, since some
 * proxies in front of the service strip the header; otherwise the text is returned.
 */
export async function readBody(response: Response): SafeWrapAsync<Error, unknown> {
  if (NO_BODY_STATUSES.has(response.status)) {
    return [null, null];
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  if (errText) {
    return [new Error(`error reading body of ${response.status} response`, { cause: errText }), null];
  }

  if (text.trim() === '') {
    return [null, null];
  }

  const contentType = response.headers.get('Content-Type');
  const [errJson, json] = safeWrap<unknown>(() => JSON.parse(text));

  if (contentType === null) {
    return [null, errJson ? text : json];
  }

  if (!isJsonContentType(contentType)) {
    return [null, text];
  }

  if (errJson) {
    return [new Error(`error parsing json body of ${response.status} response`, { cause: errJson }), null];
  }

  return [null, json];
}
