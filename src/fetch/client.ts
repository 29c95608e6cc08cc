import type {
  FetchFunction,
  TransportOptions,
  TransportProviderDefinition,
  TransportRequest,
  TransportResponse,
} from '../types/request.js';
import { readBody } from './body.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/** Default transport timeout in milliseconds. */
export const DEFAULT_TIMEOUT = 30_000;

/**
 * Transport over the `fetch` API that:
 * - merges default and per-call headers,
 * - bounds every call with a timeout merged with the caller's signal,
 * - reads and parses the body for every status,
 * - returns error-first tuples via {@link SafeWrapAsync}.
 *
 * Non-2xx responses are not errors at this layer; classifying them is up to the caller.
 */
export class FetchTransport implements TransportProviderDefinition {
  /** Default headers, timeout and fetch implementation. */
  #opts: TransportOptions;

  /** Creates a new fetch transport with default options */
  constructor(opts?: TransportOptions) {
    this.#opts = opts ?? {};
  }

  /**
   * Updates default options (headers are merged with the existing ones).
   */
  public config(opts: TransportOptions) {
    this.#opts = {
      ...this.#opts,
      ...opts,
      headers: mergeHeaderOptions(this.#opts.headers, opts.headers),
    };
  }

  /**
   * Performs one HTTP call.
   *
   * Errors:
   * - Network / fetch errors are wrapped in `Error` with the original as `cause`.
   * - A timeout surfaces as a `TimeoutError` cause, a caller abort as the signal's reason.
   * - A body that cannot be read or parsed is an error as well.
   */
  public async request(request: TransportRequest): SafeWrapAsync<Error, TransportResponse> {
    const fetchFn: FetchFunction = this.#opts.fetch ?? fetch;
    const timeout = createTimeoutSignal(request.timeout ?? this.#opts.timeout ?? DEFAULT_TIMEOUT);
    const signal = mergeSignals([request.signal, timeout?.signal]);

    try {
      const [errFetch, response] = await safeWrapAsync(async () =>
        fetchFn(request.url, {
          method: request.method,
          headers: mergeHeaderOptions(this.#opts.headers, request.headers),
          body: request.body,
          ...(signal && { signal }),
        }),
      );
      if (errFetch) {
        return [
          new Error(`error in ${request.method} request in fetchTransport`, { cause: signal?.aborted ? signal.reason : errFetch }),
          null,
        ];
      }

      const [errBody, body] = await readBody(response);
      if (errBody) {
        return [new Error(`error reading ${request.method} response in fetchTransport`, { cause: errBody }), null];
      }

      return [null, { status: response.status, headers: response.headers, body }];
    } finally {
      timeout?.clear();
    }
  }
}
