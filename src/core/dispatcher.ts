import type { Authenticator } from '../auth/authenticator.js';
import { DEFAULT_MAX_RETRIES, type MaxRetries } from '../config/config.js';
import { ApiError } from '../error/apiError.js';
import { AuthError } from '../error/authError.js';
import type { Token, TokenStore } from '../session/tokenStore.js';
import type { TransportProviderDefinition, TransportResponse } from '../types/request.js';
import { constructUrl } from '../utils/constructUrl.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';
import type { RequestError, RequestResult, RequestSpec, SendOptions } from './types.js';

/**
 * Whether the single refresh-and-resend of a call is still available (`fresh`) or has
 * been used, either by a refresh of an expired token or by a resend after 401/403.
 */
type RetryState = 'fresh' | 'retried';

/** Settings the dispatcher can take at runtime. */
export interface DispatcherConfig {
  /** Refresh-and-resend cycles after a 401/403; 0 disables the resend. @default 1 */
  maxRetries?: MaxRetries;
  /** Default transport timeout in milliseconds. */
  timeout?: number | false;
  logger?: Logger;
}

/** Constructor options for {@link RequestDispatcher}. */
export interface RequestDispatcherOptions extends DispatcherConfig {
  transport: TransportProviderDefinition;
  store: TokenStore;
  authenticator: Authenticator;
  /** Service root that request paths are relative to */
  baseUrl: string;
}

const AUTH_FAILURE_STATUSES = new Set([401, 403]);

/**
 * Sends API calls on behalf of the current session.
 *
 * - Never logs in; without a session every call fails with `AuthError(NotAuthenticated)`.
 * - Refreshes an expired token once before sending.
 * - On 401/403 refreshes once and resends once, unless a refresh already happened in
 *   this call. A call therefore makes at most two resource requests.
 * - 5xx and transport failures are returned, never retried.
 */
export class RequestDispatcher {
  #transport: TransportProviderDefinition;
  #store: TokenStore;
  #authenticator: Authenticator;
  #baseUrl: string;
  #maxRetries: MaxRetries;
  #timeout: number | false | undefined;
  #logger: Logger;

  constructor({
    transport,
    store,
    authenticator,
    baseUrl,
    maxRetries = DEFAULT_MAX_RETRIES,
    timeout,
    logger = silentLogger,
  }: RequestDispatcherOptions) {
    this.#transport = transport;
    this.#store = store;
    this.#authenticator = authenticator;
    this.#baseUrl = baseUrl;
    this.#maxRetries = maxRetries;
    this.#timeout = timeout;
    this.#logger = logger;
  }

  /**
   * Updates runtime settings.
   */
  config(opts: DispatcherConfig) {
    this.#maxRetries = opts.maxRetries ?? this.#maxRetries;
    this.#timeout = opts.timeout ?? this.#timeout;
    this.#logger = opts.logger ?? this.#logger;
  }

  /**
   * Sends a request with the session's token attached.
   *
   * @typeParam T - Expected shape of the response body; not checked at runtime.
   * @returns `[error, result]`, where a 2xx response becomes the result and everything
   *   else one of {@link RequestError}.
   */
  async send<T = unknown>(spec: RequestSpec, opts: SendOptions = {}): SafeWrapAsync<RequestError, RequestResult<T>> {
    const [errUrl, url] = constructUrl(this.#baseUrl, spec.path, spec.params, spec.query);
    if (errUrl) {
      return [errUrl, null];
    }

    const current = this.#store.get();
    if (!current) {
      return [new AuthError('error sending request, not authenticated', 'NotAuthenticated'), null];
    }

    if (this.#store.isValid(current)) {
      return this.#dispatch<T>(spec, url, current, this.#maxRetries > 0 ? 'fresh' : 'retried', opts);
    }

    this.#logger.debug('access token expired, refreshing before request', { path: spec.path });
    const [errRefresh, refreshed] = await this.#authenticator.refresh(current);
    if (errRefresh) {
      return [errRefresh, null];
    }

    return this.#dispatch<T>(spec, url, refreshed, 'retried', opts);
  }

  /**
   * One resource request; recurses at most once, from `fresh` to `retried`.
   */
  async #dispatch<T>(
    spec: RequestSpec,
    url: string,
    token: Token,
    state: RetryState,
    opts: SendOptions,
  ): SafeWrapAsync<RequestError, RequestResult<T>> {
    const [errTransport, response] = await this.#transport.request({
      method: spec.method,
      url,
      headers: {
        Accept: 'application/json',
        ...(spec.body !== undefined && { 'Content-Type': 'application/json' }),
        ...spec.headers,
        Authorization: `Bearer ${token.accessToken}`,
      },
      ...(spec.body !== undefined && { body: JSON.stringify(spec.body) }),
      timeout: opts.timeout ?? this.#timeout,
      ...(opts.signal && { signal: opts.signal }),
    });
    if (errTransport) {
      return [
        new ApiError(`error in ${spec.method} ${spec.path}, service unreachable`, 'Unreachable', {}, { cause: errTransport }),
        null,
      ];
    }

    if (AUTH_FAILURE_STATUSES.has(response.status) && state === 'fresh') {
      this.#logger.debug('request unauthorized, refreshing and resending once', {
        path: spec.path,
        status: response.status,
      });
      const [errRefresh, refreshed] = await this.#authenticator.refresh(token);
      if (errRefresh) {
        return [errRefresh, null];
      }

      return this.#dispatch<T>(spec, url, refreshed, 'retried', opts);
    }

    return toResult<T>(spec, response);
  }
}

/**
 * Maps a final response: 2xx → result, 5xx → `ServerError`, anything else → `ClientError`.
 */
function toResult<T>(spec: RequestSpec, response: TransportResponse): SafeWrap<ApiError, RequestResult<T>> {
  const { status, headers, body } = response;
  if (status >= 200 && status < 300) {
    return [null, { status, headers, data: body as T }];
  }

  const kind = status >= 500 ? 'ServerError' : 'ClientError';
  return [new ApiError(`error in ${spec.method} ${spec.path}, status ${status}`, kind, { status, body }), null];
}
