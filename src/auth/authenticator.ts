import { z } from 'zod';
import { DEFAULT_TOKEN_TTL_SECONDS, type RoblePaths } from '../config/config.js';
import { AuthError, type AuthErrorKind } from '../error/authError.js';
import type { Token, TokenStore } from '../session/tokenStore.js';
import type { TransportProviderDefinition, TransportResponse } from '../types/request.js';
import { joinUrl } from '../utils/constructUrl.js';
import { decodeJwtTimeClaims } from '../utils/jwt.js';
import { type Logger, silentLogger } from '../utils/logger.js';
import { validator } from '../utils/validator.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Email/password pair, sent as-is to the login endpoint. */
export interface PasswordCredentials {
  email: string;
  password: string;
}

/** API key, sent as `{ apiKey }` to the login endpoint. */
export interface ApiKeyCredentials {
  apiKey: string;
}

/** Credentials accepted by {@link Authenticator.login}; never stored. */
export type Credentials = PasswordCredentials | ApiKeyCredentials;

/** New user accepted by {@link Authenticator.signup}. */
export interface SignupRequest extends PasswordCredentials {
  name: string;
}

/** Settings the authenticator can take at runtime. */
export interface AuthenticatorConfig {
  /** Lifetime assumed when the service states no expiry. @default 900 */
  defaultTokenTtlSeconds?: number;
  /** Transport timeout for auth calls, in milliseconds. */
  timeout?: number | false;
  logger?: Logger;
}

/** Constructor options for {@link Authenticator}. */
export interface AuthenticatorOptions extends AuthenticatorConfig {
  transport: TransportProviderDefinition;
  store: TokenStore;
  /** Service root the auth paths are relative to */
  baseUrl: string;
  /** Auth endpoint paths, `{projectId}` already filled */
  paths: Pick<RoblePaths, 'login' | 'refresh' | 'logout' | 'signup'>;
}

const tokenResponseSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  /** Seconds from now */
  expiresIn: z.number().positive().optional(),
  /** Epoch seconds */
  expiresAt: z.number().optional(),
});

type TokenResponse = z.infer<typeof tokenResponseSchema>;

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Kind for a non-2xx auth response; 4xx maps to the caller-supplied client kind. */
function failureKind(status: number, clientKind: AuthErrorKind): AuthErrorKind {
  if (status >= 500) {
    return 'ServerError';
  }

  return status >= 400 ? clientKind : 'InvalidResponse';
}

/**
 * Obtains and refreshes tokens through the service's auth endpoints and keeps the
 * {@link TokenStore} in step with them.
 *
 * Refreshes are coalesced: while one is in flight every other caller gets the same
 * pending result, so only one refresh call reaches the service at a time. A refresh only
 * commits if the store still holds the token it started from; a logout or login in the
 * meantime makes it count as not having happened.
 */
export class Authenticator {
  #transport: TransportProviderDefinition;
  #store: TokenStore;
  #baseUrl: string;
  #paths: AuthenticatorOptions['paths'];
  #defaultTokenTtlSeconds: number;
  #timeout: number | false | undefined;
  #logger: Logger;
  #pendingRefresh: SafeWrapAsync<AuthError, Token> | undefined;

  constructor({
    transport,
    store,
    baseUrl,
    paths,
    defaultTokenTtlSeconds = DEFAULT_TOKEN_TTL_SECONDS,
    timeout,
    logger = silentLogger,
  }: AuthenticatorOptions) {
    this.#transport = transport;
    this.#store = store;
    this.#baseUrl = baseUrl;
    this.#paths = paths;
    this.#defaultTokenTtlSeconds = defaultTokenTtlSeconds;
    this.#timeout = timeout;
    this.#logger = logger;
  }

  /**
   * Updates runtime settings without touching the session.
   */
  config(opts: AuthenticatorConfig) {
    this.#defaultTokenTtlSeconds = opts.defaultTokenTtlSeconds ?? this.#defaultTokenTtlSeconds;
    this.#timeout = opts.timeout ?? this.#timeout;
    this.#logger = opts.logger ?? this.#logger;
  }

  /**
   * Exchanges credentials for a token and stores it. The store is left untouched on failure.
   */
  async login(credentials: Credentials): SafeWrapAsync<AuthError, Token> {
    const [errRequest, response] = await this.#post(this.#paths.login, credentials);
    if (errRequest) {
      this.#logger.warn('login endpoint unreachable', { error: errRequest.message });
      return [new AuthError('error reaching login endpoint', 'Unreachable', {}, { cause: errRequest }), null];
    }

    if (!isSuccess(response.status)) {
      const kind = failureKind(response.status, 'InvalidCredentials');
      this.#logger.info('login rejected', { status: response.status, kind });
      return [
        new AuthError(`error logging in, status ${response.status}`, kind, {
          status: response.status,
          body: response.body,
        }),
        null,
      ];
    }

    const [errToken, token] = await this.#toToken(response);
    if (errToken) {
      return [errToken, null];
    }

    this.#store.set(token);
    this.#logger.info('logged in', { expiresAt: token.expiresAt, refreshable: token.refreshToken !== undefined });
    return [null, token];
  }

  /**
   * Exchanges the token's refresh value for a new token and replaces the stored one.
   *
   * - No refresh value: `RefreshUnsupported`, no network call.
   * - Refresh refused (4xx): `RefreshRejected`, and the session is cleared.
   * - Another caller's refresh already replaced `token`: the newer token, no network call.
   */
  refresh(token: Token): SafeWrapAsync<AuthError, Token> {
    if (this.#pendingRefresh) {
      return this.#pendingRefresh;
    }

    const current = this.#store.get();
    if (current && current !== token && this.#store.isValid(current)) {
      return Promise.resolve([null, current]);
    }

    const pending = this.#refresh(token).finally(() => {
      this.#pendingRefresh = undefined;
    });
    this.#pendingRefresh = pending;
    return pending;
  }

  /**
   * Creates a user without logging in. 200 and 201 count as success.
   */
  async signup(request: SignupRequest): SafeWrapAsync<AuthError, unknown> {
    const [errRequest, response] = await this.#post(this.#paths.signup, request);
    if (errRequest) {
      return [new AuthError('error reaching signup endpoint', 'Unreachable', {}, { cause: errRequest }), null];
    }

    if (response.status !== 200 && response.status !== 201) {
      return [
        new AuthError(
          `error signing up, status ${response.status}`,
          failureKind(response.status, 'InvalidCredentials'),
          { status: response.status, body: response.body },
        ),
        null,
      ];
    }

    return [null, response.body];
  }

  /**
   * Tells the service the token is no longer in use. Does not touch the store.
   */
  async logout(token: Token): SafeWrapAsync<AuthError, null> {
    const [errRequest, response] = await this.#post(this.#paths.logout, undefined, token.accessToken);
    if (errRequest) {
      return [new AuthError('error reaching logout endpoint', 'Unreachable', {}, { cause: errRequest }), null];
    }

    if (!isSuccess(response.status)) {
      return [
        new AuthError(
          `error logging out, status ${response.status}`,
          failureKind(response.status, 'NotAuthenticated'),
          { status: response.status, body: response.body },
        ),
        null,
      ];
    }

    return [null, null];
  }

  async #refresh(token: Token): SafeWrapAsync<AuthError, Token> {
    if (!token.refreshToken) {
      return [new AuthError('error refreshing, session has no refresh token', 'RefreshUnsupported'), null];
    }

    this.#logger.debug('refreshing access token', { expiresAt: token.expiresAt });
    const [errRequest, response] = await this.#post(this.#paths.refresh, { refreshToken: token.refreshToken });
    if (errRequest) {
      this.#logger.warn('refresh endpoint unreachable', { error: errRequest.message });
      return [new AuthError('error reaching refresh endpoint', 'Unreachable', {}, { cause: errRequest }), null];
    }

    if (this.#store.get() !== token) {
      return this.#discard();
    }

    if (!isSuccess(response.status)) {
      const kind = failureKind(response.status, 'RefreshRejected');
      if (kind === 'RefreshRejected') {
        this.#store.clear();
      }

      this.#logger.info('refresh rejected', { status: response.status, kind });
      return [
        new AuthError(`error refreshing, status ${response.status}`, kind, {
          status: response.status,
          body: response.body,
        }),
        null,
      ];
    }

    const [errToken, refreshed] = await this.#toToken(response, token.refreshToken);
    if (errToken) {
      return [errToken, null];
    }

    if (this.#store.get() !== token) {
      return this.#discard();
    }

    this.#store.set(refreshed);
    this.#logger.debug('access token refreshed', { expiresAt: refreshed.expiresAt });
    return [null, refreshed];
  }

  #discard(): SafeWrap<AuthError, Token> {
    this.#logger.debug('session changed during refresh, discarding result');
    return [new AuthError('error refreshing, session ended during refresh', 'NotAuthenticated'), null];
  }

  /**
   * Builds a frozen token from a 2xx auth response. The refresh value falls back to the
   * previous one when the service does not rotate it.
   */
  async #toToken(response: TransportResponse, previousRefreshToken?: string): SafeWrapAsync<AuthError, Token> {
    const [errParse, parsed] = await validator(response.body, tokenResponseSchema);
    if (errParse) {
      return [
        new AuthError(
          'error reading token response',
          'InvalidResponse',
          { status: response.status, body: response.body },
          { cause: errParse },
        ),
        null,
      ];
    }

    const issuedAt = Date.now();
    const expiresAt = this.#resolveExpiry(parsed, issuedAt);
    if (expiresAt <= issuedAt) {
      return [
        new AuthError('error reading token response, token already expired', 'InvalidResponse', {
          status: response.status,
        }),
        null,
      ];
    }

    const refreshToken = parsed.refreshToken ?? previousRefreshToken;
    return [
      null,
      Object.freeze({
        accessToken: parsed.accessToken,
        ...(refreshToken !== undefined && { refreshToken }),
        issuedAt,
        expiresAt,
      }),
    ];
  }

  /**
   * Expiry from `expiresIn`, then `expiresAt`, then the JWT `exp` claim, then the default TTL.
   */
  #resolveExpiry(parsed: TokenResponse, issuedAt: number): number {
    if (parsed.expiresIn !== undefined) {
      return issuedAt + parsed.expiresIn * 1000;
    }

    if (parsed.expiresAt !== undefined) {
      return parsed.expiresAt * 1000;
    }

    const claims = decodeJwtTimeClaims(parsed.accessToken);
    if (claims?.exp !== undefined) {
      return claims.exp * 1000;
    }

    return issuedAt + this.#defaultTokenTtlSeconds * 1000;
  }

  #post(path: string, payload: unknown, accessToken?: string) {
    return this.#transport.request({
      method: 'POST',
      url: joinUrl(this.#baseUrl, path),
      headers: {
        Accept: 'application/json',
        ...(payload !== undefined && { 'Content-Type': 'application/json' }),
        ...(accessToken !== undefined && { Authorization: `Bearer ${accessToken}` }),
      },
      ...(payload !== undefined && { body: JSON.stringify(payload) }),
      timeout: this.#timeout,
    });
  }
}
