import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Reasons an authentication step can fail.
 *
 * - `NotAuthenticated`: no session, or the session ended while a refresh was in flight.
 * - `InvalidCredentials`: the login (or signup) endpoint answered with a 4xx.
 * - `RefreshRejected`: the refresh token was refused; log in again with credentials.
 * - `RefreshUnsupported`: the session has no refresh token to refresh with.
 * - `Unreachable`: the auth endpoint could not be reached (network, timeout).
 * - `ServerError`: the auth endpoint answered with a 5xx.
 * - `InvalidResponse`: a 2xx answer without a usable access token or expiry.
 */
export type AuthErrorKind =
  | 'NotAuthenticated'
  | 'InvalidCredentials'
  | 'RefreshRejected'
  | 'RefreshUnsupported'
  | 'Unreachable'
  | 'ServerError'
  | 'InvalidResponse';

/** Extra details an {@link AuthError} may carry */
export interface AuthErrorDetails {
  /** HTTP status returned by the auth endpoint, when there was one */
  status?: number;
  /** Parsed response body returned by the auth endpoint, when there was one */
  body?: unknown;
}

/**
 * Error returned by every session operation that failed to produce a usable token.
 */
export class AuthError extends Error {
  /** AuthError error-name */
  static override name = 'AuthError';
  #kind: AuthErrorKind;
  #status: number | undefined;
  #body: unknown;

  /** Creates a new AuthError of the given kind */
  constructor(message: string, kind: AuthErrorKind, details: AuthErrorDetails = {}, opts?: ErrorOptions) {
    super(message, opts);
    this.name = AuthError.name;
    this.#kind = kind;
    this.#status = details.status;
    this.#body = details.body;
  }

  /** Reason the authentication step failed */
  get kind(): AuthErrorKind {
    return this.#kind;
  }

  /** HTTP status of the auth endpoint response, if any */
  get status(): number | undefined {
    return this.#status;
  }

  /** Parsed body of the auth endpoint response, if any */
  get body(): unknown {
    return this.#body;
  }
}

/**
 * Type guard for {@link AuthError}, optionally narrowed to a specific kind.
 */
export function isAuthError(error: unknown, kind?: AuthErrorKind): error is AuthError {
  const found = unwrapErrorType(AuthError, error);
  return found !== null && (kind === undefined || found.kind === kind);
}

/**
 * Extract an {@link AuthError} from an unknown error value, following nested causes.
 */
export function getAuthError(error: unknown): null | AuthError {
  return unwrapErrorType(AuthError, error);
}
