import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Reasons a dispatched request can fail once a token was attached.
 *
 * - `ClientError`: the service answered with a 4xx (including a 401/403 that survived the
 *   single refresh-and-resend).
 * - `ServerError`: the service answered with a 5xx.
 * - `Unreachable`: the transport failed (network error, timeout or caller abort).
 */
export type ApiErrorKind = 'ClientError' | 'ServerError' | 'Unreachable';

/** Status and body of the response that caused an {@link ApiError} */
export interface ApiErrorDetails {
  status?: number;
  body?: unknown;
}

/**
 * Error representing a request that reached (or tried to reach) the service and did not
 * produce a 2xx response. 5xx and unreachable errors are never retried automatically.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static override name = 'ApiError';
  #kind: ApiErrorKind;
  #status: number | undefined;
  #body: unknown;

  /** Creates a new ApiError of the given kind */
  constructor(message: string, kind: ApiErrorKind, details: ApiErrorDetails = {}, opts?: ErrorOptions) {
    super(message, opts);
    this.name = ApiError.name;
    this.#kind = kind;
    this.#status = details.status;
    this.#body = details.body;
  }

  /** Classification of the failure */
  get kind(): ApiErrorKind {
    return this.#kind;
  }

  /** HTTP status of the response; undefined for `Unreachable` */
  get status(): number | undefined {
    return this.#status;
  }

  /** Parsed response body; undefined for `Unreachable` */
  get body(): unknown {
    return this.#body;
  }
}

/**
 * Type guard for {@link ApiError}, optionally narrowed to a specific kind.
 */
export function isApiError(error: unknown, kind?: ApiErrorKind): error is ApiError {
  const found = unwrapErrorType(ApiError, error);
  return found !== null && (kind === undefined || found.kind === kind);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | ApiError {
  return unwrapErrorType(ApiError, error);
}
