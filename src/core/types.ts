import type { ApiError } from '../error/apiError.js';
import type { AuthError } from '../error/authError.js';
import type { ConstructURLError } from '../error/constructUrlError.js';
import type { ValidationError } from '../error/validationError.js';
import type { HeaderOptions, HttpMethod } from '../types/request.js';
import type { ParamValue, QueryParams } from '../utils/constructUrl.js';

/**
 * Description of one API call, relative to the service root. Frozen by
 * {@link createRequestSpec}; the dispatcher never mutates it, so it can be sent again.
 */
export interface RequestSpec {
  readonly method: HttpMethod;
  /** Path template, e.g. `database/{projectId}/read`; `{name}` is filled from `params`. */
  readonly path: string;
  readonly params?: Readonly<Record<string, ParamValue>>;
  /** Query entries; keys are unique, `undefined`/`null` values are skipped. */
  readonly query?: QueryParams;
  readonly headers?: Readonly<Record<string, string>>;
  /** JSON-serializable payload */
  readonly body?: unknown;
}

/** Per-call options. */
export interface SendOptions {
  /** Transport timeout in milliseconds for this call; `false` disables it. */
  timeout?: number | false;
  /** Caller cancellation; an aborted call surfaces as `ApiError(Unreachable)`. */
  signal?: AbortSignal;
}

/** Successful (2xx) response. */
export interface RequestResult<T = unknown> {
  status: number;
  headers: Headers;
  data: T;
}

/** Every error a dispatched call can return. */
export type RequestError = AuthError | ApiError | ConstructURLError;

/** Every error a facade operation can return. */
export type OperationError = RequestError | ValidationError;

/**
 * Builds an immutable {@link RequestSpec}, copying and freezing its maps.
 */
export function createRequestSpec(spec: RequestSpec): RequestSpec {
  return Object.freeze({
    ...spec,
    ...(spec.params && { params: Object.freeze({ ...spec.params }) }),
    ...(spec.query && { query: Object.freeze({ ...spec.query }) }),
    ...(spec.headers && { headers: Object.freeze({ ...spec.headers }) }),
  });
}
