import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the transport; a `null`/`undefined` value removes a header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP methods the client issues. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** One HTTP call as handed to a transport. */
export interface TransportRequest {
  method: HttpMethod;
  /** Absolute URL */
  url: string;
  headers?: HeaderOptions;
  /** Serialized request body */
  body?: string;
  /**
   * Timeout in milliseconds; `false` disables it. Falls back to the transport default.
   */
  timeout?: number | false;
  /** Caller cancellation */
  signal?: AbortSignal;
}

/** What a transport returns for any HTTP status, 2xx or not. */
export interface TransportResponse {
  status: number;
  headers: Headers;
  /** Parsed JSON, text, or `null` for an empty body */
  body: unknown;
}

/** Minimal `fetch` shape; lets tests and runtimes hand in their own implementation. */
export type FetchFunction = (input: string, init: RequestInit) => Response | Promise<Response>;

/** Options to configure a transport provider. */
export interface TransportOptions {
  /** Headers sent with every call, merged under per-call headers. */
  headers?: HeaderOptions;
  /**
   * Default timeout in milliseconds.
   * @default 30000
   */
  timeout?: number | false;
  /**
   * Fetch implementation.
   * @default globalThis.fetch
   */
  fetch?: FetchFunction;
}

/**
 * Contract for transports used by the authenticator and dispatcher.
 * Returns the response for every HTTP status; only failing to get a response at all
 * (network error, timeout, abort) goes into the error slot.
 */
export interface TransportProviderDefinition {
  request: (request: TransportRequest) => SafeWrapAsync<Error, TransportResponse>;
  /** Updates default options for the provider. */
  config: (opts: TransportOptions) => void;
  /** Optional lifecycle hook to release resources. */
  dispose?: () => void;
}

/** Factory signature for constructing transports. */
export interface TransportProvider {
  new (opts: TransportOptions): TransportProviderDefinition;
}
