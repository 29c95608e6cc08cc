/**
 * Core entrypoint: exports the client facade, the dispatcher and request types.
 * Import from here if you only need the client/types without error helpers.
 * @module
 */

/** Constructor and runtime options accepted by {@link RobleClient}. */
export type {
  DatabaseRecord,
  ReadOptions,
  RecordOptions,
  RobleClientConfig,
  RobleClientProps,
} from './client.js';

/**
 * Client for a Roble project that:
 * - owns one session per instance,
 * - logs in and keeps the token fresh,
 * - exposes the database endpoints as `create`, `read`, `update` and `delete`.
 */
export { RobleClient } from './client.js';

/** Sends requests with the session's token, refreshing and resending once on 401/403. */
export { type DispatcherConfig, RequestDispatcher, type RequestDispatcherOptions } from './dispatcher.js';

/** Request description, per-call options and result types. */
export {
  type OperationError,
  createRequestSpec,
  type RequestError,
  type RequestResult,
  type RequestSpec,
  type SendOptions,
} from './types.js';
