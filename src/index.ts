/**
 * Root entrypoint for the Roble client: re-exports the client facade, session
 * components, configuration, types and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

/** Logs in, refreshes and logs out against the auth endpoints. */
export {
  type ApiKeyCredentials,
  Authenticator,
  type AuthenticatorConfig,
  type AuthenticatorOptions,
  type Credentials,
  type PasswordCredentials,
  type SignupRequest,
} from './auth/authenticator.js';
/** Defaults, endpoint paths and environment loading. */
export {
  DEFAULT_MAX_RETRIES,
  DEFAULT_PATHS,
  DEFAULT_TOKEN_SKEW_SECONDS,
  DEFAULT_TOKEN_TTL_SECONDS,
  loadConfig,
  type MaxRetries,
  type RobleConfig,
  type RoblePaths,
  resolvePaths,
} from './config/config.js';
export * from './core/index.js';
export * from './error/index.js';
/** Default transport over `fetch`. */
export { DEFAULT_TIMEOUT, FetchTransport } from './fetch/client.js';
/** In-memory holder of the session token. */
export { DEFAULT_SKEW_MS, type Token, TokenStore } from './session/tokenStore.js';
/** Transport contract and request types. */
export type {
  FetchFunction,
  HeaderOptions,
  HttpMethod,
  TransportOptions,
  TransportProvider,
  TransportProviderDefinition,
  TransportRequest,
  TransportResponse,
} from './types/request.js';
export type { ParamValue, QueryParams } from './utils/constructUrl.js';
/** Logging hook. */
export { type LogContext, type Logger, silentLogger } from './utils/logger.js';
/** Tuple-style results returned by every operation. */
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
