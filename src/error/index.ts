/**
 * Error entrypoint: exports the typed session and request errors, and helpers for
 * identifying and unwrapping them from `cause` chains.
 * @module
 */

/** Abort reason used when a merged signal aborts without one. */
/** Type guard that checks if an error is an {@link AbortError}. */
export { AbortError, isAbortError } from './abortError.js';
/** Error representing a request that did not produce a 2xx response. */
/** Extracts an {@link ApiError} from an unknown error value. */
/** Type guard that checks if an error is an {@link ApiError}. */
export { ApiError, type ApiErrorDetails, type ApiErrorKind, getApiError, isApiError } from './apiError.js';
/** Error representing a failed login, refresh or missing session. */
/** Extracts an {@link AuthError} from an unknown error value. */
/** Type guard that checks if an error is an {@link AuthError}. */
export { AuthError, type AuthErrorDetails, type AuthErrorKind, getAuthError, isAuthError } from './authError.js';
/** Error for a request path with unfilled placeholders. */
/** Extract an {@link ConstructURLError} from an unknown error value, following nested causes. */
/** Type guard for {@link ConstructURLError}. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Type guard that checks if an error is a {@link TimeoutError}. */
/** Abort reason of a call that exceeded its timeout. */
export { isTimeoutError, TimeoutError } from './timeoutError.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
/** Extracts a {@link ValidationError} from an unknown error value. */
/** Type guard that checks if an error is a {@link ValidationError}. */
/** Failed schema validation of configuration or response data. */
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
