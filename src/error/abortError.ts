import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request is cancelled by the caller through an `AbortSignal`.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  static override name = 'AbortError';

  /** Creates a new AbortError, keeping the instance name aligned with the class name */
  constructor(message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.name = AbortError.name;
  }
}

/**
 * Type guard for {@link AbortError}, following nested causes.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
