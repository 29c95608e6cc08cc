import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a transport call exceeds its timeout.
 */
export class TimeoutError extends Error {
  /** TimeoutError error-name */
  static override name = 'TimeoutError';
  /** Timeout that elapsed, in milliseconds */
  #timeout: number;

  /** Creates a new TimeoutError carrying the elapsed timeout */
  constructor(message: string, timeout: number, opts?: ErrorOptions) {
    super(message, opts);
    this.name = TimeoutError.name;
    this.#timeout = timeout;
  }

  /** Timeout that elapsed, in milliseconds */
  get timeout(): number {
    return this.#timeout;
  }
}

/**
 * Type guard for {@link TimeoutError}, following nested causes.
 */
export function isTimeoutError(error: unknown): error is TimeoutError {
  return isErrorType(TimeoutError, error);
}
