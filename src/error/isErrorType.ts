import { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error, or any error in its `cause` chain,
 * matches a specific error class.
 */
export function isErrorType<T extends Error>(errorClass: ErrorClass<T>, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
