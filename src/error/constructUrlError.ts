import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * A request path that could not be turned into a URL, most often because a `{name}`
 * placeholder had no matching param. Nothing was sent.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  static override name = 'ConstructURLError';
  #path: string;
  #missing: ReadonlyArray<string>;

  /** Creates a new ConstructURLError for a partially filled path */
  constructor(message: string, path: string, missing: ReadonlyArray<string> = [], opts?: ErrorOptions) {
    super(message, opts);
    this.name = ConstructURLError.name;
    this.#path = path;
    this.#missing = missing;
  }

  /** The path after filling, with the unresolved placeholders still in it */
  get path(): string {
    return this.#path;
  }

  /** Names of the placeholders that had no param */
  get missing(): ReadonlyArray<string> {
    return this.#missing;
  }
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}

/**
 * Extract a {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}
