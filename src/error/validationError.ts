import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a failed @standard-schema validation, either of configuration
 * or of a response body checked against a caller-supplied schema.
 */
export class ValidationError extends Error {
  /** ValidationError error-name */
  static override name = 'ValidationError';
  /** Schema validation issues */
  issues: ReadonlyArray<StandardSchemaV1.Issue>;

  /** Creates a new ValidationError, listing the issue paths and messages in its message */
  constructor(message: string, issues: ReadonlyArray<StandardSchemaV1.Issue>, opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; ${formatIssues(issues)}` : message, opts);
    this.name = ValidationError.name;
    this.issues = issues;
  }
}

function formatIssues(issues: ReadonlyArray<StandardSchemaV1.Issue>): string {
  return issues
    .map((issue) => {
      const path = (issue.path ?? [])
        .map((segment) => String(typeof segment === 'object' ? segment.key : segment))
        .join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join(', ');
}

/**
 * Type guard for {@link ValidationError}.
 */
export function isValidationError(error: unknown): error is ValidationError {
  return isErrorType(ValidationError, error);
}

/**
 * Extract an {@link ValidationError} from an unknown error value, following nested causes.
 */
export function getValidationError(error: unknown): null | ValidationError {
  return unwrapErrorType(ValidationError, error);
}
