import type { StandardSchemaV1 } from '@standard-schema/spec';
import { ValidationError } from '../error/validationError.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/**
 * Validates an input value against a StandardSchemaV1 schema (zod, valibot, arktype, ...)
 * and wraps the result in a tuple-style `[error, value]` response.
 *
 * - The schema may validate synchronously or return a Promise; both are handled.
 * - A throwing validator is returned as a {@link ValidationError} with the thrown value
 *   as `cause`.
 * - A result carrying `issues` is returned as a {@link ValidationError} listing them.
 * - Otherwise the (possibly transformed) output value is returned.
 */
export async function validator<T extends StandardSchemaV1>(
  input: unknown,
  schema: T,
): SafeWrapAsync<ValidationError, StandardSchemaV1.InferOutput<T>> {
  type ValidationResult = StandardSchemaV1.Result<StandardSchemaV1.InferOutput<T>>;

  const [err, pending] = safeWrap<ValidationResult | Promise<ValidationResult>>(() =>
    schema['~standard'].validate(input),
  );
  if (err) {
    return [new ValidationError('error validating on validation start', [], { cause: err }), null];
  }

  let result: ValidationResult;
  if (pending instanceof Promise) {
    const [errAsync, resolved] = await safeWrapAsync(() => pending);
    if (errAsync) {
      return [new ValidationError('error validating async data', [], { cause: errAsync }), null];
    }

    result = resolved;
  } else {
    result = pending;
  }

  if (result.issues) {
    return [new ValidationError('error validating data', result.issues), null];
  }

  return [null, result.value];
}
