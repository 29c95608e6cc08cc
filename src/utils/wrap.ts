/**
 * Tuple-based result used throughout the client, `[error, data]`.
 * Exactly one slot is non-null.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Normalizes anything caught into an `Error`, keeping the original value as `cause`
 * when it was not an error already.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }

  return new Error(typeof value === 'string' ? value : 'non-error value thrown', { cause: value });
}

/**
 * Runs a Promise factory and turns a rejection into the error slot.
 * @example
 * const [error, data] = await safeWrapAsync(() => response.text());
 */
export async function safeWrapAsync<DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Runs a synchronous function and turns a throw into the error slot.
 */
export function safeWrap<DataType = unknown>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [toError(error), null];
  }
}
