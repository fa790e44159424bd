/**
 * Result type for explicit error handling.
 *
 * Used where a failure is an expected outcome the caller decides about,
 * such as a literal that runs off the end of the input.
 *
 * @example
 * ```typescript
 * const result = readInput(path);
 * if (isOk(result)) {
 *   extract(result.value);
 * } else {
 *   logger.warning(result.error.message);
 * }
 * ```
 */

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Creates a successful Result containing a value
 */
export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Type guard to check if a Result is Ok
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/**
 * Type guard to check if a Result is Err
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/**
 * Unwraps a Result, throwing if it's an error
 * @throws {E} The error if Result is Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

/**
 * Unwraps a Result or returns a default value if it's an error
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  if (isOk(result)) {
    return result.value;
  }
  return defaultValue;
}
