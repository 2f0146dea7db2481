/**
 * @module result
 * @description Success-or-failure values for queue operations whose failure
 * is an expected outcome (a timed pop that runs out of time) rather than a
 * programming error.
 *
 * @example
 * ```typescript
 * const result = await queue.popWithTimeout(100);
 * if (result.success) {
 *   handle(result.data);
 * } else {
 *   log.warn(result.error.message);
 * }
 * ```
 */

/**
 * Either a successful operation with data or a failure with an error.
 *
 * @template T - The type of the success value
 * @template E - The type of the error value
 */
export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export const Result = {
  /**
   * Creates a successful Result containing the given data.
   */
  ok: <T, E = never>(data: T): Result<T, E> => ({ success: true, data }),

  /**
   * Creates a failed Result containing the given error.
   */
  err: <T = never, E = Error>(error: E): Result<T, E> => ({
    success: false,
    error,
  }),
} as const;
