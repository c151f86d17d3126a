/**
 * Result type for operations that can fail.
 * Expected failures travel as values; only broken internal invariants throw.
 */
export type Result<T, E = Error> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

/** Creates a successful Result. */
export const ok = <T>(data: T): Result<T, never> =>
  Object.freeze({ success: true as const, data });

/** Creates a failed Result. */
export const err = <E>(error: E): Result<never, E> =>
  Object.freeze({ success: false as const, error });

/**
 * Maps over a successful Result, passing through errors unchanged.
 *
 * @param result - The Result to map over
 * @param fn - The function to apply to the success value
 */
export const mapResult = <T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U,
): Result<U, E> => (result.success ? ok(fn(result.data)) : result);

/**
 * Collects an array of Results into a Result of an array, stopping at the
 * first failure.
 *
 * @example
 * ```ts
 * collectResults([ok(1), ok(2)]);      // => { success: true, data: [1, 2] }
 * collectResults([ok(1), err("bad")]); // => { success: false, error: "bad" }
 * ```
 */
export const collectResults = <T, E>(
  results: readonly Result<T, E>[],
): Result<readonly T[], E> => {
  const values: T[] = [];
  for (const result of results) {
    if (!result.success) return result;
    values.push(result.data);
  }
  return ok(Object.freeze(values));
};
