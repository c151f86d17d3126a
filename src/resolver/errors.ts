/**
 * Thrown when the resolver meets a document that a clean validation run
 * should have ruled out. Never raised for user input mistakes: those are
 * diagnostics.
 */
export class ResolverInvariantError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`${path}: ${message}`);
    this.name = "ResolverInvariantError";
    this.path = path;
  }
}

/**
 * Narrows a raw closed-set value with its guard.
 *
 * @throws {ResolverInvariantError} when the value is outside the set
 */
export const narrow = <T extends string>(
  value: string | undefined,
  guard: (candidate: string | undefined) => candidate is T,
  path: string,
): T => {
  if (!guard(value)) {
    throw new ResolverInvariantError(path, `unexpected value '${String(value)}'`);
  }
  return value;
};
