/**
 * "Did you mean" suggestions based on Levenshtein edit distance.
 */

/** Levenshtein distance between two strings. */
export const editDistance = (a: string, b: string): number => {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min(
          (previous[j] ?? 0) + 1,
          (current[j - 1] ?? 0) + 1,
          (previous[j - 1] ?? 0) + substitution,
        ),
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
};

/**
 * Returns the candidate nearest to `value`, compared case-insensitively.
 * Ties keep the earlier candidate.
 *
 * @example
 * ```ts
 * nearest("query", ["GetItem", "Query", "Scan"]); // => "Query"
 * ```
 */
export const nearest = (
  value: string,
  candidates: readonly string[],
): string | undefined => {
  const needle = value.toLowerCase();
  let best: string | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const candidate of candidates) {
    const distance = editDistance(needle, candidate.toLowerCase());
    if (distance < bestDistance) {
      best = candidate;
      bestDistance = distance;
    }
  }
  return best;
};

/**
 * Returns the nearest candidate only when it is plausibly a typo: at most
 * two edits, or a third of the longer name.
 *
 * @example
 * ```ts
 * closeMatch("StatusIdx", ["StatusIndex", "DateIndex"]); // => "StatusIndex"
 * closeMatch("Orders", ["StatusIndex"]);                 // => undefined
 * ```
 */
export const closeMatch = (
  value: string,
  candidates: readonly string[],
): string | undefined => {
  const best = nearest(value, candidates);
  if (best === undefined) return undefined;
  const limit = Math.max(2, Math.floor(Math.max(value.length, best.length) / 3));
  return editDistance(value.toLowerCase(), best.toLowerCase()) <= limit
    ? best
    : undefined;
};
