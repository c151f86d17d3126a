/**
 * JSON-like literal printing shared by the language profiles.
 */

export interface LiteralWords {
  readonly null: string;
  readonly true: string;
  readonly false: string;
}

/**
 * Prints a JSON value as a source literal with `", "` and `": "`
 * separators and double-quoted strings.
 *
 * @example
 * ```ts
 * formatJsonLiteral({ key: "value", on: true }, { null: "None", true: "True", false: "False" });
 * // => '{"key": "value", "on": True}'
 * ```
 */
export const formatJsonLiteral = (value: unknown, words: LiteralWords): string => {
  if (value === null || value === undefined) return words.null;
  if (typeof value === "boolean") return value ? words.true : words.false;
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : words.null;
  if (typeof value === "string") return JSON.stringify(value);
  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => formatJsonLiteral(item, words)).join(", ")}]`;
  }
  if (typeof value === "object") {
    const entries = Object.entries(value).map(
      ([key, item]) => `${JSON.stringify(key)}: ${formatJsonLiteral(item, words)}`,
    );
    return `{${entries.join(", ")}}`;
  }
  return JSON.stringify(String(value));
};

/** Double-quoted string literal valid in both target languages. */
export const quote = (value: string): string => JSON.stringify(value);
