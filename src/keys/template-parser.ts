/**
 * Template parsing for key definitions.
 *
 * Parses template strings like `"TENANT#{tenant_id}#USER#{user_id}"` into a
 * list of literal segments and field references.
 */

/** A literal text segment in a parsed template. */
export interface LiteralSegment {
  readonly type: "literal";
  readonly value: string;
}

/** A field reference segment (`{fieldName}`) in a parsed template. */
export interface FieldSegment {
  readonly type: "field";
  readonly name: string;
}

export type TemplateSegment = LiteralSegment | FieldSegment;

/** A fully parsed template ready for key building. */
export interface ParsedTemplate {
  readonly source: string;
  readonly segments: readonly TemplateSegment[];
  readonly fields: readonly string[];
  /** No placeholders at all, e.g. `"PROFILE"`. */
  readonly isLiteral: boolean;
  /** Exactly one placeholder and no literal text, e.g. `"{score}"`. */
  readonly isPureFieldReference: boolean;
}

const PLACEHOLDER_REGEX = /\{(\w+)\}/g;
const PLACEHOLDER_NAME = /^\w+$/;

const literal = (value: string): LiteralSegment =>
  Object.freeze({ type: "literal" as const, value });

/**
 * Parses a key template into segments and field references.
 *
 * @param source - A template string (e.g. `"USER#{user_id}"`) or a static
 *   literal value (e.g. `"PROFILE"`).
 * @returns A frozen {@link ParsedTemplate} object.
 *
 * @example
 * ```ts
 * parseTemplate("USER#{user_id}")
 * // => { segments: [{ type: "literal", value: "USER#" }, { type: "field", name: "user_id" }],
 * //      fields: ["user_id"], isLiteral: false, isPureFieldReference: false }
 *
 * parseTemplate("{score}")
 * // => { segments: [{ type: "field", name: "score" }], fields: ["score"],
 * //      isLiteral: false, isPureFieldReference: true }
 * ```
 */
export const parseTemplate = (source: string): ParsedTemplate => {
  const segments: TemplateSegment[] = [];
  const fields: string[] = [];
  let lastIndex = 0;

  for (const match of source.matchAll(PLACEHOLDER_REGEX)) {
    const fieldName = match[1];
    const index = match.index;
    if (fieldName === undefined || index === undefined) continue;

    if (index > lastIndex) {
      segments.push(literal(source.slice(lastIndex, index)));
    }
    segments.push(Object.freeze({ type: "field" as const, name: fieldName }));
    fields.push(fieldName);
    lastIndex = index + match[0].length;
  }

  if (fields.length === 0) {
    return Object.freeze({
      source,
      segments: Object.freeze([literal(source)]),
      fields: Object.freeze([]),
      isLiteral: true,
      isPureFieldReference: false,
    });
  }

  if (lastIndex < source.length) {
    segments.push(literal(source.slice(lastIndex)));
  }

  return Object.freeze({
    source,
    segments: Object.freeze(segments),
    fields: Object.freeze(fields),
    isLiteral: false,
    isPureFieldReference: segments.length === 1,
  });
};

/**
 * Returns the static text before the first placeholder.
 *
 * @example
 * ```ts
 * templatePrefix(parseTemplate("ORDER#{order_id}")); // => "ORDER#"
 * templatePrefix(parseTemplate("{order_id}"));       // => ""
 * ```
 */
export const templatePrefix = (template: ParsedTemplate): string => {
  const first = template.segments[0];
  if (first === undefined || first.type === "field") return "";
  return first.value;
};

/**
 * Reports malformed placeholders: unclosed or unmatched braces and
 * placeholder names that are not identifiers.
 *
 * @returns One message per problem, empty when the template is well formed.
 */
export const findTemplateSyntaxErrors = (source: string): readonly string[] => {
  const problems: string[] = [];
  let position = 0;

  while (position < source.length) {
    const char = source[position];
    if (char === "}") {
      problems.push(`Unmatched '}' at position ${position}`);
      position += 1;
      continue;
    }
    if (char !== "{") {
      position += 1;
      continue;
    }

    const close = source.indexOf("}", position + 1);
    const nextOpen = source.indexOf("{", position + 1);
    if (close === -1 || (nextOpen !== -1 && nextOpen < close)) {
      problems.push(`Unclosed '{' at position ${position}`);
      position += 1;
      continue;
    }

    const name = source.slice(position + 1, close);
    if (!PLACEHOLDER_NAME.test(name)) {
      problems.push(
        name.length === 0
          ? `Empty placeholder '{}' at position ${position}`
          : `Invalid placeholder name '${name}' at position ${position}`,
      );
    }
    position = close + 1;
  }

  return Object.freeze(problems);
};
