/**
 * Compiles key template definitions into key-builder descriptors.
 *
 * A definition is either one template string or, for multi-attribute index
 * keys, an array of 1-4 template strings that each map to an independent
 * attribute.
 */

import type { FieldDefinition, KeyTemplateDefinition } from "../types/schema.js";
import { isNumericKind } from "../types/enums.js";
import { type ParsedTemplate, parseTemplate } from "./template-parser.js";

/** Maximum number of attributes in a multi-attribute index key. */
export const MAX_KEY_ATTRIBUTES = 4;

export interface SingleKeyTemplate {
  readonly form: "single";
  readonly template: ParsedTemplate;
  /**
   * The template is a pure reference to a numeric field, so the built key is
   * the raw number and the store orders it numerically.
   */
  readonly passthrough: boolean;
}

export interface MultiKeyTemplate {
  readonly form: "multi";
  readonly parts: readonly SingleKeyTemplate[];
}

export type CompiledKeyTemplate = SingleKeyTemplate | MultiKeyTemplate;

/** Looks up the declared kind of an entity field. */
export type FieldKindLookup = (fieldName: string) => string | undefined;

/** Builds a {@link FieldKindLookup} over an entity's field list. */
export const fieldKindLookup = (
  fields: readonly FieldDefinition[],
): FieldKindLookup => {
  const kinds = new Map(fields.map((field) => [field.name, field.kind]));
  return (fieldName) => kinds.get(fieldName);
};

/**
 * Compiles one template string.
 *
 * @example
 * ```ts
 * const kindOf = fieldKindLookup([{ name: "score", kind: "integer", required: true }]);
 * compileSingleTemplate("{score}", kindOf).passthrough;       // => true
 * compileSingleTemplate("SCORE#{score}", kindOf).passthrough; // => false
 * ```
 */
export const compileSingleTemplate = (
  source: string,
  kindOf: FieldKindLookup,
): SingleKeyTemplate => {
  const template = parseTemplate(source);
  const [onlyField] = template.fields;
  const passthrough =
    template.isPureFieldReference &&
    onlyField !== undefined &&
    isNumericKind(kindOf(onlyField) ?? "");

  return Object.freeze({ form: "single" as const, template, passthrough });
};

/**
 * Compiles a key template definition. The array form always compiles to a
 * multi-attribute template, even with a single element, because the target
 * index declares its key as an attribute list.
 */
export const compileKeyTemplate = (
  definition: KeyTemplateDefinition,
  kindOf: FieldKindLookup,
): CompiledKeyTemplate => {
  if (typeof definition === "string") {
    return compileSingleTemplate(definition, kindOf);
  }
  return Object.freeze({
    form: "multi" as const,
    parts: Object.freeze(
      definition.map((source) => compileSingleTemplate(source, kindOf)),
    ),
  });
};

/** Field names a compiled template consumes, in order of first use. */
export const compiledKeyFields = (
  compiled: CompiledKeyTemplate,
): readonly string[] => {
  const templates =
    compiled.form === "single" ? [compiled] : compiled.parts;
  const seen = new Set<string>();
  for (const part of templates) {
    for (const field of part.template.fields) seen.add(field);
  }
  return Object.freeze([...seen]);
};

/** Number of store attributes a compiled key occupies. */
export const keyAttributeCount = (compiled: CompiledKeyTemplate): number =>
  compiled.form === "single" ? 1 : compiled.parts.length;
