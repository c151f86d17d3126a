/**
 * Python expression rendering: key templates as f-strings, value sources,
 * dict literals.
 */

import type { SingleKeyTemplate } from "../../keys/key-template.js";
import { quote } from "../../languages/literals.js";
import type {
  ExpressionName,
  ExpressionValue,
  KeyConstruction,
  ValueSource,
} from "../../types/resolved.js";
import { attributeTemplate, bindingFor, constructionFor } from "../shared.js";

const escapeQuoted = (text: string): string => text.replace(/\\/g, "\\\\").replace(/'/g, "\\'");

const escapeFString = (text: string): string =>
  escapeQuoted(text).replace(/\{/g, "{{").replace(/\}/g, "}}");

/**
 * Renders a key template over field expressions.
 *
 * @example
 * ```ts
 * pyTemplate(compileSingleTemplate("USER#{user_id}", kindOf), (f) => `entity.${f}`);
 * // => "f'USER#{entity.user_id}'"
 * ```
 */
export const pyTemplate = (
  template: SingleKeyTemplate,
  expressionOf: (field: string) => string,
): string => {
  const [onlyField] = template.template.fields;
  if (template.passthrough && onlyField !== undefined) return expressionOf(onlyField);
  if (template.template.isLiteral) return `'${escapeQuoted(template.template.source)}'`;

  const body = template.template.segments
    .map((segment) =>
      segment.type === "literal" ? escapeFString(segment.value) : `{${expressionOf(segment.name)}}`,
    )
    .join("");
  return `f'${body}'`;
};

/** A tuple literal, with the trailing comma a one-element tuple needs. */
export const pyTuple = (items: readonly string[]): string =>
  items.length === 1 ? `(${items.join("")},)` : `(${items.join(", ")})`;

/** Renders every template of a compiled key; multi-attribute keys become tuples. */
export const pyCompiledKey = (
  templates: readonly SingleKeyTemplate[],
  multi: boolean,
  expressionOf: (field: string) => string,
): string => {
  const rendered = templates.map((template) => pyTemplate(template, expressionOf));
  return multi ? pyTuple(rendered) : (rendered[0] ?? "''");
};

/** Python expression for the value of one key attribute of a construction. */
export const pyKeyAttribute = (
  construction: KeyConstruction,
  position: number | undefined,
): string =>
  pyTemplate(attributeTemplate(construction, position), (field) => {
    const source = bindingFor(construction, field);
    return source.kind === "parameter" ? source.name : `${source.parameter}.${field}`;
  });

export const pyValue = (source: ValueSource, keys: readonly KeyConstruction[]): string => {
  switch (source.kind) {
    case "key":
      return pyKeyAttribute(constructionFor(keys, source.part), source.position);
    case "parameter":
      return source.prefix.length > 0
        ? `f'${escapeFString(source.prefix)}{${source.name}}'`
        : source.name;
    case "entity-field":
      return `${source.parameter}.${source.field}`;
    case "literal":
      return `'${escapeQuoted(source.value)}'`;
  }
};

/** `{"k": v, ...}` on one line. */
export const pyDict = (entries: readonly (readonly [string, string])[]): string =>
  `{${entries.map(([key, value]) => `${quote(key)}: ${value}`).join(", ")}}`;

/** The `Key=` dict of a complete primary key. */
export const pyKeyDict = (keys: readonly KeyConstruction[]): string =>
  pyDict(
    keys.flatMap((construction) =>
      construction.key.attributes.map((attribute, position) => {
        const multi = construction.key.compiled.form === "multi";
        return [attribute, pyKeyAttribute(construction, multi ? position : undefined)] as const;
      }),
    ),
  );

export const pyNamesDict = (names: readonly ExpressionName[]): string =>
  pyDict(names.map((name) => [name.alias, quote(name.attribute)] as const));

export const pyValuesDict = (
  values: readonly ExpressionValue[],
  keys: readonly KeyConstruction[],
): string => pyDict(values.map((value) => [value.placeholder, pyValue(value.source, keys)] as const));

/** Indents each line by `depth` levels of four spaces; blank lines stay empty. */
export const pyIndent = (lines: readonly string[], depth: number): string[] =>
  lines.map((line) => (line.length === 0 ? line : `${"    ".repeat(depth)}${line}`));

/** A docstring, one line when the text fits on one. */
export const pyDocstring = (lines: readonly string[]): string[] => {
  const escaped = lines.map((line) => line.replace(/\\/g, "\\\\").replace(/"/g, '\\"'));
  if (escaped.length <= 1) return [`"""${escaped[0] ?? ""}"""`];
  return [`"""${escaped[0] ?? ""}`, ...escaped.slice(1), `"""`];
};
