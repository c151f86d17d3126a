/**
 * TypeScript expression rendering for generated code: key templates as
 * template literals, value sources and object literals.
 */

import type { SingleKeyTemplate } from "../../keys/key-template.js";
import { quote } from "../../languages/literals.js";
import type {
  ExpressionName,
  ExpressionValue,
  KeyConstruction,
  ValueSource,
} from "../../types/resolved.js";
import { toCamelCase } from "../../utils/naming.js";
import { attributeTemplate, bindingFor, constructionFor } from "../shared.js";

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

const escapeTemplateText = (text: string): string =>
  text.replace(/\\/g, "\\\\").replace(/`/g, "\\`").replace(/\$\{/g, "\\${");

/** Object key, quoted only when it is not a plain identifier. */
export const tsPropertyName = (name: string): string => (IDENTIFIER.test(name) ? name : quote(name));

/**
 * Renders a key template over field expressions.
 *
 * @example
 * ```ts
 * tsTemplate(compileSingleTemplate("USER#{user_id}", kindOf), (f) => `entity.${f}`);
 * // => "`USER#${entity.user_id}`"
 * ```
 */
export const tsTemplate = (
  template: SingleKeyTemplate,
  expressionOf: (field: string) => string,
): string => {
  const [onlyField] = template.template.fields;
  if (template.passthrough && onlyField !== undefined) return expressionOf(onlyField);
  if (template.template.isLiteral) return quote(template.template.source);

  const body = template.template.segments
    .map((segment) =>
      segment.type === "literal"
        ? escapeTemplateText(segment.value)
        : `\${${expressionOf(segment.name)}}`,
    )
    .join("");
  return `\`${body}\``;
};

/** Renders every template of a compiled key; multi-attribute keys become arrays. */
export const tsCompiledKey = (
  templates: readonly SingleKeyTemplate[],
  multi: boolean,
  expressionOf: (field: string) => string,
): string => {
  const rendered = templates.map((template) => tsTemplate(template, expressionOf));
  return multi ? `[${rendered.join(", ")}]` : (rendered[0] ?? '""');
};

export const tsKeyAttribute = (
  construction: KeyConstruction,
  position: number | undefined,
): string =>
  tsTemplate(attributeTemplate(construction, position), (field) => {
    const source = bindingFor(construction, field);
    return source.kind === "parameter"
      ? toCamelCase(source.name)
      : `${toCamelCase(source.parameter)}.${field}`;
  });

export const tsValue = (source: ValueSource, keys: readonly KeyConstruction[]): string => {
  switch (source.kind) {
    case "key":
      return tsKeyAttribute(constructionFor(keys, source.part), source.position);
    case "parameter":
      return source.prefix.length > 0
        ? `\`${escapeTemplateText(source.prefix)}\${${toCamelCase(source.name)}}\``
        : toCamelCase(source.name);
    case "entity-field":
      return `${toCamelCase(source.parameter)}.${source.field}`;
    case "literal":
      return quote(source.value);
  }
};

/** `{ k: v, ... }` on one line. */
export const tsObject = (entries: readonly (readonly [string, string])[]): string =>
  entries.length === 0
    ? "{}"
    : `{ ${entries.map(([key, value]) => `${tsPropertyName(key)}: ${value}`).join(", ")} }`;

export const tsKeyObject = (keys: readonly KeyConstruction[]): string =>
  tsObject(
    keys.flatMap((construction) =>
      construction.key.attributes.map((attribute, position) => {
        const multi = construction.key.compiled.form === "multi";
        return [attribute, tsKeyAttribute(construction, multi ? position : undefined)] as const;
      }),
    ),
  );

export const tsNamesObject = (names: readonly ExpressionName[]): string =>
  tsObject(names.map((name) => [name.alias, quote(name.attribute)] as const));

export const tsValuesObject = (
  values: readonly ExpressionValue[],
  keys: readonly KeyConstruction[],
): string => tsObject(values.map((value) => [value.placeholder, tsValue(value.source, keys)] as const));

/** Indents by `depth` levels of two spaces; blank lines stay empty. */
export const tsIndent = (lines: readonly string[], depth: number): string[] =>
  lines.map((line) => (line.length === 0 ? line : `${"  ".repeat(depth)}${line}`));

/** A doc comment, on one line when the text fits on one. */
export const tsDoc = (lines: readonly string[]): string[] => {
  const escaped = lines.map((line) => line.replace(/\*\//g, "*\\/"));
  if (escaped.length <= 1) return [`/** ${escaped[0] ?? ""} */`];
  return ["/**", ...escaped.map((line) => (line.length === 0 ? " *" : ` * ${line}`)), " */"];
};
