/**
 * Builds key attribute values from field values using compiled templates.
 */

import { type Result, ok, err, collectResults } from "../types/common.js";
import type { CompiledKeyTemplate, SingleKeyTemplate } from "./key-template.js";

export type KeyScalar = string | number;

/** A single attribute value, or an ordered tuple for multi-attribute keys. */
export type KeyValue = KeyScalar | readonly KeyScalar[];

/**
 * Builds one key attribute value.
 *
 * Literal segments and stringified field values are concatenated in template
 * order. A passthrough template returns the raw numeric field value instead.
 *
 * @param template - A compiled single-attribute template
 * @param data - Field values keyed by field name
 * @returns The key value, or an error naming the missing or non-numeric field
 *
 * @example
 * ```ts
 * const tmpl = compileSingleTemplate("TENANT#{tenant_id}#USER#{user_id}", () => "string");
 * buildKeyValue(tmpl, { tenant_id: "acme", user_id: "42" });
 * // => { success: true, data: "TENANT#acme#USER#42" }
 * ```
 */
export const buildKeyValue = (
  template: SingleKeyTemplate,
  data: Readonly<Record<string, unknown>>,
): Result<KeyScalar, Error> => {
  const parts: string[] = [];

  for (const segment of template.template.segments) {
    if (segment.type === "literal") {
      parts.push(segment.value);
      continue;
    }

    const value = data[segment.name];
    if (value === undefined || value === null) {
      return err(
        new Error(`Missing required key field "${segment.name}" in entity data`),
      );
    }
    if (template.passthrough) {
      if (typeof value !== "number") {
        return err(
          new Error(`Key field "${segment.name}" must be a number, got ${typeof value}`),
        );
      }
      return ok(value);
    }
    parts.push(String(value));
  }

  return ok(parts.join(""));
};

/**
 * Builds a key value for a compiled template of either form.
 * Multi-attribute templates yield a frozen tuple in declaration order.
 */
export const buildCompiledKey = (
  compiled: CompiledKeyTemplate,
  data: Readonly<Record<string, unknown>>,
): Result<KeyValue, Error> => {
  if (compiled.form === "single") {
    return buildKeyValue(compiled, data);
  }
  return collectResults(compiled.parts.map((part) => buildKeyValue(part, data)));
};

/**
 * Builds a complete primary key object (partition key + optional sort key).
 *
 * @param config - Key attribute names and their compiled templates
 * @param data - The entity field values
 * @returns A frozen key object, or the first build error
 */
export const buildKey = (
  config: {
    readonly partitionKey: {
      readonly name: string;
      readonly template: CompiledKeyTemplate;
    };
    readonly sortKey?:
      | {
          readonly name: string;
          readonly template: CompiledKeyTemplate;
        }
      | undefined;
  },
  data: Readonly<Record<string, unknown>>,
): Result<Readonly<Record<string, KeyValue>>, Error> => {
  const pkResult = buildCompiledKey(config.partitionKey.template, data);
  if (!pkResult.success) return pkResult;

  const key: Record<string, KeyValue> = {
    [config.partitionKey.name]: pkResult.data,
  };

  if (config.sortKey) {
    const skResult = buildCompiledKey(config.sortKey.template, data);
    if (!skResult.success) return skResult;
    key[config.sortKey.name] = skResult.data;
  }

  return ok(Object.freeze(key));
};
