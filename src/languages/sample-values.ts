/**
 * Language-neutral sample values for usage examples. Each language profile
 * turns a {@link SampleValue} into a literal of its own syntax.
 */

import type { FieldKind, ParameterKind } from "../types/enums.js";
import type { ResolvedField, ResolvedParameter } from "../types/resolved.js";
import type { UsageDataDocument, UsageSection } from "../types/schema.js";

export type SampleValue =
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "integer"; readonly value: number }
  /** Decimal digits kept as text so no precision is lost. */
  | { readonly kind: "decimal"; readonly value: string }
  | { readonly kind: "boolean"; readonly value: boolean }
  /** Any JSON value: lists, maps, or values copied from usage data. */
  | { readonly kind: "json"; readonly value: unknown }
  /** Current time in epoch seconds. */
  | { readonly kind: "epoch-seconds" }
  /** An entity created earlier in the example run. */
  | { readonly kind: "created-entity"; readonly entity: string }
  | { readonly kind: "created-field"; readonly entity: string; readonly field: string };

const text = (value: string): SampleValue => ({ kind: "text", value });
const integer = (value: number): SampleValue => ({ kind: "integer", value });
const decimal = (value: string): SampleValue => ({ kind: "decimal", value });
const json = (value: unknown): SampleValue => ({ kind: "json", value });

const NAME_HINTS: readonly (readonly [string, string])[] = [
  ["category", "electronics"],
  ["status", "active"],
  ["country", "US"],
  ["city", "Seattle"],
  ["price_range", "mid"],
];

const LOWER_BOUND_HINTS = ["start", "min", "since", "from", "lower"];
const UPPER_BOUND_HINTS = ["end", "max", "until", "to", "upper"];

const listSample = (itemKind: FieldKind | undefined, update: boolean): SampleValue => {
  if (itemKind === "integer") return json(update ? [10, 20, 30] : [1, 2, 3]);
  return json(update ? ["updated1", "updated2", "updated3"] : ["sample1", "sample2"]);
};

/**
 * Converts a usage-data value to a sample of the given kind. Decimal fields
 * keep their digits as text.
 */
export const usageValue = (value: unknown, kind: ParameterKind): SampleValue => {
  if (kind === "decimal" && (typeof value === "number" || typeof value === "string")) {
    return decimal(String(value));
  }
  if (typeof value === "string") return text(value);
  if (typeof value === "number" && Number.isInteger(value)) return integer(value);
  if (typeof value === "boolean") return { kind: "boolean", value };
  return json(value);
};

export interface UsageLookup {
  /** Value for `field` of `entity` in one usage section. */
  readonly find: (entity: string, section: UsageSection, field: string) => unknown;
}

/** Indexes a loaded usage document for field lookups. */
export const createUsageLookup = (usage: UsageDataDocument | undefined): UsageLookup => {
  const byEntity = new Map((usage?.entities ?? []).map((entry) => [entry.entity, entry]));
  return {
    find: (entity, section, field) => byEntity.get(entity)?.sections[section]?.[field],
  };
};

const EMPTY_USAGE = createUsageLookup(undefined);

/**
 * Sample for a field of a created entity. Usage data wins, then field name
 * hints, then a default for the kind.
 *
 * @param section - `sample_data` for the first example entity,
 *   `access_pattern_data` for the alternate one.
 */
export const sampleFieldValue = (
  entity: string,
  field: ResolvedField,
  usage: UsageLookup = EMPTY_USAGE,
  section: UsageSection = "sample_data",
): SampleValue => {
  const provided = usage.find(entity, section, field.name);
  if (provided !== undefined) return usageValue(provided, field.kind);

  const name = field.name.toLowerCase();
  switch (field.kind) {
    case "string": {
      const hint = NAME_HINTS.find(([fragment]) => name.includes(fragment));
      if (hint !== undefined) return text(hint[1]);
      if (name.includes("id")) return text(`${field.name}123`);
      return text(`sample_${field.name}`);
    }
    case "integer":
      return name.includes("timestamp") || name.includes("time")
        ? { kind: "epoch-seconds" }
        : integer(42);
    case "decimal":
      return decimal(name.includes("price") ? "29.99" : "3.14");
    case "boolean":
      return { kind: "boolean", value: true };
    case "array":
      return listSample(field.itemKind, false);
    case "object":
      return json({ key: "value" });
    case "uuid":
      return text("550e8400-e29b-41d4-a716-446655440000");
  }
};

/** Sample for a field written by an update example. */
export const updateFieldValue = (
  entity: string,
  field: ResolvedField,
  usage: UsageLookup = EMPTY_USAGE,
): SampleValue => {
  const provided = usage.find(entity, "update_data", field.name);
  if (provided !== undefined) return usageValue(provided, field.kind);

  const name = field.name.toLowerCase();
  switch (field.kind) {
    case "string":
    case "uuid":
      if (name.includes("username")) return text(`${field.name}_updated`);
      if (name.includes("content")) return text("This is updated content");
      return text(`updated_${field.name}`);
    case "integer":
      return name.includes("timestamp") ? { kind: "epoch-seconds" } : integer(99);
    case "decimal":
      return decimal("9.99");
    case "boolean":
      return { kind: "boolean", value: false };
    case "array":
      return listSample(field.itemKind, true);
    case "object":
      return json({ updated_key: "updated_value" });
  }
};

const boundFallback = (name: string, kind: ParameterKind): SampleValue => {
  const lower = name.toLowerCase();
  const pick = (textValue: string, whole: number, digits: string): SampleValue =>
    kind === "integer" ? integer(whole) : kind === "decimal" ? decimal(digits) : text(textValue);

  if (LOWER_BOUND_HINTS.some((hint) => lower.includes(hint))) {
    return pick("2024-01-01", 0, "0.00");
  }
  if (UPPER_BOUND_HINTS.some((hint) => lower.includes(hint))) {
    return pick("2024-12-31", 9999, "9999.99");
  }
  return pick(`${name}_value`, 100, "100.00");
};

/**
 * Argument for an access pattern call in the usage examples.
 *
 * Entity parameters refer to the created entity of their type, and a
 * parameter named after a field of the pattern's entity reads that field
 * from the created entity. Other parameters come from usage data, then from
 * range bound fallbacks (`start`, `min`, ... sort low; `end`, `max`, ...
 * sort high).
 *
 * @example
 * ```ts
 * sampleParameterValue("Order", orderFields, { name: "start_date", kind: "string", role: "range" });
 * // => { kind: "text", value: "2024-01-01" }
 * ```
 */
export const sampleParameterValue = (
  entity: string,
  fields: readonly ResolvedField[],
  param: ResolvedParameter,
  usage: UsageLookup = EMPTY_USAGE,
): SampleValue => {
  if (param.kind === "entity") {
    return { kind: "created-entity", entity: param.entityType ?? entity };
  }
  if (param.kind === "object") return json({});
  if (param.kind === "array") return json([]);

  if (fields.some((field) => field.name === param.name)) {
    return { kind: "created-field", entity, field: param.name };
  }

  const provided =
    usage.find(entity, "update_data", param.name) ??
    usage.find(entity, "sample_data", param.name);
  if (provided !== undefined) return usageValue(provided, param.kind);

  if (param.kind === "boolean") return { kind: "boolean", value: true };
  return boundFallback(param.name, param.kind);
};
