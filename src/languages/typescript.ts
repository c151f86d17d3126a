import type { FieldKind } from "../types/enums.js";
import type { ResolvedParameter } from "../types/resolved.js";
import { toCamelCase, toPascalCase } from "../utils/naming.js";
import { formatJsonLiteral, quote } from "./literals.js";
import type { SampleValue } from "./sample-values.js";
import type { LanguageProfile } from "./types.js";

const TS_WORDS = { null: "null", true: "true", false: "false" } as const;

const NUMERIC_LITERAL = /^-?\d+(\.\d+)?$/;

const SCALAR_TYPES: Readonly<Record<Exclude<FieldKind, "array">, string>> = {
  string: "string",
  integer: "number",
  decimal: "number",
  boolean: "boolean",
  object: "Record<string, unknown>",
  uuid: "string",
};

const fieldType = (kind: FieldKind, itemKind?: FieldKind): string =>
  kind === "array" ? `${fieldType(itemKind ?? "string")}[]` : SCALAR_TYPES[kind];

/** Name of the usage-example constant holding a sample entity. */
export const sampleVariable = (entity: string): string => `sample${toPascalCase(entity)}`;

const literal = (value: SampleValue): string => {
  switch (value.kind) {
    case "text":
      return quote(value.value);
    case "integer":
      return String(value.value);
    case "decimal":
      return NUMERIC_LITERAL.test(value.value) ? value.value : `Number(${quote(value.value)})`;
    case "boolean":
      return value.value ? "true" : "false";
    case "json":
      return formatJsonLiteral(value.value, TS_WORDS);
    case "epoch-seconds":
      return "Math.floor(Date.now() / 1000)";
    case "created-entity":
      return sampleVariable(value.entity);
    case "created-field":
      return `${sampleVariable(value.entity)}.${value.field}`;
  }
};

const returnType = (returnShape: string, entity: string | undefined): string => {
  const model = entity ?? "Record<string, unknown>";
  switch (returnShape) {
    case "single_entity":
      return `${model} | undefined`;
    case "entity_list":
      return `${model}[]`;
    case "mixed_data":
      return "Record<string, unknown>[]";
    case "void":
      return "void";
    case "object":
      return "Record<string, unknown>";
    case "array":
      return "Record<string, unknown>[]";
    default:
      return "boolean";
  }
};

/**
 * TypeScript target: entity interfaces with key builders and repositories
 * over the AWS SDK v3 document client, camelCase methods.
 */
export const typescriptProfile: LanguageProfile = Object.freeze({
  id: "typescript",
  displayName: "TypeScript",
  fileExtension: ".ts",
  outputs: Object.freeze({
    entities: "entities.ts",
    repositories: "repositories.ts",
    base_repository: "base-repository.ts",
    transaction_service: "transaction-service.ts",
    usage_examples: "usage-examples.ts",
    access_pattern_mapping: "access_pattern_mapping.json",
  }),
  fieldType,
  parameterType: (param: ResolvedParameter) =>
    param.kind === "entity" ? (param.entityType ?? "unknown") : fieldType(param.kind),
  methodName: toCamelCase,
  identifier: toCamelCase,
  returnType,
  literal,
});
