import type { FieldKind } from "../types/enums.js";
import type { ResolvedParameter } from "../types/resolved.js";
import { formatJsonLiteral, quote } from "./literals.js";
import type { SampleValue } from "./sample-values.js";
import type { LanguageProfile } from "./types.js";

const PY_WORDS = { null: "None", true: "True", false: "False" } as const;

const SCALAR_TYPES: Readonly<Record<Exclude<FieldKind, "array">, string>> = {
  string: "str",
  integer: "int",
  decimal: "Decimal",
  boolean: "bool",
  object: "dict[str, Any]",
  uuid: "str",
};

const fieldType = (kind: FieldKind, itemKind?: FieldKind): string =>
  kind === "array" ? `list[${fieldType(itemKind ?? "string")}]` : SCALAR_TYPES[kind];

const literal = (value: SampleValue): string => {
  switch (value.kind) {
    case "text":
      return quote(value.value);
    case "integer":
      return String(value.value);
    case "decimal":
      return `Decimal(${quote(value.value)})`;
    case "boolean":
      return value.value ? "True" : "False";
    case "json":
      return formatJsonLiteral(value.value, PY_WORDS);
    case "epoch-seconds":
      return "int(time.time())";
    case "created-entity":
      return `created_entities[${quote(value.entity)}]`;
    case "created-field":
      return `created_entities[${quote(value.entity)}].${value.field}`;
  }
};

const returnType = (returnShape: string, entity: string | undefined): string => {
  const model = entity ?? "dict[str, Any]";
  switch (returnShape) {
    case "single_entity":
      return `${model} | None`;
    case "entity_list":
      return `list[${model}]`;
    case "mixed_data":
      return "list[dict[str, Any]]";
    case "void":
      return "None";
    case "object":
      return "dict[str, Any]";
    case "array":
      return "list[dict[str, Any]]";
    default:
      return "bool";
  }
};

/**
 * Python target: pydantic entities and boto3 repositories, snake_case
 * methods.
 */
export const pythonProfile: LanguageProfile = Object.freeze({
  id: "python",
  displayName: "Python",
  fileExtension: ".py",
  outputs: Object.freeze({
    entities: "entities.py",
    repositories: "repositories.py",
    base_repository: "base_repository.py",
    transaction_service: "transaction_service.py",
    usage_examples: "usage_examples.py",
    access_pattern_mapping: "access_pattern_mapping.json",
  }),
  fieldType,
  parameterType: (param: ResolvedParameter) =>
    param.kind === "entity" ? (param.entityType ?? "Any") : fieldType(param.kind),
  methodName: (snakeName: string) => snakeName,
  identifier: (name: string) => name,
  returnType,
  literal,
});
