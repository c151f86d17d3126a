import type { SingleKeyTemplate } from "../../keys/key-template.js";
import type { LanguageProfile } from "../../languages/types.js";
import type { ResolvedEntity, ResolvedKey } from "../../types/resolved.js";
import { toConstantCase, toSnakeCase } from "../../utils/naming.js";
import { GENERATED_NOTICE, fieldOf, indexAttributes } from "../shared.js";
import { pyCompiledKey, pyDocstring, pyIndent, pyTemplate } from "./syntax.js";

const templatesOf = (key: ResolvedKey): readonly SingleKeyTemplate[] =>
  key.compiled.form === "single" ? [key.compiled] : key.compiled.parts;

const entityBuilder = (key: ResolvedKey, receiver: string): string =>
  pyCompiledKey(templatesOf(key), key.compiled.form === "multi", (field) => `${receiver}.${field}`);

const lookupBuilder = (key: ResolvedKey): string =>
  pyCompiledKey(templatesOf(key), key.compiled.form === "multi", (field) => field);

const typedArguments = (
  entity: ResolvedEntity,
  key: ResolvedKey,
  profile: LanguageProfile,
): string =>
  key.fields
    .map((name) => {
      const field = fieldOf(entity, name);
      return field === undefined ? name : `${name}: ${profile.fieldType(field.kind, field.itemKind)}`;
    })
    .join(", ");

const lambdaHead = (args: readonly string[]): string =>
  args.length > 0 ? `lambda ${args.join(", ")}` : "lambda";

const configConstant = (entity: ResolvedEntity): string =>
  `${toConstantCase(entity.name)}_CONFIG`;

const renderConfig = (entity: ResolvedEntity): string[] => {
  const lines = [
    `${configConstant(entity)} = EntityConfig(`,
    `    entity_type=${JSON.stringify(entity.entityType)},`,
    `    pk_builder=lambda entity: ${entityBuilder(entity.partitionKey, "entity")},`,
    `    pk_lookup_builder=${lambdaHead(entity.partitionKey.fields)}: ${lookupBuilder(entity.partitionKey)},`,
  ];
  const { sortKey } = entity;
  if (sortKey !== undefined) {
    lines.push(
      `    sk_builder=lambda entity: ${entityBuilder(sortKey, "entity")},`,
      `    sk_lookup_builder=${lambdaHead(sortKey.fields)}: ${lookupBuilder(sortKey)},`,
      `    prefix_builder=lambda **kwargs: ${JSON.stringify(sortKey.prefix)},`,
    );
  }
  const attributes = indexAttributes(entity);
  if (attributes.length > 0) {
    const entries = attributes.map(
      ({ attribute, template }) =>
        `${JSON.stringify(attribute)}: ${pyTemplate(template, (field) => `entity.${field}`)}`,
    );
    lines.push(`    index_attributes=lambda entity: {${entries.join(", ")}},`);
  }
  lines.push(")");
  return lines;
};

const renderIndexBuilders = (entity: ResolvedEntity, profile: LanguageProfile): string[] =>
  entity.indexes.flatMap((index) => {
    const suffix = toSnakeCase(index.name);
    const keys: (readonly ["pk" | "sk", ResolvedKey])[] = [["pk", index.partitionKey]];
    if (index.sortKey !== undefined) keys.push(["sk", index.sortKey]);

    return keys.flatMap(([part, key]) => [
      "",
      "@classmethod",
      `def build_gsi_${part}_for_lookup_${suffix}(cls${key.fields.length > 0 ? ", " : ""}${typedArguments(entity, key, profile)}) -> KeyType:`,
      `    return ${lookupBuilder(key)}`,
      "",
      `def build_gsi_${part}_${suffix}(self) -> KeyType:`,
      `    return ${entityBuilder(key, "self")}`,
    ]);
  });

const renderClass = (entity: ResolvedEntity, profile: LanguageProfile): string[] => {
  const fields = entity.fields.map((field) => {
    const type = profile.fieldType(field.kind, field.itemKind);
    return field.required ? `${field.name}: ${type}` : `${field.name}: ${type} | None = None`;
  });

  return [
    `class ${entity.name}(ConfigurableEntity):`,
    ...pyIndent(pyDocstring([`${entity.name} entity stored in table ${entity.table}`]), 1),
    "",
    ...pyIndent(fields, 1),
    "",
    ...pyIndent(
      [
        "@classmethod",
        "def get_config(cls) -> EntityConfig:",
        `    return ${configConstant(entity)}`,
        ...renderIndexBuilders(entity, profile),
      ],
      1,
    ),
  ];
};

/** `entities.py`: one key configuration and one pydantic model per entity. */
export const renderPythonEntities = (
  entities: readonly ResolvedEntity[],
  profile: LanguageProfile,
): string => {
  const lines = [
    `# ${GENERATED_NOTICE}`,
    "from __future__ import annotations",
    "",
    "from decimal import Decimal",
    "from typing import Any",
    "",
    "from base_repository import ConfigurableEntity, EntityConfig, KeyType",
  ];
  for (const entity of entities) {
    lines.push(
      "",
      "",
      `# ${entity.name} (${entity.table})`,
      ...renderConfig(entity),
      "",
      "",
      ...renderClass(entity, profile),
    );
  }
  return `${lines.join("\n")}\n`;
};
