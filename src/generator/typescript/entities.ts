import type { SingleKeyTemplate } from "../../keys/key-template.js";
import type { LanguageProfile } from "../../languages/types.js";
import type { ResolvedEntity, ResolvedKey } from "../../types/resolved.js";
import { toCamelCase } from "../../utils/naming.js";
import { GENERATED_NOTICE, fieldOf, indexAttributes } from "../shared.js";
import { tsCompiledKey, tsDoc, tsIndent, tsPropertyName, tsTemplate } from "./syntax.js";

const templatesOf = (key: ResolvedKey): readonly SingleKeyTemplate[] =>
  key.compiled.form === "single" ? [key.compiled] : key.compiled.parts;

const isMulti = (key: ResolvedKey): boolean => key.compiled.form === "multi";

/** Name of the exported key configuration of an entity. */
export const configName = (entity: string): string => `${toCamelCase(entity)}Config`;

/** Name of the exported lookup key builders of an entity. */
export const keysName = (entity: string): string => `${toCamelCase(entity)}Keys`;

const entityBuilder = (key: ResolvedKey): string =>
  tsCompiledKey(templatesOf(key), isMulti(key), (field) => `entity.${field}`);

const lookupArguments = (
  entity: ResolvedEntity,
  key: ResolvedKey,
  profile: LanguageProfile,
): string =>
  key.fields
    .map((name) => {
      const field = fieldOf(entity, name);
      const type = field === undefined ? "string" : profile.fieldType(field.kind, field.itemKind);
      return `${toCamelCase(name)}: ${type}`;
    })
    .join(", ");

const lookupBuilder = (
  entity: ResolvedEntity,
  name: string,
  key: ResolvedKey,
  profile: LanguageProfile,
): string => {
  const returns = isMulti(key) ? "readonly KeyValue[]" : "KeyValue";
  const body = tsCompiledKey(templatesOf(key), isMulti(key), toCamelCase);
  return `${name}: (${lookupArguments(entity, key, profile)}): ${returns} => ${body},`;
};

const renderInterface = (entity: ResolvedEntity, profile: LanguageProfile): string[] => [
  ...tsDoc([`${entity.name} entity stored in table ${entity.table}`]),
  `export interface ${entity.name} {`,
  ...tsIndent(
    entity.fields.map(
      (field) =>
        `${tsPropertyName(field.name)}${field.required ? "" : "?"}: ${profile.fieldType(field.kind, field.itemKind)};`,
    ),
    1,
  ),
  "}",
];

const renderConfig = (entity: ResolvedEntity): string[] => {
  const members = [
    `entityType: ${JSON.stringify(entity.entityType)},`,
    `partitionKey: (entity) => ${entityBuilder(entity.partitionKey)},`,
  ];
  if (entity.sortKey !== undefined) {
    members.push(
      `sortKey: (entity) => ${entityBuilder(entity.sortKey)},`,
      `sortKeyPrefix: ${JSON.stringify(entity.sortKey.prefix)},`,
    );
  }
  const attributes = indexAttributes(entity);
  if (attributes.length > 0) {
    members.push(
      "indexAttributes: (entity) => ({",
      ...tsIndent(
        attributes.map(
          ({ attribute, template }) =>
            `${tsPropertyName(attribute)}: ${tsTemplate(template, (field) => `entity.${field}`)},`,
        ),
        1,
      ),
      "}),",
    );
  }
  return [
    `export const ${configName(entity.name)}: EntityConfig<${entity.name}> = {`,
    ...tsIndent(members, 1),
    "};",
  ];
};

const renderKeys = (entity: ResolvedEntity, profile: LanguageProfile): string[] => {
  const members = [lookupBuilder(entity, "partition", entity.partitionKey, profile)];
  if (entity.sortKey !== undefined) {
    members.push(lookupBuilder(entity, "sort", entity.sortKey, profile));
  }
  for (const index of entity.indexes) {
    const base = toCamelCase(index.name);
    members.push(lookupBuilder(entity, `${base}Partition`, index.partitionKey, profile));
    if (index.sortKey !== undefined) {
      members.push(lookupBuilder(entity, `${base}Sort`, index.sortKey, profile));
    }
  }
  return [
    ...tsDoc([`Lookup keys for ${entity.name}, built from key fields alone`]),
    `export const ${keysName(entity.name)} = {`,
    ...tsIndent(members, 1),
    "};",
  ];
};

/** `entities.ts`: an interface, a key configuration and lookup builders per entity. */
export const renderTypeScriptEntities = (
  entities: readonly ResolvedEntity[],
  profile: LanguageProfile,
): string => {
  const lines = [
    `// ${GENERATED_NOTICE}`,
    'import type { EntityConfig, KeyValue } from "./base-repository.js";',
  ];
  for (const entity of entities) {
    lines.push(
      "",
      `// ${entity.name} (${entity.table})`,
      "",
      ...renderInterface(entity, profile),
      "",
      ...renderConfig(entity),
      "",
      ...renderKeys(entity, profile),
    );
  }
  return `${lines.join("\n")}\n`;
};
