/**
 * Which entity fields feed which keys.
 */

import type {
  EntityDefinition,
  IndexDefinition,
  IndexKeyMapping,
  KeyTemplateDefinition,
  TableDefinition,
} from "../types/schema.js";
import { keyAttributeNames } from "../types/schema.js";
import { parseTemplate } from "../keys/template-parser.js";

/** Field names referenced by a template definition, in order of first use. */
export const templateFieldNames = (
  definition: KeyTemplateDefinition | undefined,
): readonly string[] => {
  if (definition === undefined) return [];
  const sources = typeof definition === "string" ? [definition] : definition;
  const names = new Set<string>();
  for (const source of sources) {
    for (const field of parseTemplate(source).fields) names.add(field);
  }
  return [...names];
};

export const findMapping = (
  entity: EntityDefinition,
  indexName: string,
): IndexKeyMapping | undefined =>
  entity.indexMappings.find((mapping) => mapping.indexName === indexName);

export const findIndex = (
  table: TableDefinition,
  indexName: string,
): IndexDefinition | undefined =>
  table.indexes.find((index) => index.name === indexName);

/** Fields used by the entity's primary key templates. */
export const primaryKeyFields = (entity: EntityDefinition): ReadonlySet<string> =>
  new Set([
    ...templateFieldNames(entity.pkTemplate),
    ...templateFieldNames(entity.skTemplate),
  ]);

/** Fields used by the entity's key templates for one index. */
export const indexKeyFields = (
  entity: EntityDefinition,
  indexName: string,
): ReadonlySet<string> => {
  const mapping = findMapping(entity, indexName);
  if (mapping === undefined) return new Set();
  return new Set([
    ...templateFieldNames(mapping.pkTemplate),
    ...templateFieldNames(mapping.skTemplate),
  ]);
};

/**
 * Fields that act as key attributes for a read: the primary key fields, plus
 * the index key fields when the read targets an index.
 */
export const readKeyFields = (
  entity: EntityDefinition,
  indexName: string | undefined,
): ReadonlySet<string> => {
  const fields = new Set(primaryKeyFields(entity));
  if (indexName !== undefined) {
    for (const field of indexKeyFields(entity, indexName)) fields.add(field);
  }
  return fields;
};

/** Store attribute names that make up the table and index keys. */
export const keyAttributesOf = (
  table: TableDefinition,
  index: IndexDefinition,
): ReadonlySet<string> =>
  new Set([
    table.partitionKey,
    ...(table.sortKey !== undefined ? [table.sortKey] : []),
    ...keyAttributeNames(index.partitionKey),
    ...keyAttributeNames(index.sortKey),
  ]);
