/**
 * Name lookups over a loaded schema document, shared by the validator and
 * the resolver.
 */

import type {
  EntityDefinition,
  SchemaDocument,
  TableDefinition,
} from "../types/schema.js";

export interface TableEntry {
  readonly table: TableDefinition;
  readonly index: number;
  /** Wire path, e.g. `tables[0]`. */
  readonly path: string;
}

export interface EntityEntry {
  readonly entity: EntityDefinition;
  readonly table: TableDefinition;
  /** Wire path, e.g. `tables[0].entities.User`. */
  readonly path: string;
}

export interface SchemaCatalog {
  readonly document: SchemaDocument;
  readonly tables: readonly TableEntry[];
  readonly entities: readonly EntityEntry[];
  readonly tableNames: readonly string[];
  readonly entityNames: readonly string[];
  /** First table with the given name. */
  readonly findTable: (name: string) => TableEntry | undefined;
  /** First entity with the given name, in document order. */
  readonly findEntity: (name: string) => EntityEntry | undefined;
}

export const tablePath = (index: number): string => `tables[${index}]`;

export const entityPath = (tableIndex: number, entityName: string): string =>
  `${tablePath(tableIndex)}.entities.${entityName}`;

/** Builds a {@link SchemaCatalog}. Duplicate names resolve to the first occurrence. */
export const createCatalog = (document: SchemaDocument): SchemaCatalog => {
  const tables = document.tables.map((table, index) =>
    Object.freeze({ table, index, path: tablePath(index) }),
  );
  const entities = tables.flatMap(({ table, index }) =>
    table.entities.map((entity) =>
      Object.freeze({ entity, table, path: entityPath(index, entity.name) }),
    ),
  );

  const tableByName = new Map<string, TableEntry>();
  for (const entry of tables) {
    if (!tableByName.has(entry.table.name)) tableByName.set(entry.table.name, entry);
  }
  const entityByName = new Map<string, EntityEntry>();
  for (const entry of entities) {
    if (!entityByName.has(entry.entity.name)) {
      entityByName.set(entry.entity.name, entry);
    }
  }

  return Object.freeze({
    document,
    tables: Object.freeze(tables),
    entities: Object.freeze(entities),
    tableNames: Object.freeze([...tableByName.keys()]),
    entityNames: Object.freeze([...entityByName.keys()]),
    findTable: (name: string) => tableByName.get(name),
    findEntity: (name: string) => entityByName.get(name),
  });
};
