/**
 * Index projection coverage: which entity fields an index read returns.
 */

import type {
  EntityDefinition,
  IndexDefinition,
  TableDefinition,
} from "../types/schema.js";
import { indexKeyFields } from "./key-fields.js";

export interface ProjectionCoverage {
  readonly projection: "ALL" | "KEYS_ONLY" | "INCLUDE";
  /** Entity fields the index read does not return. */
  readonly missingFields: readonly string[];
  /** Required fields among {@link missingFields}. */
  readonly missingRequiredFields: readonly string[];
  /** True when the read can be materialized as a typed entity. */
  readonly typedEntity: boolean;
}

/**
 * Computes what an index read returns for one entity.
 *
 * Table key attributes and the fields feeding the entity's index key
 * templates are always projected. `ALL` projects everything; `INCLUDE`
 * adds the listed attributes; `KEYS_ONLY` adds nothing. The read returns a
 * typed entity only when every missing field is optional.
 *
 * @example
 * ```ts
 * // INCLUDE ["title"] over fields deal_id (key), title, price (required)
 * projectionCoverage(table, index, deal);
 * // => { projection: "INCLUDE", missingFields: ["price"],
 * //      missingRequiredFields: ["price"], typedEntity: false }
 * ```
 */
export const projectionCoverage = (
  table: TableDefinition,
  index: IndexDefinition,
  entity: EntityDefinition,
): ProjectionCoverage => {
  const projection =
    index.projection === "INCLUDE" || index.projection === "KEYS_ONLY"
      ? index.projection
      : "ALL";

  if (projection === "ALL") {
    return Object.freeze({
      projection,
      missingFields: Object.freeze([]),
      missingRequiredFields: Object.freeze([]),
      typedEntity: true,
    });
  }

  const projected = new Set<string>([
    table.partitionKey,
    ...(table.sortKey !== undefined ? [table.sortKey] : []),
    ...indexKeyFields(entity, index.name),
    ...(projection === "INCLUDE" ? (index.includedAttributes ?? []) : []),
  ]);

  const missing = entity.fields.filter((field) => !projected.has(field.name));
  const missingRequired = missing.filter((field) => field.required);

  return Object.freeze({
    projection,
    missingFields: Object.freeze(missing.map((field) => field.name)),
    missingRequiredFields: Object.freeze(missingRequired.map((field) => field.name)),
    typedEntity: missingRequired.length === 0,
  });
};
