/**
 * Schema loader: turns a parsed JSON document into a normalized
 * {@link SchemaDocument} plus structural diagnostics. Never throws.
 */

import type { Diagnostic } from "../types/diagnostics.js";
import {
  EMPTY_DOCUMENT,
  type AccessPatternDefinition,
  type CrossTablePatternDefinition,
  type EntityDefinition,
  type FilterExpressionDefinition,
  type IndexDefinition,
  type KeyTemplateDefinition,
  type ParameterDefinition,
  type SchemaDocument,
  type TableDefinition,
} from "../types/schema.js";
import { isRecord } from "../utils/guards.js";
import { deepFreeze } from "../utils/freeze.js";
import { joinPath } from "../validation/diagnostics.js";
import { issuesToDiagnostics } from "./issues.js";
import {
  crossTablePatternShape,
  tableShape,
  type WireAccessPattern,
  type WireCrossTablePattern,
  type WireEntity,
  type WireFilterExpression,
  type WireIndex,
  type WireParameter,
  type WireTable,
} from "./shapes.js";

/** Output of {@link loadSchema}. */
export interface LoadResult {
  readonly document: SchemaDocument;
  readonly diagnostics: readonly Diagnostic[];
}

const structural = (path: string, message: string): Diagnostic =>
  Object.freeze({
    kind: "StructuralError" as const,
    severity: "error" as const,
    path,
    message,
  });

const failed = (diagnostic: Diagnostic): LoadResult =>
  Object.freeze({
    document: EMPTY_DOCUMENT,
    diagnostics: Object.freeze([diagnostic]),
  });

const keyTemplate = (value: string | string[]): KeyTemplateDefinition =>
  typeof value === "string" ? value : [...value];

const toParameter = (param: WireParameter): ParameterDefinition => ({
  name: param.name,
  kind: param.type,
  entityType: param.entity_type ?? undefined,
});

const toFilter = (
  filter: WireFilterExpression,
): FilterExpressionDefinition => ({
  conditions: filter.conditions.map((condition) => ({
    field: condition.field,
    operator: condition.operator ?? undefined,
    function: condition.function ?? undefined,
    param: condition.param ?? undefined,
    param2: condition.param2 ?? undefined,
    params: condition.params ?? undefined,
  })),
  logicalOperator: filter.logical_operator ?? undefined,
});

const toAccessPattern = (
  pattern: WireAccessPattern,
): AccessPatternDefinition => ({
  id: pattern.pattern_id,
  name: pattern.name,
  description: pattern.description,
  operation: pattern.operation,
  parameters: pattern.parameters.map(toParameter),
  returnShape: pattern.return_type,
  indexName: pattern.index_name ?? undefined,
  rangeCondition: pattern.range_condition ?? undefined,
  consistentRead: pattern.consistent_read ?? undefined,
  filter: pattern.filter_expression
    ? toFilter(pattern.filter_expression)
    : undefined,
});

const toEntity = (name: string, entity: WireEntity): EntityDefinition => ({
  name,
  entityType: entity.entity_type,
  pkTemplate: entity.pk_template,
  skTemplate: entity.sk_template ?? undefined,
  indexMappings: (entity.gsi_mappings ?? []).map((mapping) => ({
    indexName: mapping.name,
    pkTemplate: keyTemplate(mapping.pk_template),
    skTemplate:
      mapping.sk_template === null || mapping.sk_template === undefined
        ? undefined
        : keyTemplate(mapping.sk_template),
  })),
  fields: entity.fields.map((field) => ({
    name: field.name,
    kind: field.type,
    required: field.required,
    itemKind: field.item_type ?? undefined,
  })),
  accessPatterns: entity.access_patterns.map(toAccessPattern),
});

const toIndex = (index: WireIndex): IndexDefinition => ({
  name: index.name,
  partitionKey: keyTemplate(index.partition_key),
  sortKey:
    index.sort_key === null || index.sort_key === undefined
      ? undefined
      : keyTemplate(index.sort_key),
  projection: index.projection ?? "ALL",
  includedAttributes: index.included_attributes ?? undefined,
});

const toTable = (table: WireTable): TableDefinition => ({
  name: table.table_config.table_name,
  partitionKey: table.table_config.partition_key,
  sortKey: table.table_config.sort_key ?? undefined,
  indexes: (table.gsi_list ?? []).map(toIndex),
  entities: Object.entries(table.entities).map(([name, entity]) =>
    toEntity(name, entity),
  ),
});

const toCrossTablePattern = (
  pattern: WireCrossTablePattern,
): CrossTablePatternDefinition => ({
  id: pattern.pattern_id,
  name: pattern.name,
  description: pattern.description,
  operation: pattern.operation,
  participants: pattern.entities_involved.map((participant) => ({
    table: participant.table,
    entity: participant.entity,
    action: participant.action,
    condition: participant.condition ?? undefined,
  })),
  parameters: pattern.parameters.map(toParameter),
  returnShape: pattern.return_type,
});

/**
 * Loads a schema document.
 *
 * Checks shape only: JSON types, required keys and non-empty required arrays.
 * A table or cross-table pattern with structural problems is reported and
 * left out of the returned document. When `tables` (or a present
 * `cross_table_access_patterns`) is not an array, the document is empty.
 *
 * @param input - The parsed JSON schema document
 * @returns The normalized, frozen document and any structural diagnostics
 *
 * @example
 * ```ts
 * const { document, diagnostics } = loadSchema(JSON.parse(text));
 * if (diagnostics.length === 0) {
 *   console.log(document.tables.map((t) => t.name));
 * }
 * ```
 */
export const loadSchema = (input: unknown): LoadResult => {
  if (!isRecord(input)) {
    return failed(structural("$", "Schema document must be a JSON object"));
  }

  const rawTables = input["tables"];
  if (rawTables === undefined) {
    return failed(structural("tables", "Missing required field 'tables'"));
  }
  if (!Array.isArray(rawTables)) {
    return failed(structural("tables", "Expected array of tables"));
  }
  if (rawTables.length === 0) {
    return failed(structural("tables", "Must contain at least one table"));
  }

  const rawCrossTable = input["cross_table_access_patterns"];
  if (
    rawCrossTable !== undefined &&
    rawCrossTable !== null &&
    !Array.isArray(rawCrossTable)
  ) {
    return failed(
      structural(
        "cross_table_access_patterns",
        "Expected array of cross-table access patterns",
      ),
    );
  }

  const diagnostics: Diagnostic[] = [];
  const tables: TableDefinition[] = [];
  rawTables.forEach((rawTable: unknown, index) => {
    const path = joinPath("tables", index);
    const parsed = tableShape.safeParse(rawTable);
    if (parsed.success) {
      tables.push(toTable(parsed.data));
    } else {
      diagnostics.push(...issuesToDiagnostics(parsed.error.issues, rawTable, path));
    }
  });

  const crossTablePatterns: CrossTablePatternDefinition[] = [];
  (Array.isArray(rawCrossTable) ? rawCrossTable : []).forEach(
    (rawPattern: unknown, index) => {
      const path = joinPath("cross_table_access_patterns", index);
      const parsed = crossTablePatternShape.safeParse(rawPattern);
      if (parsed.success) {
        crossTablePatterns.push(toCrossTablePattern(parsed.data));
      } else {
        diagnostics.push(
          ...issuesToDiagnostics(parsed.error.issues, rawPattern, path),
        );
      }
    },
  );

  return Object.freeze({
    document: deepFreeze<SchemaDocument>({ tables, crossTablePatterns }),
    diagnostics: Object.freeze(diagnostics),
  });
};
