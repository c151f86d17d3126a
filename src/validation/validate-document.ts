/**
 * Semantic validator: runs every rule group over a loaded document and
 * returns all diagnostics at once.
 */

import { createCatalog } from "../core/catalog.js";
import type { Diagnostic } from "../types/diagnostics.js";
import type { SchemaDocument, UsageDataDocument } from "../types/schema.js";
import { createDiagnosticSink } from "./diagnostics.js";
import { checkCrossTablePatterns } from "./rules/cross-table-rules.js";
import { checkEntity } from "./rules/entity-rules.js";
import { checkIndexMappings, checkTableIndexes } from "./rules/index-rules.js";
import { checkAccessPatterns } from "./rules/pattern-rules.js";
import { checkUniqueness } from "./rules/uniqueness.js";
import { checkUsageData } from "./rules/usage-data-rules.js";

/**
 * Validates a structurally sound document.
 *
 * Rule groups never stop early; the result lists every violation in walk
 * order (tables, then entities, then cross-table patterns, then usage data).
 * Warnings carry `severity: "warning"` and do not block generation.
 *
 * @param document - Output of `loadSchema` with no structural diagnostics
 * @param usageData - Optional usage-data document to check against the schema
 *
 * @example
 * ```ts
 * const diagnostics = validateDocument(document);
 * const blocking = diagnostics.filter((d) => d.severity === "error");
 * ```
 */
export const validateDocument = (
  document: SchemaDocument,
  usageData?: UsageDataDocument,
): readonly Diagnostic[] => {
  const catalog = createCatalog(document);
  const sink = createDiagnosticSink();

  checkUniqueness(catalog, sink);

  for (const tableEntry of catalog.tables) {
    const { table, path } = tableEntry;
    if (table.name.trim().length === 0) {
      sink.structural(`${path}.table_config.table_name`, "table_name must not be empty");
    }
    if (table.partitionKey.trim().length === 0) {
      sink.structural(`${path}.table_config.partition_key`, "partition_key must not be empty");
    }
    checkTableIndexes(tableEntry, sink);
  }

  for (const entityEntry of catalog.entities) {
    checkEntity(entityEntry, sink);
    checkIndexMappings(entityEntry, sink);
    checkAccessPatterns(entityEntry, catalog, sink);
  }

  checkCrossTablePatterns(catalog, sink);

  if (usageData !== undefined) {
    checkUsageData(usageData, catalog, sink);
  }

  return sink.list();
};
