/**
 * Uniqueness rules: names within their scope and pattern ids across the
 * whole document.
 */

import type { SchemaCatalog } from "../../core/catalog.js";
import type { DiagnosticSink } from "../diagnostics.js";
import { joinPath } from "../diagnostics.js";
import { toCamelCase, toSnakeCase } from "../../utils/naming.js";

interface Seen {
  readonly path: string;
  readonly label: string;
}

/**
 * Tracks first occurrences of keys and reports every later duplicate against
 * the first one.
 */
const createTracker = (
  sink: DiagnosticSink,
  describe: (key: string, first: Seen, duplicate: Seen) => string,
) => {
  const seen = new Map<string, Seen>();
  return (key: string, occurrence: Seen): void => {
    const first = seen.get(key);
    if (first === undefined) {
      seen.set(key, occurrence);
      return;
    }
    sink.uniqueness(occurrence.path, describe(key, first, occurrence), [
      first.path,
      occurrence.path,
    ]);
  };
};

const checkScopedNames = (
  names: readonly string[],
  basePath: string,
  what: string,
  scope: string,
  sink: DiagnosticSink,
): void => {
  const track = createTracker(
    sink,
    (name) => `Duplicate ${what} '${name}' in ${scope}`,
  );
  names.forEach((name, index) => {
    track(name, { path: joinPath(basePath, index), label: name });
  });
};

/**
 * Distinct pattern names that collapse to the same generated method name.
 * Exact duplicates are left to {@link checkScopedNames}.
 */
const checkMethodNames = (
  names: readonly string[],
  basePath: string,
  scope: string,
  sink: DiagnosticSink,
): void => {
  const seen = new Map<string, Seen>();
  names.forEach((name, index) => {
    const occurrence = { path: joinPath(basePath, index), label: name };
    // camelCase is derived from snake_case, so it is the coarser key
    const key = toCamelCase(name);
    const first = seen.get(key);
    if (first === undefined) {
      seen.set(key, occurrence);
      return;
    }
    if (first.label === name) return;
    sink.uniqueness(
      `${occurrence.path}.name`,
      `Access patterns '${first.label}' and '${name}' in ${scope} generate the same method name '${toSnakeCase(first.label)}'`,
      [first.path, occurrence.path],
    );
  });
};

/** Runs every uniqueness rule over the document. */
export const checkUniqueness = (
  catalog: SchemaCatalog,
  sink: DiagnosticSink,
): void => {
  const trackTable = createTracker(
    sink,
    (name) => `Duplicate table name '${name}'`,
  );
  const trackEntity = createTracker(
    sink,
    (name, first) =>
      `Entity name '${name}' is already defined at ${first.path}; entity names must be unique across all tables`,
  );
  const trackPatternId = createTracker(
    sink,
    (id, first, duplicate) =>
      `Duplicate pattern_id ${id}: used by ${first.label} and ${duplicate.label}`,
  );

  for (const { table, path } of catalog.tables) {
    trackTable(table.name, {
      path: `${path}.table_config.table_name`,
      label: table.name,
    });
    checkScopedNames(
      table.indexes.map((index) => index.name),
      `${path}.gsi_list`,
      "index name",
      `table '${table.name}'`,
      sink,
    );
  }

  for (const { entity, table, path } of catalog.entities) {
    trackEntity(entity.name, { path, label: entity.name });

    checkScopedNames(
      entity.fields.map((field) => field.name),
      `${path}.fields`,
      "field name",
      `entity '${entity.name}'`,
      sink,
    );
    checkScopedNames(
      entity.indexMappings.map((mapping) => mapping.indexName),
      `${path}.gsi_mappings`,
      "index mapping",
      `entity '${entity.name}'`,
      sink,
    );
    checkScopedNames(
      entity.accessPatterns.map((pattern) => pattern.name),
      `${path}.access_patterns`,
      "access pattern name",
      `entity '${entity.name}'`,
      sink,
    );
    checkMethodNames(
      entity.accessPatterns.map((pattern) => pattern.name),
      `${path}.access_patterns`,
      `entity '${entity.name}'`,
      sink,
    );

    entity.accessPatterns.forEach((pattern, index) => {
      const patternPath = joinPath(`${path}.access_patterns`, index);
      trackPatternId(String(pattern.id), {
        path: patternPath,
        label: `${table.name}.${entity.name}.${pattern.name}`,
      });
      checkScopedNames(
        pattern.parameters.map((param) => param.name),
        `${patternPath}.parameters`,
        "parameter name",
        `access pattern '${pattern.name}'`,
        sink,
      );
    });
  }

  checkMethodNames(
    catalog.document.crossTablePatterns.map((pattern) => pattern.name),
    "cross_table_access_patterns",
    "the transaction service",
    sink,
  );

  catalog.document.crossTablePatterns.forEach((pattern, index) => {
    const patternPath = joinPath("cross_table_access_patterns", index);
    trackPatternId(String(pattern.id), {
      path: patternPath,
      label: `cross-table pattern ${pattern.name}`,
    });
    checkScopedNames(
      pattern.parameters.map((param) => param.name),
      `${patternPath}.parameters`,
      "parameter name",
      `cross-table pattern '${pattern.name}'`,
      sink,
    );
  });
};
