/**
 * Access pattern rules: operation and return shape, index references,
 * read consistency, and range-condition parameter counts.
 */

import type { EntityEntry, SchemaCatalog } from "../../core/catalog.js";
import {
  findIndex,
  findMapping,
  templateFieldNames,
} from "../../core/key-fields.js";
import { keySideParameters, rangeValueCount } from "../../core/parameters.js";
import {
  ACCESS_OPERATIONS,
  RANGE_CONDITIONS,
  READ_OPERATIONS,
  RETURN_SHAPES,
  isAccessOperation,
  isRangeCondition,
  isReturnShape,
  type AccessOperation,
} from "../../types/enums.js";
import type { AccessPatternDefinition } from "../../types/schema.js";
import { keyAttributeNames } from "../../types/schema.js";
import type { DiagnosticSink } from "../diagnostics.js";
import { joinPath } from "../diagnostics.js";
import { checkFilterExpression } from "./filter-rules.js";
import { checkParameters } from "./parameters.js";

const INDEX_OPERATIONS: ReadonlySet<AccessOperation> = new Set(["Query", "Scan"]);

const describePattern = (pattern: AccessPatternDefinition): string =>
  `Pattern ${pattern.id} (${pattern.name})`;

const checkRangeCondition = (
  entry: EntityEntry,
  pattern: AccessPatternDefinition,
  operation: AccessOperation | undefined,
  path: string,
  sink: DiagnosticSink,
): void => {
  const { entity, table } = entry;
  const condition = pattern.rangeCondition;
  if (condition === undefined) return;

  if (!isRangeCondition(condition)) {
    sink.enumViolation(
      `${path}.range_condition`,
      "range_condition",
      condition,
      RANGE_CONDITIONS,
    );
    return;
  }
  if (operation !== undefined && operation !== "Query") {
    sink.consistency(
      `${path}.operation`,
      `${describePattern(pattern)}: range conditions require operation 'Query', got '${operation}'`,
    );
  }

  const rangeCount = rangeValueCount(condition);
  const actual = keySideParameters(pattern).length;

  if (pattern.indexName === undefined) {
    if (table.sortKey === undefined) {
      sink.consistency(
        `${path}.range_condition`,
        `${describePattern(pattern)}: table '${table.name}' has no sort key to apply range condition '${condition}' to`,
      );
      return;
    }
    const pkCount = templateFieldNames(entity.pkTemplate).length;
    const expected = pkCount + rangeCount;
    if (actual !== expected) {
      sink.cardinality(
        `${path}.parameters`,
        `${describePattern(pattern)}: range condition '${condition}' on the main table requires exactly ${expected} parameters (${pkCount} partition key + ${rangeCount} range value(s)), got ${actual}`,
      );
    }
    return;
  }

  const index = findIndex(table, pattern.indexName);
  if (index === undefined) return;
  if (index.sortKey === undefined) {
    sink.consistency(
      `${path}.range_condition`,
      `${describePattern(pattern)}: index '${index.name}' has no sort key to apply range condition '${condition}' to`,
    );
    return;
  }

  const mapping = findMapping(entity, index.name);
  if (mapping !== undefined && mapping.skTemplate === undefined) {
    sink.consistency(
      `${path}.range_condition`,
      `${describePattern(pattern)}: range condition '${condition}' needs a sort key, but entity '${entity.name}' maps no sk_template for index '${index.name}'`,
    );
    return;
  }
  const pkCount =
    mapping !== undefined
      ? templateFieldNames(mapping.pkTemplate).length
      : keyAttributeNames(index.partitionKey).length;
  const skCount = keyAttributeNames(index.sortKey).length;
  const min = pkCount + rangeCount;
  const max = pkCount + Math.max(0, skCount - 1) + rangeCount;

  if (actual < min) {
    sink.cardinality(
      `${path}.parameters`,
      `${describePattern(pattern)}: range condition '${condition}' requires at least ${min} parameters (${pkCount} partition key + ${rangeCount} range value(s)), got ${actual}`,
    );
  } else if (actual > max) {
    sink.cardinality(
      `${path}.parameters`,
      `${describePattern(pattern)}: range condition '${condition}' allows at most ${max} parameters (${pkCount} partition key + ${max - min} sort key equality + ${rangeCount} range value(s)), got ${actual}; sort key attributes are queried left to right`,
    );
  }
};

/** Key operations must receive at least one parameter per key template field. */
const checkKeyParameterCount = (
  entry: EntityEntry,
  pattern: AccessPatternDefinition,
  operation: AccessOperation,
  path: string,
  sink: DiagnosticSink,
): void => {
  if (pattern.rangeCondition !== undefined) return;
  const { entity } = entry;
  const keySide = keySideParameters(pattern);
  const hasOwnEntityParam = pattern.parameters.some(
    (param) => param.kind === "entity" && param.entityType === entity.name,
  );

  let required: readonly string[];
  switch (operation) {
    case "GetItem":
    case "DeleteItem":
      required = [
        ...templateFieldNames(entity.pkTemplate),
        ...templateFieldNames(entity.skTemplate),
      ];
      break;
    case "UpdateItem": {
      if (hasOwnEntityParam) return;
      required = [
        ...templateFieldNames(entity.pkTemplate),
        ...templateFieldNames(entity.skTemplate),
      ];
      // parameters named after other fields are the values being set
      const valueNames = new Set(
        entity.fields
          .map((field) => field.name)
          .filter((name) => !required.includes(name)),
      );
      const keyCandidates = keySide.filter((param) => !valueNames.has(param.name));
      if (keyCandidates.length < required.length) {
        sink.cardinality(
          `${path}.parameters`,
          `${describePattern(pattern)}: UpdateItem needs a parameter for each key field (${required.join(", ")}), got ${keyCandidates.length}`,
        );
      }
      return;
    }
    case "Query": {
      const mapping =
        pattern.indexName !== undefined
          ? findMapping(entity, pattern.indexName)
          : undefined;
      if (pattern.indexName !== undefined && mapping === undefined) return;
      required = templateFieldNames(
        mapping !== undefined ? mapping.pkTemplate : entity.pkTemplate,
      );
      break;
    }
    case "PutItem":
      if (!hasOwnEntityParam) {
        sink.consistency(
          `${path}.parameters`,
          `${describePattern(pattern)}: PutItem needs an entity parameter with entity_type '${entity.name}'`,
        );
      }
      return;
    case "Scan":
    case "BatchGetItem":
    case "BatchWriteItem":
      return;
  }

  if (keySide.length < required.length) {
    sink.cardinality(
      `${path}.parameters`,
      `${describePattern(pattern)}: ${operation} needs a parameter for each key field (${required.join(", ")}), got ${keySide.length}`,
    );
  }
};

export const checkAccessPatterns = (
  entry: EntityEntry,
  catalog: SchemaCatalog,
  sink: DiagnosticSink,
): void => {
  const { entity, table, path: entityPath } = entry;

  entity.accessPatterns.forEach((pattern, position) => {
    const path = joinPath(`${entityPath}.access_patterns`, position);

    if (pattern.name.trim().length === 0) {
      sink.structural(`${path}.name`, "Access pattern name must not be empty");
    }

    const operation = isAccessOperation(pattern.operation)
      ? pattern.operation
      : undefined;
    if (operation === undefined) {
      sink.enumViolation(
        `${path}.operation`,
        "operation",
        pattern.operation,
        ACCESS_OPERATIONS,
      );
    }
    if (!isReturnShape(pattern.returnShape)) {
      sink.enumViolation(
        `${path}.return_type`,
        "return_type",
        pattern.returnShape,
        RETURN_SHAPES,
      );
    }

    checkParameters(pattern.parameters, `${path}.parameters`, catalog, sink);

    const indexName = pattern.indexName;
    if (indexName !== undefined) {
      if (indexName.trim().length === 0) {
        sink.structural(`${path}.index_name`, "index_name must not be empty");
      } else if (findIndex(table, indexName) === undefined) {
        sink.reference(
          `${path}.index_name`,
          `${describePattern(pattern)} references unknown index '${indexName}' in table '${table.name}'`,
          indexName,
          table.indexes.map((index) => index.name),
        );
      } else if (findMapping(entity, indexName) === undefined) {
        sink.reference(
          `${path}.index_name`,
          `${describePattern(pattern)} reads index '${indexName}' but entity '${entity.name}' has no gsi_mappings entry for it`,
          indexName,
          entity.indexMappings.map((mapping) => mapping.indexName),
        );
      }
      if (operation !== undefined && !INDEX_OPERATIONS.has(operation)) {
        sink.consistency(
          `${path}.index_name`,
          `${describePattern(pattern)}: index_name is only valid for Query and Scan operations, got '${operation}'`,
        );
      }
    }

    if (pattern.consistentRead === true && indexName !== undefined && indexName.length > 0) {
      sink.consistency(
        `${path}.consistent_read`,
        `${describePattern(pattern)}: consistent_read cannot be true for secondary index reads; global secondary indexes only support eventually consistent reads`,
      );
    } else if (
      pattern.consistentRead !== undefined &&
      operation !== undefined &&
      !READ_OPERATIONS.has(operation)
    ) {
      sink.consistency(
        `${path}.consistent_read`,
        `${describePattern(pattern)}: consistent_read has no effect on ${operation} operations`,
        "warning",
      );
    }

    checkRangeCondition(entry, pattern, operation, path, sink);
    if (operation !== undefined) {
      checkKeyParameterCount(entry, pattern, operation, path, sink);
    }

    if (pattern.filter !== undefined) {
      checkFilterExpression(
        entry,
        pattern,
        operation,
        `${path}.filter_expression`,
        sink,
      );
    }
  });
};
