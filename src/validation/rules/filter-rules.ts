/**
 * Filter expression rules.
 */

import type { EntityEntry } from "../../core/catalog.js";
import { readKeyFields } from "../../core/key-fields.js";
import {
  FILTER_FUNCTIONS,
  FILTER_OPERATORS,
  LOGICAL_OPERATORS,
  isFilterFunction,
  isFilterOperator,
  isLogicalOperator,
  type AccessOperation,
} from "../../types/enums.js";
import type {
  AccessPatternDefinition,
  FilterConditionDefinition,
} from "../../types/schema.js";
import type { DiagnosticSink } from "../diagnostics.js";
import { joinPath } from "../diagnostics.js";

const checkOperatorArguments = (
  condition: FilterConditionDefinition,
  operator: string,
  path: string,
  sink: DiagnosticSink,
): void => {
  if (!isFilterOperator(operator)) {
    sink.enumViolation(`${path}.operator`, "filter operator", operator, FILTER_OPERATORS);
    return;
  }
  switch (operator) {
    case "between":
      if (condition.param === undefined) {
        sink.cardinality(path, "'between' operator requires 'param'");
      }
      if (condition.param2 === undefined) {
        sink.cardinality(path, "'between' operator requires 'param2'");
      }
      return;
    case "in":
      if (condition.params === undefined || condition.params.length === 0) {
        sink.cardinality(path, "'in' operator requires a non-empty 'params' array");
      }
      return;
    default:
      if (condition.param === undefined) {
        sink.cardinality(path, `'${operator}' operator requires 'param'`);
      }
  }
};

const checkCondition = (
  condition: FilterConditionDefinition,
  path: string,
  sink: DiagnosticSink,
): void => {
  const { operator, function: fn } = condition;

  if (operator !== undefined && fn !== undefined && fn !== "size") {
    sink.consistency(
      path,
      "Only one of 'operator' or 'function' is allowed (except for 'size', which requires both)",
    );
    return;
  }
  if (operator === undefined && fn === undefined) {
    sink.structural(path, "Filter condition must have either 'operator' or 'function'");
    return;
  }

  if (fn === undefined) {
    if (operator !== undefined) {
      checkOperatorArguments(condition, operator, path, sink);
    }
    return;
  }

  if (!isFilterFunction(fn)) {
    sink.enumViolation(`${path}.function`, "filter function", fn, FILTER_FUNCTIONS);
    return;
  }
  switch (fn) {
    case "size":
      if (operator === undefined) {
        sink.structural(path, "'size' function requires an 'operator'");
      } else {
        checkOperatorArguments(condition, operator, path, sink);
      }
      return;
    case "contains":
    case "begins_with":
      if (condition.param === undefined) {
        sink.cardinality(path, `'${fn}' function requires 'param'`);
      }
      return;
    case "attribute_exists":
    case "attribute_not_exists":
      return;
  }
};

/**
 * Checks a pattern's filter expression: allowed operation, combinator,
 * referenced fields and parameters, key attributes on Query, and the
 * argument count of each operator or function.
 */
export const checkFilterExpression = (
  { entity }: EntityEntry,
  pattern: AccessPatternDefinition,
  operation: AccessOperation | undefined,
  path: string,
  sink: DiagnosticSink,
): void => {
  const filter = pattern.filter;
  if (filter === undefined) return;

  if (operation !== undefined && operation !== "Query" && operation !== "Scan") {
    sink.consistency(
      path,
      `Filter expressions are only valid for Query and Scan operations, got '${operation}'`,
    );
  }
  if (
    filter.logicalOperator !== undefined &&
    !isLogicalOperator(filter.logicalOperator)
  ) {
    sink.enumViolation(
      `${path}.logical_operator`,
      "logical_operator",
      filter.logicalOperator,
      LOGICAL_OPERATORS,
    );
  }

  const fieldNames = entity.fields.map((field) => field.name);
  const paramNames = pattern.parameters.map((param) => param.name);
  const keyFields = readKeyFields(entity, pattern.indexName);

  filter.conditions.forEach((condition, position) => {
    const conditionPath = joinPath(`${path}.conditions`, position);

    if (condition.field.trim().length === 0) {
      sink.structural(`${conditionPath}.field`, "Filter condition field must not be empty");
    } else if (!fieldNames.includes(condition.field)) {
      sink.reference(
        `${conditionPath}.field`,
        `Filter field '${condition.field}' is not a field of entity '${entity.name}'`,
        condition.field,
        fieldNames,
      );
    } else if (operation === "Query" && keyFields.has(condition.field)) {
      sink.consistency(
        `${conditionPath}.field`,
        `Cannot filter on key attribute '${condition.field}' in a Query operation; use the key condition instead`,
      );
    }

    const referenced: [string, string | undefined][] = [
      ["param", condition.param],
      ["param2", condition.param2],
      ...(condition.params ?? []).map(
        (param, index): [string, string] => [`params[${index}]`, param],
      ),
    ];
    for (const [key, name] of referenced) {
      if (name !== undefined && !paramNames.includes(name)) {
        sink.reference(
          `${conditionPath}.${key}`,
          `Filter parameter '${name}' is not declared in the parameters of pattern '${pattern.name}'`,
          name,
          paramNames,
        );
      }
    }

    checkCondition(condition, conditionPath, sink);
  });
};
