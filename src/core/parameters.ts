/**
 * Parameter roles derived from a pattern definition.
 */

import type {
  AccessPatternDefinition,
  FilterExpressionDefinition,
  ParameterDefinition,
} from "../types/schema.js";

/** Names of parameters consumed by filter conditions. */
export const filterParameterNames = (
  filter: FilterExpressionDefinition | undefined,
): ReadonlySet<string> => {
  const names = new Set<string>();
  for (const condition of filter?.conditions ?? []) {
    if (condition.param !== undefined) names.add(condition.param);
    if (condition.param2 !== undefined) names.add(condition.param2);
    for (const param of condition.params ?? []) names.add(param);
  }
  return names;
};

/**
 * Parameters that address keys: everything except entity bodies and
 * filter values, in declaration order.
 */
export const keySideParameters = (
  pattern: AccessPatternDefinition,
): readonly ParameterDefinition[] => {
  const filterNames = filterParameterNames(pattern.filter);
  return pattern.parameters.filter(
    (param) => param.kind !== "entity" && !filterNames.has(param.name),
  );
};

/** Number of values a range condition compares against. */
export const rangeValueCount = (rangeCondition: string): number =>
  rangeCondition === "between" ? 2 : 1;
