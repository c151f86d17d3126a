/**
 * Compiles key conditions, filters and update assignments into expression
 * strings with `#name` / `:value` aliases.
 *
 * Every attribute is aliased, so reserved words and names with special
 * characters never reach the expression text.
 */

import type {
  FilterFunction,
  FilterOperator,
  LogicalOperator,
  RangeCondition,
} from "../types/enums.js";
import type {
  ExpressionName,
  ExpressionPlan,
  ExpressionValue,
  ResolvedKey,
  ValueSource,
} from "../types/resolved.js";

/** Creates an attribute name alias, e.g. `"#pk"` for `"pk"`. */
export const aliasAttributeName = (name: string): string => `#${name}`;

/** Creates a value placeholder, e.g. `":pk"` for `"pk"`. */
export const valuePlaceholder = (name: string): string => `:${name}`;

interface PlanBuilder {
  readonly name: (base: string, attribute: string) => string;
  readonly value: (base: string, source: ValueSource) => string;
  readonly finish: (expression: string) => ExpressionPlan;
}

const createPlanBuilder = (): PlanBuilder => {
  const names: ExpressionName[] = [];
  const values: ExpressionValue[] = [];

  return {
    name: (base, attribute) => {
      const alias = aliasAttributeName(base);
      names.push(Object.freeze({ alias, attribute }));
      return alias;
    },
    value: (base, source) => {
      const placeholder = valuePlaceholder(base);
      values.push(Object.freeze({ placeholder, source }));
      return placeholder;
    },
    finish: (expression) =>
      Object.freeze({
        expression,
        names: Object.freeze(names),
        values: Object.freeze(values),
      }),
  };
};

const parameter = (name: string, prefix = ""): ValueSource =>
  Object.freeze({ kind: "parameter" as const, name, prefix });

// --- key conditions ---------------------------------------------------------

/** Comparison applied to one sort key attribute. */
export interface RangeComparison {
  readonly condition: RangeCondition;
  /** One parameter, two for `between`. */
  readonly parameters: readonly string[];
  /** Static key text prepended to each value. */
  readonly prefix: string;
}

export interface KeyConditionInput {
  readonly partitionKey: ResolvedKey;
  readonly sortKey?: ResolvedKey | undefined;
  /** Leading sort key attributes matched by equality. */
  readonly sortEqualityCount: number;
  readonly range?: RangeComparison | undefined;
  /** Restricts the sort key to a prefix, for item collections. */
  readonly sortPrefix?: string | undefined;
}

const compileComparison = (
  builder: PlanBuilder,
  operand: string,
  valueBase: string,
  range: RangeComparison,
): string => {
  const [first, second] = range.parameters;
  if (first === undefined) return "";

  switch (range.condition) {
    case "between": {
      const lo = builder.value(`${valueBase}Lo`, parameter(first, range.prefix));
      const hi = builder.value(`${valueBase}Hi`, parameter(second ?? first, range.prefix));
      return `${operand} BETWEEN ${lo} AND ${hi}`;
    }
    case "begins_with": {
      const value = builder.value(valueBase, parameter(first, range.prefix));
      return `begins_with(${operand}, ${value})`;
    }
    case ">":
    case ">=":
    case "<":
    case "<=": {
      const value = builder.value(valueBase, parameter(first, range.prefix));
      return `${operand} ${range.condition} ${value}`;
    }
  }
};

/**
 * Compiles a key condition over the partition key and, optionally, the
 * leading sort key attributes.
 *
 * Single attribute keys use the `#pk` / `#sk` aliases; multi-attribute keys
 * number them (`#pk0`, `#pk1`, ...). The range comparison applies to the
 * first sort key attribute not fixed by equality.
 *
 * @example
 * ```ts
 * compileKeyCondition({
 *   partitionKey, sortKey, sortEqualityCount: 0,
 *   range: { condition: "between", parameters: ["start", "end"], prefix: "ORDER#" },
 * }).expression;
 * // => "#pk = :pk AND #sk BETWEEN :skLo AND :skHi"
 * ```
 */
export const compileKeyCondition = (input: KeyConditionInput): ExpressionPlan => {
  const builder = createPlanBuilder();
  const clauses: string[] = [];
  const { partitionKey, sortKey } = input;

  if (partitionKey.compiled.form === "single") {
    const [attribute] = partitionKey.attributes;
    const alias = builder.name("pk", attribute ?? "");
    const value = builder.value("pk", { kind: "key", part: "partition" });
    clauses.push(`${alias} = ${value}`);
  } else {
    partitionKey.attributes.forEach((attribute, position) => {
      const alias = builder.name(`pk${position}`, attribute);
      const value = builder.value(`pk${position}`, {
        kind: "key",
        part: "partition",
        position,
      });
      clauses.push(`${alias} = ${value}`);
    });
  }

  if (sortKey !== undefined) {
    const multi = sortKey.compiled.form === "multi";
    const base = (position: number): string => (multi ? `sk${position}` : "sk");

    for (let position = 0; position < input.sortEqualityCount; position += 1) {
      const attribute = sortKey.attributes[position];
      if (attribute === undefined) break;
      const alias = builder.name(base(position), attribute);
      const value = builder.value(base(position), {
        kind: "key",
        part: "sort",
        position: multi ? position : undefined,
      });
      clauses.push(`${alias} = ${value}`);
    }

    const rangeAttribute = sortKey.attributes[input.sortEqualityCount];
    if (input.range !== undefined && rangeAttribute !== undefined) {
      const alias = builder.name(base(input.sortEqualityCount), rangeAttribute);
      clauses.push(
        compileComparison(builder, alias, base(input.sortEqualityCount), input.range),
      );
    } else if (
      input.sortPrefix !== undefined &&
      input.sortPrefix.length > 0 &&
      input.sortEqualityCount === 0 &&
      rangeAttribute !== undefined
    ) {
      const alias = builder.name("sk", rangeAttribute);
      const value = builder.value("sk", { kind: "literal", value: input.sortPrefix });
      clauses.push(`begins_with(${alias}, ${value})`);
    }
  }

  return builder.finish(clauses.join(" AND "));
};

// --- filters ----------------------------------------------------------------

/** A filter condition with its closed-set values already narrowed. */
export interface FilterClause {
  readonly field: string;
  readonly operator?: FilterOperator | undefined;
  readonly function?: FilterFunction | undefined;
  readonly param?: string | undefined;
  readonly param2?: string | undefined;
  readonly params?: readonly string[] | undefined;
}

const compileOperator = (
  builder: PlanBuilder,
  operand: string,
  index: number,
  clause: FilterClause,
  operator: FilterOperator,
): string => {
  switch (operator) {
    case "between": {
      const lo = builder.value(`f${index}lo`, parameter(clause.param ?? ""));
      const hi = builder.value(`f${index}hi`, parameter(clause.param2 ?? ""));
      return `${operand} BETWEEN ${lo} AND ${hi}`;
    }
    case "in": {
      const placeholders = (clause.params ?? []).map((name, position) =>
        builder.value(`f${index}_${position}`, parameter(name)),
      );
      return `${operand} IN (${placeholders.join(", ")})`;
    }
    case "=":
    case "<>":
    case "<":
    case "<=":
    case ">":
    case ">=": {
      const value = builder.value(`f${index}`, parameter(clause.param ?? ""));
      return `${operand} ${operator} ${value}`;
    }
  }
};

const compileClause = (
  builder: PlanBuilder,
  clause: FilterClause,
  index: number,
): string => {
  const alias = builder.name(`f${index}`, clause.field);

  switch (clause.function) {
    case "attribute_exists":
    case "attribute_not_exists":
      return `${clause.function}(${alias})`;
    case "contains":
    case "begins_with": {
      const value = builder.value(`f${index}`, parameter(clause.param ?? ""));
      return `${clause.function}(${alias}, ${value})`;
    }
    case "size":
      return compileOperator(builder, `size(${alias})`, index, clause, clause.operator ?? "=");
    case undefined:
      return compileOperator(builder, alias, index, clause, clause.operator ?? "=");
  }
};

/**
 * Compiles filter conditions joined by one logical operator.
 *
 * @example
 * ```ts
 * compileFilter(
 *   [{ field: "status", operator: "=", param: "status" },
 *    { field: "tags", function: "contains", param: "tag" }],
 *   "AND",
 * ).expression;
 * // => "#f0 = :f0 AND contains(#f1, :f1)"
 * ```
 */
export const compileFilter = (
  clauses: readonly FilterClause[],
  logicalOperator: LogicalOperator,
): ExpressionPlan => {
  const builder = createPlanBuilder();
  const parts = clauses.map((clause, index) => compileClause(builder, clause, index));
  return builder.finish(parts.join(` ${logicalOperator} `));
};

// --- updates ----------------------------------------------------------------

export interface UpdateAssignment {
  readonly attribute: string;
  readonly source: ValueSource;
}

/**
 * Compiles a `SET` update expression.
 *
 * @example
 * ```ts
 * compileUpdate([{ attribute: "status", source: { kind: "parameter", name: "status", prefix: "" } }])
 *   .expression;
 * // => "SET #u0 = :u0"
 * ```
 */
export const compileUpdate = (
  assignments: readonly UpdateAssignment[],
): ExpressionPlan => {
  const builder = createPlanBuilder();
  const parts = assignments.map(({ attribute, source }, index) => {
    const alias = builder.name(`u${index}`, attribute);
    const value = builder.value(`u${index}`, source);
    return `${alias} = ${value}`;
  });
  return builder.finish(parts.length > 0 ? `SET ${parts.join(", ")}` : "");
};
