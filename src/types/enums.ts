/**
 * Closed value sets of the schema language.
 *
 * Each set is declared once as a readonly tuple so that validation (membership
 * and "did you mean" suggestions) and rendering (exhaustive switches) share a
 * single source of truth.
 */

export const FIELD_KINDS = [
  "string",
  "integer",
  "decimal",
  "boolean",
  "array",
  "object",
  "uuid",
] as const;
export type FieldKind = (typeof FIELD_KINDS)[number];

export const PARAMETER_KINDS = [...FIELD_KINDS, "entity"] as const;
export type ParameterKind = (typeof PARAMETER_KINDS)[number];

export const ACCESS_OPERATIONS = [
  "GetItem",
  "PutItem",
  "DeleteItem",
  "Query",
  "Scan",
  "UpdateItem",
  "BatchGetItem",
  "BatchWriteItem",
] as const;
export type AccessOperation = (typeof ACCESS_OPERATIONS)[number];

/** Operations that read items and may therefore request strong consistency. */
export const READ_OPERATIONS: ReadonlySet<AccessOperation> = new Set([
  "GetItem",
  "Query",
  "Scan",
  "BatchGetItem",
]);

export const RETURN_SHAPES = [
  "single_entity",
  "entity_list",
  "success_flag",
  "mixed_data",
  "void",
] as const;
export type ReturnShape = (typeof RETURN_SHAPES)[number];

export const RANGE_CONDITIONS = [
  "begins_with",
  "between",
  ">",
  ">=",
  "<",
  "<=",
] as const;
export type RangeCondition = (typeof RANGE_CONDITIONS)[number];

export const PROJECTION_KINDS = ["ALL", "KEYS_ONLY", "INCLUDE"] as const;
export type ProjectionKind = (typeof PROJECTION_KINDS)[number];

export const FILTER_OPERATORS = [
  "=",
  "<>",
  "<",
  "<=",
  ">",
  ">=",
  "between",
  "in",
] as const;
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

export const FILTER_FUNCTIONS = [
  "contains",
  "begins_with",
  "attribute_exists",
  "attribute_not_exists",
  "size",
] as const;
export type FilterFunction = (typeof FILTER_FUNCTIONS)[number];

export const LOGICAL_OPERATORS = ["AND", "OR"] as const;
export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];

export const TRANSACTION_OPERATIONS = ["TransactWrite", "TransactGet"] as const;
export type TransactionOperation = (typeof TRANSACTION_OPERATIONS)[number];

export const TRANSACTION_ACTIONS = {
  TransactWrite: ["Put", "Update", "Delete", "ConditionCheck"],
  TransactGet: ["Get"],
} as const satisfies Record<TransactionOperation, readonly string[]>;
export type TransactionAction =
  (typeof TRANSACTION_ACTIONS)[TransactionOperation][number];

/** Every transaction action, whatever the operation. */
export const TRANSACTION_ACTION_NAMES: readonly TransactionAction[] = [
  ...TRANSACTION_ACTIONS.TransactWrite,
  ...TRANSACTION_ACTIONS.TransactGet,
];

export const TRANSACTION_RETURN_SHAPES = ["boolean", "object", "array"] as const;
export type TransactionReturnShape = (typeof TRANSACTION_RETURN_SHAPES)[number];

/** Upper bound on participants of one cross-table transaction. */
export const MAX_TRANSACTION_PARTICIPANTS = 100;

/**
 * Type guard factory for a closed value set.
 *
 * @example
 * ```ts
 * const isProjection = isMemberOf(PROJECTION_KINDS);
 * isProjection("ALL");  // true
 * isProjection("all");  // false
 * ```
 */
export const isMemberOf =
  <T extends string>(values: readonly T[]) =>
  (value: string | undefined): value is T =>
    value !== undefined && values.some((candidate) => candidate === value);

export const isFieldKind = isMemberOf(FIELD_KINDS);
export const isParameterKind = isMemberOf(PARAMETER_KINDS);
export const isAccessOperation = isMemberOf(ACCESS_OPERATIONS);
export const isReturnShape = isMemberOf(RETURN_SHAPES);
export const isRangeCondition = isMemberOf(RANGE_CONDITIONS);
export const isProjectionKind = isMemberOf(PROJECTION_KINDS);
export const isFilterOperator = isMemberOf(FILTER_OPERATORS);
export const isFilterFunction = isMemberOf(FILTER_FUNCTIONS);
export const isLogicalOperator = isMemberOf(LOGICAL_OPERATORS);
export const isTransactionOperation = isMemberOf(TRANSACTION_OPERATIONS);
export const isTransactionReturnShape = isMemberOf(TRANSACTION_RETURN_SHAPES);
export const isTransactionAction = isMemberOf(TRANSACTION_ACTION_NAMES);

/** Returns the actions allowed for a transaction operation. */
export const transactionActionsFor = (
  operation: TransactionOperation,
): readonly TransactionAction[] => TRANSACTION_ACTIONS[operation];

/** True for kinds whose values the target store orders numerically. */
export const isNumericKind = (kind: string): boolean =>
  kind === "integer" || kind === "decimal";
