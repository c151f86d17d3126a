/**
 * Resolved model: a validated schema document projected into everything a
 * renderer needs, with closed-set values narrowed into their unions.
 */

import type { CompiledKeyTemplate } from "../keys/key-template.js";
import type {
  AccessOperation,
  FieldKind,
  ParameterKind,
  ProjectionKind,
  RangeCondition,
  ReturnShape,
  TransactionAction,
  TransactionOperation,
  TransactionReturnShape,
} from "./enums.js";

export interface ResolvedField {
  readonly name: string;
  readonly kind: FieldKind;
  readonly required: boolean;
  readonly itemKind?: FieldKind | undefined;
}

/**
 * How a pattern consumes a parameter:
 * - `key`: builds a partition or sort key
 * - `range`: compared against the sort key
 * - `filter`: referenced by a filter condition
 * - `body`: an entity instance
 * - `value`: an attribute written by an update
 */
export type ParameterRole = "key" | "range" | "filter" | "body" | "value";

export interface ResolvedParameter {
  readonly name: string;
  readonly kind: ParameterKind;
  readonly entityType?: string | undefined;
  readonly role: ParameterRole;
}

/** A compiled key together with the store attributes it fills. */
export interface ResolvedKey {
  /** One attribute name, or 1-4 for a multi-attribute index key. */
  readonly attributes: readonly string[];
  readonly compiled: CompiledKeyTemplate;
  /** Entity fields the key consumes, in order of first use. */
  readonly fields: readonly string[];
  /** Static text before the first placeholder; empty for multi-attribute keys. */
  readonly prefix: string;
  /** Single template that passes a numeric field through unchanged. */
  readonly numeric: boolean;
}

export interface ResolvedIndex {
  readonly name: string;
  readonly projection: ProjectionKind;
  readonly includedAttributes: readonly string[];
  readonly partitionKey: ResolvedKey;
  readonly sortKey?: ResolvedKey | undefined;
}

export type BindingSource =
  | { readonly kind: "parameter"; readonly name: string }
  | { readonly kind: "entity-field"; readonly parameter: string };

/** One key field and the argument that supplies it. */
export interface KeyBinding {
  readonly field: string;
  readonly source: BindingSource;
}

export interface KeyConstruction {
  readonly part: "partition" | "sort";
  readonly key: ResolvedKey;
  /** Leading attributes of the key that the bindings fix completely. */
  readonly attributeCount: number;
  readonly bindings: readonly KeyBinding[];
}

export type ValueSource =
  /** A built key attribute; `position` indexes multi-attribute keys. */
  | {
      readonly kind: "key";
      readonly part: "partition" | "sort";
      readonly position?: number | undefined;
    }
  /** A method argument, prefixed with static key text when non-empty. */
  | { readonly kind: "parameter"; readonly name: string; readonly prefix: string }
  /** A field read from an entity argument. */
  | {
      readonly kind: "entity-field";
      readonly parameter: string;
      readonly field: string;
    }
  | { readonly kind: "literal"; readonly value: string };

export interface ExpressionName {
  readonly alias: string;
  readonly attribute: string;
}

export interface ExpressionValue {
  readonly placeholder: string;
  readonly source: ValueSource;
}

/** A compiled expression with its `#name` and `:value` aliases in order of use. */
export interface ExpressionPlan {
  readonly expression: string;
  readonly names: readonly ExpressionName[];
  readonly values: readonly ExpressionValue[];
}

export type ResponseShape = "single" | "list" | "boolean" | "mixed" | "none";

export interface ProjectionDecision {
  readonly projection: ProjectionKind;
  /** `raw-map` when a required field is missing from the index. */
  readonly itemShape: "entity" | "raw-map";
  readonly blockingFields: readonly string[];
}

export interface ResolvedPattern {
  readonly id: number;
  /** Name as written in the schema. */
  readonly name: string;
  /** snake_case method name after CRUD conflict handling. */
  readonly methodName: string;
  readonly description: string;
  readonly entity: string;
  readonly table: string;
  readonly operation: AccessOperation;
  readonly returnShape: ReturnShape;
  readonly response: ResponseShape;
  readonly parameters: readonly ResolvedParameter[];
  readonly indexName?: string | undefined;
  readonly rangeCondition?: RangeCondition | undefined;
  readonly consistentRead: boolean;
  readonly keys: readonly KeyConstruction[];
  readonly keyCondition?: ExpressionPlan | undefined;
  readonly filter?: ExpressionPlan | undefined;
  readonly update?: ExpressionPlan | undefined;
  /** Entity argument written or read as a whole. */
  readonly bodyParameter?: string | undefined;
  readonly projection: ProjectionDecision;
  readonly paginated: boolean;
  /** The name clashed with a generated CRUD method and was changed. */
  readonly renamedFrom?: string | undefined;
}

export interface ResolvedCrud {
  readonly create: string;
  readonly get: string;
  readonly update: string;
  readonly delete: string;
  readonly getConsistentRead: boolean;
  /** Primary key fields as method parameters: partition fields, then sort fields. */
  readonly keyParameters: readonly ResolvedParameter[];
}

/** A user pattern served by a generated CRUD method. */
export interface FoldedPattern {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly operation: AccessOperation;
  readonly returnShape: ReturnShape;
  readonly parameters: readonly ResolvedParameter[];
  readonly consistentRead: boolean;
  /** snake_case name of the CRUD method. */
  readonly methodName: string;
}

export interface ResolvedEntity {
  readonly name: string;
  readonly entityType: string;
  readonly table: string;
  readonly fields: readonly ResolvedField[];
  readonly partitionKey: ResolvedKey;
  readonly sortKey?: ResolvedKey | undefined;
  readonly indexes: readonly ResolvedIndex[];
  /** Other entities of the same table sharing this partition key template. */
  readonly itemCollectionPeers: readonly string[];
  readonly crud: ResolvedCrud;
  readonly patterns: readonly ResolvedPattern[];
  readonly foldedPatterns: readonly FoldedPattern[];
}

export interface ResolvedTable {
  readonly name: string;
  readonly partitionKey: string;
  readonly sortKey?: string | undefined;
  readonly entities: readonly string[];
}

export interface ResolvedParticipant {
  readonly table: string;
  readonly entity: string;
  readonly action: TransactionAction;
  readonly condition?: string | undefined;
  readonly keys: readonly KeyConstruction[];
  /** Argument that supplies the whole item, for `Put`. */
  readonly bodyParameter?: string | undefined;
  readonly update?: ExpressionPlan | undefined;
}

export interface ResolvedTransaction {
  readonly id: number;
  readonly name: string;
  readonly methodName: string;
  readonly description: string;
  readonly operation: TransactionOperation;
  readonly returnShape: TransactionReturnShape;
  readonly parameters: readonly ResolvedParameter[];
  readonly participants: readonly ResolvedParticipant[];
}

export interface ResolvedModel {
  readonly tables: readonly ResolvedTable[];
  readonly entities: readonly ResolvedEntity[];
  readonly transactions: readonly ResolvedTransaction[];
}
