/**
 * Normalized in-memory schema document.
 *
 * Produced by the loader from the snake_case wire format. Values drawn from a
 * closed set (kinds, operations, projections, ...) are kept as the raw strings
 * the author wrote; the validator checks membership and the resolver narrows
 * them into the unions from `enums.ts`.
 */

/** A key template as written: one template string, or 1-4 for multi-attribute keys. */
export type KeyTemplateDefinition = string | readonly string[];

export interface FieldDefinition {
  readonly name: string;
  readonly kind: string;
  readonly required: boolean;
  readonly itemKind?: string | undefined;
}

export interface ParameterDefinition {
  readonly name: string;
  readonly kind: string;
  readonly entityType?: string | undefined;
}

export interface FilterConditionDefinition {
  readonly field: string;
  readonly operator?: string | undefined;
  readonly function?: string | undefined;
  readonly param?: string | undefined;
  readonly param2?: string | undefined;
  readonly params?: readonly string[] | undefined;
}

export interface FilterExpressionDefinition {
  readonly conditions: readonly FilterConditionDefinition[];
  readonly logicalOperator?: string | undefined;
}

export interface AccessPatternDefinition {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly operation: string;
  readonly parameters: readonly ParameterDefinition[];
  readonly returnShape: string;
  readonly indexName?: string | undefined;
  readonly rangeCondition?: string | undefined;
  readonly consistentRead?: boolean | undefined;
  readonly filter?: FilterExpressionDefinition | undefined;
}

/** Keys an entity contributes to one secondary index. */
export interface IndexKeyMapping {
  readonly indexName: string;
  readonly pkTemplate: KeyTemplateDefinition;
  readonly skTemplate?: KeyTemplateDefinition | undefined;
}

export interface EntityDefinition {
  readonly name: string;
  readonly entityType: string;
  readonly pkTemplate: string;
  readonly skTemplate?: string | undefined;
  readonly indexMappings: readonly IndexKeyMapping[];
  readonly fields: readonly FieldDefinition[];
  readonly accessPatterns: readonly AccessPatternDefinition[];
}

export interface IndexDefinition {
  readonly name: string;
  readonly partitionKey: KeyTemplateDefinition;
  readonly sortKey?: KeyTemplateDefinition | undefined;
  readonly projection: string;
  readonly includedAttributes?: readonly string[] | undefined;
}

export interface TableDefinition {
  readonly name: string;
  readonly partitionKey: string;
  readonly sortKey?: string | undefined;
  readonly indexes: readonly IndexDefinition[];
  readonly entities: readonly EntityDefinition[];
}

export interface TransactionParticipantDefinition {
  readonly table: string;
  readonly entity: string;
  readonly action: string;
  readonly condition?: string | undefined;
}

export interface CrossTablePatternDefinition {
  readonly id: number;
  readonly name: string;
  readonly description: string;
  readonly operation: string;
  readonly participants: readonly TransactionParticipantDefinition[];
  readonly parameters: readonly ParameterDefinition[];
  readonly returnShape: string;
}

export interface SchemaDocument {
  readonly tables: readonly TableDefinition[];
  readonly crossTablePatterns: readonly CrossTablePatternDefinition[];
}

/** Illustrative values for one entity, keyed by section then field name. */
export interface UsageEntityData {
  readonly entity: string;
  readonly sections: Readonly<Record<string, Readonly<Record<string, unknown>>>>;
}

export interface UsageDataDocument {
  /** Every top-level key of the usage document, including unknown ones. */
  readonly topLevelKeys: readonly string[];
  readonly entities: readonly UsageEntityData[];
}

/** Section names of a usage-data entity entry. */
export const USAGE_SECTIONS = [
  "sample_data",
  "access_pattern_data",
  "update_data",
] as const;
export type UsageSection = (typeof USAGE_SECTIONS)[number];

export const EMPTY_DOCUMENT: SchemaDocument = Object.freeze({
  tables: Object.freeze([]),
  crossTablePatterns: Object.freeze([]),
});

/** Lists the attribute names of a key definition, flattening multi-attribute arrays. */
export const keyAttributeNames = (
  key: KeyTemplateDefinition | undefined,
): readonly string[] => {
  if (key === undefined) return [];
  return typeof key === "string" ? [key] : key;
};
