/**
 * Flat registry of every access pattern and the generated method serving it.
 */

import type {
  PatternRegistryEntry,
  RegistryParameter,
} from "../types/manifest.js";
import type {
  FoldedPattern,
  ResolvedEntity,
  ResolvedModel,
  ResolvedParameter,
  ResolvedPattern,
  ResolvedTransaction,
} from "../types/resolved.js";

/** Service name generated for cross-table transactions. */
export const TRANSACTION_SERVICE = "TransactionService";

export const repositoryName = (entityName: string): string => `${entityName}Repository`;

/** Converts a snake_case method name into the target naming convention. */
export type MethodNaming = (snakeName: string) => string;

const identity: MethodNaming = (name) => name;

const registryParameter = (param: ResolvedParameter): RegistryParameter =>
  Object.freeze({ name: param.name, type: param.kind, entity_type: param.entityType });

const patternEntry = (
  entity: ResolvedEntity,
  pattern: ResolvedPattern,
  naming: MethodNaming,
): PatternRegistryEntry =>
  Object.freeze({
    pattern_id: pattern.id,
    description: pattern.description,
    entity: entity.name,
    repository: repositoryName(entity.name),
    method_name: naming(pattern.methodName),
    parameters: Object.freeze(pattern.parameters.map(registryParameter)),
    return_type: pattern.returnShape,
    operation: pattern.operation,
    index: pattern.indexName,
    range_condition: pattern.rangeCondition,
    consistent_read: pattern.consistentRead ? true : undefined,
  });

const foldedEntry = (
  entity: ResolvedEntity,
  pattern: FoldedPattern,
  naming: MethodNaming,
): PatternRegistryEntry =>
  Object.freeze({
    pattern_id: pattern.id,
    description: pattern.description,
    entity: entity.name,
    repository: repositoryName(entity.name),
    method_name: naming(pattern.methodName),
    parameters: Object.freeze(pattern.parameters.map(registryParameter)),
    return_type: pattern.returnShape,
    operation: pattern.operation,
    consistent_read: pattern.consistentRead ? true : undefined,
    crud_method: true,
  });

const transactionEntry = (
  transaction: ResolvedTransaction,
  naming: MethodNaming,
): PatternRegistryEntry =>
  Object.freeze({
    pattern_id: transaction.id,
    description: transaction.description,
    service: TRANSACTION_SERVICE,
    entities_involved: Object.freeze(
      transaction.participants.map((participant) =>
        Object.freeze({
          table: participant.table,
          entity: participant.entity,
          action: participant.action,
        }),
      ),
    ),
    method_name: naming(transaction.methodName),
    parameters: Object.freeze(transaction.parameters.map(registryParameter)),
    return_type: transaction.returnShape,
    operation: transaction.operation,
    transaction_type: "cross_table" as const,
  });

/**
 * Lists every pattern of the model ordered by pattern id. Patterns folded
 * into a CRUD method point at that method.
 *
 * @example
 * ```ts
 * buildPatternRegistry(model, toCamelCase)[0];
 * // => { pattern_id: 1, entity: "User", repository: "UserRepository",
 * //      method_name: "getUser", operation: "GetItem", ... }
 * ```
 */
export const buildPatternRegistry = (
  model: ResolvedModel,
  naming: MethodNaming = identity,
): readonly PatternRegistryEntry[] => {
  const entries: PatternRegistryEntry[] = [];
  for (const entity of model.entities) {
    for (const pattern of entity.patterns) entries.push(patternEntry(entity, pattern, naming));
    for (const pattern of entity.foldedPatterns) {
      entries.push(foldedEntry(entity, pattern, naming));
    }
  }
  for (const transaction of model.transactions) {
    entries.push(transactionEntry(transaction, naming));
  }
  return Object.freeze(entries.sort((a, b) => a.pattern_id - b.pattern_id));
};
