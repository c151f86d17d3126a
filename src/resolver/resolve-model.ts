/**
 * Access pattern resolver: projects a validated schema document into the
 * {@link ResolvedModel} the renderers consume.
 *
 * The input must have passed validation without errors. Anything that
 * validation should have ruled out surfaces as a {@link ResolverInvariantError}.
 */

import { findIndex } from "../core/key-fields.js";
import {
  filterParameterNames,
  keySideParameters,
  rangeValueCount,
} from "../core/parameters.js";
import { projectionCoverage } from "../core/projection.js";
import {
  type FieldKindLookup,
  compileKeyTemplate,
  compiledKeyFields,
  fieldKindLookup,
  keyAttributeCount,
} from "../keys/key-template.js";
import { templatePrefix } from "../keys/template-parser.js";
import {
  READ_OPERATIONS,
  isAccessOperation,
  isFieldKind,
  isFilterFunction,
  isFilterOperator,
  isLogicalOperator,
  isParameterKind,
  isProjectionKind,
  isRangeCondition,
  isReturnShape,
  isTransactionAction,
  isTransactionOperation,
  isTransactionReturnShape,
  type AccessOperation,
  type ReturnShape,
} from "../types/enums.js";
import type {
  ExpressionPlan,
  FoldedPattern,
  KeyBinding,
  KeyConstruction,
  ParameterRole,
  ProjectionDecision,
  ResolvedEntity,
  ResolvedField,
  ResolvedIndex,
  ResolvedKey,
  ResolvedModel,
  ResolvedParameter,
  ResolvedParticipant,
  ResolvedPattern,
  ResolvedTable,
  ResolvedTransaction,
  ResponseShape,
} from "../types/resolved.js";
import type {
  AccessPatternDefinition,
  CrossTablePatternDefinition,
  EntityDefinition,
  KeyTemplateDefinition,
  ParameterDefinition,
  SchemaDocument,
  TableDefinition,
} from "../types/schema.js";
import { keyAttributeNames } from "../types/schema.js";
import { toSnakeCase } from "../utils/naming.js";
import { type ReconciledPattern, crudMethodNames, reconcileWithCrud } from "./crud.js";
import { ResolverInvariantError, narrow } from "./errors.js";
import {
  type FilterClause,
  type RangeComparison,
  type UpdateAssignment,
  compileFilter,
  compileKeyCondition,
  compileUpdate,
} from "./expressions.js";

// --- keys -------------------------------------------------------------------

const resolveKey = (
  definition: KeyTemplateDefinition,
  attributes: readonly string[],
  kindOf: FieldKindLookup,
  path: string,
): ResolvedKey => {
  const compiled = compileKeyTemplate(definition, kindOf);
  const count = keyAttributeCount(compiled);
  if (count !== attributes.length) {
    throw new ResolverInvariantError(
      path,
      `key template fills ${count} attribute(s) but the key declares ${attributes.length}`,
    );
  }
  return Object.freeze({
    attributes: Object.freeze([...attributes]),
    compiled,
    fields: compiledKeyFields(compiled),
    prefix: compiled.form === "single" ? templatePrefix(compiled.template) : "",
    numeric: compiled.form === "single" && compiled.passthrough,
  });
};

/** Static text of the sort key attribute a range comparison targets. */
const rangePrefix = (key: ResolvedKey, position: number): string => {
  if (key.compiled.form === "single") return key.numeric ? "" : key.prefix;
  const part = key.compiled.parts[position];
  if (part === undefined || part.passthrough) return "";
  return templatePrefix(part.template);
};

/**
 * Number of leading key attributes whose fields are all in `bound`. With
 * `fieldsOnly`, an attribute made of literal text alone ends the run.
 */
const boundAttributeCount = (
  key: ResolvedKey,
  bound: ReadonlySet<string>,
  fieldsOnly: boolean,
): number => {
  const parts = key.compiled.form === "single" ? [key.compiled] : key.compiled.parts;
  let count = 0;
  for (const part of parts) {
    if (fieldsOnly && part.template.fields.length === 0) break;
    if (!part.template.fields.every((field) => bound.has(field))) break;
    count += 1;
  }
  return count;
};

const bodyConstruction = (
  part: "partition" | "sort",
  key: ResolvedKey,
  parameter: string,
): KeyConstruction =>
  Object.freeze({
    part,
    key,
    attributeCount: key.attributes.length,
    bindings: Object.freeze(
      key.fields.map((field) =>
        Object.freeze({
          field,
          source: Object.freeze({ kind: "entity-field" as const, parameter }),
        }),
      ),
    ),
  });

interface ConstructionOptions {
  /** Upper bound on the attributes fixed by equality. */
  readonly limit?: number | undefined;
  readonly fieldsOnly?: boolean | undefined;
}

const parameterConstruction = (
  part: "partition" | "sort",
  key: ResolvedKey,
  assigned: ReadonlyMap<string, string>,
  options: ConstructionOptions = {},
): KeyConstruction => {
  const attributeCount = Math.min(
    boundAttributeCount(key, new Set(assigned.keys()), options.fieldsOnly ?? false),
    options.limit ?? key.attributes.length,
  );
  const parts = key.compiled.form === "single" ? [key.compiled] : key.compiled.parts;
  const usedFields = new Set(
    parts.slice(0, attributeCount).flatMap((template) => template.template.fields),
  );
  const bindings: KeyBinding[] = [];
  for (const field of key.fields) {
    const name = assigned.get(field);
    if (name === undefined || !usedFields.has(field)) continue;
    bindings.push(
      Object.freeze({ field, source: Object.freeze({ kind: "parameter" as const, name }) }),
    );
  }
  return Object.freeze({ part, key, attributeCount, bindings: Object.freeze(bindings) });
};

/**
 * Assigns parameters to key fields: a parameter named after a field takes
 * it, then the remaining fields take the remaining parameters in
 * declaration order.
 *
 * @param excluded - Parameter names that never bind by position.
 */
const assignKeyFields = (
  fields: readonly string[],
  candidates: readonly ParameterDefinition[],
  excluded: ReadonlySet<string>,
): ReadonlyMap<string, string> => {
  const assigned = new Map<string, string>();
  const used = new Set<string>();

  for (const field of fields) {
    const match = candidates.find((candidate) => candidate.name === field);
    if (match !== undefined && !used.has(match.name)) {
      assigned.set(field, match.name);
      used.add(match.name);
    }
  }

  const positional = candidates.filter(
    (candidate) => !used.has(candidate.name) && !excluded.has(candidate.name),
  );
  let next = 0;
  for (const field of fields) {
    if (assigned.has(field)) continue;
    const candidate = positional[next];
    if (candidate === undefined) break;
    assigned.set(field, candidate.name);
    used.add(candidate.name);
    next += 1;
  }
  return assigned;
};

const requireComplete = (construction: KeyConstruction, path: string): void => {
  if (construction.attributeCount !== construction.key.attributes.length) {
    const bound = new Set(construction.bindings.map((binding) => binding.field));
    const missing = construction.key.fields.filter((field) => !bound.has(field));
    throw new ResolverInvariantError(
      path,
      `no parameter supplies ${construction.part} key field(s) ${missing.join(", ")}`,
    );
  }
};

// --- entities ---------------------------------------------------------------

interface EntityContext {
  readonly table: TableDefinition;
  readonly entity: EntityDefinition;
  readonly path: string;
  readonly kindOf: FieldKindLookup;
  readonly fields: readonly ResolvedField[];
  readonly partitionKey: ResolvedKey;
  readonly sortKey?: ResolvedKey | undefined;
  readonly indexes: readonly ResolvedIndex[];
  /** Primary key fields, partition then sort. */
  readonly keyFields: readonly string[];
}

const resolveField = (
  entity: EntityDefinition,
  index: number,
  path: string,
): ResolvedField => {
  const field = entity.fields[index];
  if (field === undefined) throw new ResolverInvariantError(path, "missing field");
  const kind = narrow(field.kind, isFieldKind, `${path}.type`);
  return Object.freeze({
    name: field.name,
    kind,
    required: field.required,
    itemKind:
      field.itemKind === undefined
        ? undefined
        : narrow(field.itemKind, isFieldKind, `${path}.item_type`),
  });
};

const resolveIndexes = (
  table: TableDefinition,
  entity: EntityDefinition,
  kindOf: FieldKindLookup,
  path: string,
): readonly ResolvedIndex[] =>
  entity.indexMappings.map((mapping, position) => {
    const mappingPath = `${path}.gsi_mappings[${position}]`;
    const index = findIndex(table, mapping.indexName);
    if (index === undefined) {
      throw new ResolverInvariantError(mappingPath, `unknown index '${mapping.indexName}'`);
    }
    return Object.freeze({
      name: index.name,
      projection: narrow(index.projection, isProjectionKind, `${mappingPath}.projection`),
      includedAttributes: Object.freeze([...(index.includedAttributes ?? [])]),
      partitionKey: resolveKey(
        mapping.pkTemplate,
        keyAttributeNames(index.partitionKey),
        kindOf,
        `${mappingPath}.pk_template`,
      ),
      sortKey:
        index.sortKey !== undefined && mapping.skTemplate !== undefined
          ? resolveKey(
              mapping.skTemplate,
              keyAttributeNames(index.sortKey),
              kindOf,
              `${mappingPath}.sk_template`,
            )
          : undefined,
    });
  });

const createEntityContext = (
  table: TableDefinition,
  tableIndex: number,
  entity: EntityDefinition,
): EntityContext => {
  const path = `tables[${tableIndex}].entities.${entity.name}`;
  const kindOf = fieldKindLookup(entity.fields);
  const partitionKey = resolveKey(
    entity.pkTemplate,
    [table.partitionKey],
    kindOf,
    `${path}.pk_template`,
  );

  if ((table.sortKey === undefined) !== (entity.skTemplate === undefined)) {
    throw new ResolverInvariantError(
      `${path}.sk_template`,
      "sort key template does not match the table's sort key",
    );
  }
  const sortKey =
    table.sortKey !== undefined && entity.skTemplate !== undefined
      ? resolveKey(entity.skTemplate, [table.sortKey], kindOf, `${path}.sk_template`)
      : undefined;

  return Object.freeze({
    table,
    entity,
    path,
    kindOf,
    fields: Object.freeze(
      entity.fields.map((_, index) => resolveField(entity, index, `${path}.fields[${index}]`)),
    ),
    partitionKey,
    sortKey,
    indexes: resolveIndexes(table, entity, kindOf, path),
    keyFields: Object.freeze([
      ...new Set([...partitionKey.fields, ...(sortKey?.fields ?? [])]),
    ]),
  });
};

const resolveParameter = (
  param: ParameterDefinition,
  role: ParameterRole,
  path: string,
): ResolvedParameter =>
  Object.freeze({
    name: param.name,
    kind: narrow(param.kind, isParameterKind, `${path}.type`),
    entityType: param.entityType,
    role,
  });

const RESPONSES: Readonly<Record<ReturnShape, ResponseShape>> = {
  single_entity: "single",
  entity_list: "list",
  success_flag: "boolean",
  mixed_data: "mixed",
  void: "none",
};

const MAIN_TABLE_PROJECTION: ProjectionDecision = Object.freeze({
  projection: "ALL",
  itemShape: "entity",
  blockingFields: Object.freeze([]),
});

const projectionDecision = (
  context: EntityContext,
  indexName: string | undefined,
): ProjectionDecision => {
  if (indexName === undefined) return MAIN_TABLE_PROJECTION;
  const index = findIndex(context.table, indexName);
  if (index === undefined) return MAIN_TABLE_PROJECTION;

  const coverage = projectionCoverage(context.table, index, context.entity);
  const itemShape =
    coverage.projection === "KEYS_ONLY" || !coverage.typedEntity ? "raw-map" : "entity";
  return Object.freeze({
    projection: coverage.projection,
    itemShape,
    blockingFields: coverage.missingRequiredFields,
  });
};

const resolveFilterPlan = (
  pattern: AccessPatternDefinition,
  path: string,
): ExpressionPlan | undefined => {
  const filter = pattern.filter;
  if (filter === undefined) return undefined;

  const clauses: FilterClause[] = filter.conditions.map((condition, position) => {
    const conditionPath = `${path}.filter_expression.conditions[${position}]`;
    return Object.freeze({
      field: condition.field,
      operator:
        condition.operator === undefined
          ? undefined
          : narrow(condition.operator, isFilterOperator, `${conditionPath}.operator`),
      function:
        condition.function === undefined
          ? undefined
          : narrow(condition.function, isFilterFunction, `${conditionPath}.function`),
      param: condition.param,
      param2: condition.param2,
      params: condition.params,
    });
  });
  const logical = narrow(
    filter.logicalOperator ?? "AND",
    isLogicalOperator,
    `${path}.filter_expression.logical_operator`,
  );
  return compileFilter(clauses, logical);
};

const needsKeys = (operation: AccessOperation): boolean =>
  operation !== "Scan" && operation !== "BatchGetItem" && operation !== "BatchWriteItem";

const resolvePattern = (
  context: EntityContext,
  reconciled: ReconciledPattern,
  peers: readonly string[],
): ResolvedPattern => {
  const { pattern } = reconciled;
  const { entity } = context;
  const path = `${context.path}.access_patterns[${entity.accessPatterns.indexOf(pattern)}]`;

  const operation = narrow(pattern.operation, isAccessOperation, `${path}.operation`);
  const returnShape = narrow(pattern.returnShape, isReturnShape, `${path}.return_type`);
  const rangeCondition =
    pattern.rangeCondition === undefined
      ? undefined
      : narrow(pattern.rangeCondition, isRangeCondition, `${path}.range_condition`);
  const response = RESPONSES[returnShape];

  const body = pattern.parameters.find(
    (param) => param.kind === "entity" && param.entityType === entity.name,
  );
  const filterNames = filterParameterNames(pattern.filter);
  const keySide = keySideParameters(pattern);
  const rangeCount =
    rangeCondition !== undefined && operation === "Query" ? rangeValueCount(rangeCondition) : 0;
  const rangeParams = keySide.slice(keySide.length - rangeCount);
  const equalityParams = keySide.slice(0, keySide.length - rangeCount);
  const rangeNames = new Set(rangeCount > 0 ? rangeParams.map((param) => param.name) : []);

  const index =
    pattern.indexName === undefined
      ? undefined
      : context.indexes.find((candidate) => candidate.name === pattern.indexName);
  if (pattern.indexName !== undefined && index === undefined) {
    throw new ResolverInvariantError(
      `${path}.index_name`,
      `entity '${entity.name}' has no mapping for index '${pattern.indexName}'`,
    );
  }
  const targetPartition = index?.partitionKey ?? context.partitionKey;
  const targetSort = index !== undefined ? index.sortKey : context.sortKey;

  const keys: KeyConstruction[] = [];
  const boundNames = new Set<string>();
  let keyCondition: ExpressionPlan | undefined;
  let update: ExpressionPlan | undefined;

  const writesBody =
    body !== undefined && (operation === "PutItem" || operation === "UpdateItem");

  if (writesBody) {
    keys.push(bodyConstruction("partition", context.partitionKey, body.name));
    if (context.sortKey !== undefined) {
      keys.push(bodyConstruction("sort", context.sortKey, body.name));
    }
  } else if (needsKeys(operation)) {
    const valueNames =
      operation === "UpdateItem"
        ? new Set(
            entity.fields
              .map((field) => field.name)
              .filter((name) => !context.keyFields.includes(name)),
          )
        : new Set<string>();
    const fields = [...new Set([...targetPartition.fields, ...(targetSort?.fields ?? [])])];
    const assigned = assignKeyFields(fields, equalityParams, valueNames);

    const partition = parameterConstruction("partition", targetPartition, assigned);
    requireComplete(partition, `${path}.parameters`);
    keys.push(partition);

    if (targetSort !== undefined) {
      // a Query fixes only the attributes its arguments name; the range
      // comparison takes the first one left open
      const sort =
        operation === "Query"
          ? parameterConstruction("sort", targetSort, assigned, {
              fieldsOnly: true,
              limit: rangeCount > 0 ? targetSort.attributes.length - 1 : undefined,
            })
          : parameterConstruction("sort", targetSort, assigned);
      if (operation !== "Query") requireComplete(sort, `${path}.parameters`);
      keys.push(sort);
    }

    for (const construction of keys) {
      for (const binding of construction.bindings) {
        if (binding.source.kind === "parameter") boundNames.add(binding.source.name);
      }
    }

    if (operation === "Query") {
      if (rangeCondition !== undefined && targetSort === undefined) {
        throw new ResolverInvariantError(
          `${path}.range_condition`,
          `range condition '${rangeCondition}' has no sort key template to compare against`,
        );
      }
      const sortEqualityCount =
        keys.find((construction) => construction.part === "sort")?.attributeCount ?? 0;
      const range: RangeComparison | undefined =
        rangeCondition !== undefined && targetSort !== undefined
          ? Object.freeze({
              condition: rangeCondition,
              parameters: rangeParams.map((param) => param.name),
              prefix: rangePrefix(targetSort, sortEqualityCount),
            })
          : undefined;
      const collectionPrefix =
        index === undefined &&
        peers.length > 0 &&
        (response === "list" || response === "single")
          ? targetSort?.prefix
          : undefined;
      keyCondition = compileKeyCondition({
        partitionKey: targetPartition,
        sortKey: targetSort,
        sortEqualityCount,
        range,
        sortPrefix: collectionPrefix,
      });
    }

    if (operation === "UpdateItem") {
      const assignments: UpdateAssignment[] = pattern.parameters
        .filter(
          (param) =>
            param.kind !== "entity" &&
            !boundNames.has(param.name) &&
            !filterNames.has(param.name),
        )
        .map((param) =>
          Object.freeze({
            attribute: param.name,
            source: Object.freeze({ kind: "parameter" as const, name: param.name, prefix: "" }),
          }),
        );
      if (assignments.length > 0) update = compileUpdate(assignments);
    }
  }

  const roleOf = (param: ParameterDefinition): ParameterRole => {
    if (param.kind === "entity") return "body";
    if (filterNames.has(param.name)) return "filter";
    if (rangeNames.has(param.name)) return "range";
    if (boundNames.has(param.name)) return "key";
    return "value";
  };

  const paginated =
    (operation === "Query" || operation === "Scan") &&
    (response === "list" || response === "mixed");

  return Object.freeze({
    id: pattern.id,
    name: pattern.name,
    methodName: reconciled.methodName,
    description: reconciled.description,
    entity: entity.name,
    table: context.table.name,
    operation,
    returnShape,
    response,
    parameters: Object.freeze(
      pattern.parameters.map((param, position) =>
        resolveParameter(param, roleOf(param), `${path}.parameters[${position}]`),
      ),
    ),
    indexName: pattern.indexName,
    rangeCondition: operation === "Query" ? rangeCondition : undefined,
    consistentRead:
      pattern.consistentRead === true &&
      READ_OPERATIONS.has(operation) &&
      pattern.indexName === undefined,
    keys: Object.freeze(keys),
    keyCondition,
    filter: resolveFilterPlan(pattern, path),
    update,
    bodyParameter: body?.name,
    projection: projectionDecision(context, pattern.indexName),
    paginated,
    renamedFrom: reconciled.renamedFrom,
  });
};

const resolveFolded = (
  context: EntityContext,
  pattern: AccessPatternDefinition,
  methodName: string,
): FoldedPattern => {
  const path = `${context.path}.access_patterns[${context.entity.accessPatterns.indexOf(pattern)}]`;
  const operation = narrow(pattern.operation, isAccessOperation, `${path}.operation`);
  return Object.freeze({
    id: pattern.id,
    name: pattern.name,
    description: pattern.description,
    operation,
    returnShape: narrow(pattern.returnShape, isReturnShape, `${path}.return_type`),
    parameters: Object.freeze(
      pattern.parameters.map((param, position) =>
        resolveParameter(
          param,
          param.kind === "entity" ? "body" : "key",
          `${path}.parameters[${position}]`,
        ),
      ),
    ),
    consistentRead: pattern.consistentRead === true && READ_OPERATIONS.has(operation),
    methodName,
  });
};

const resolveEntity = (
  context: EntityContext,
  peers: readonly string[],
): ResolvedEntity => {
  const { entity } = context;
  const reconciliation = reconcileWithCrud(entity.name, entity.accessPatterns, context.keyFields);
  const names = crudMethodNames(entity.name);

  const keyParameters = context.keyFields.map((field) => {
    const kind = context.kindOf(field) ?? "string";
    return Object.freeze({
      name: field,
      kind: narrow(kind, isParameterKind, `${context.path}.fields`),
      role: "key" as const,
    });
  });

  return Object.freeze({
    name: entity.name,
    entityType: entity.entityType,
    table: context.table.name,
    fields: context.fields,
    partitionKey: context.partitionKey,
    sortKey: context.sortKey,
    indexes: context.indexes,
    itemCollectionPeers: peers,
    crud: Object.freeze({
      ...names,
      getConsistentRead: reconciliation.getConsistentRead,
      keyParameters: Object.freeze(keyParameters),
    }),
    patterns: Object.freeze(
      reconciliation.patterns.map((reconciled) => resolvePattern(context, reconciled, peers)),
    ),
    foldedPatterns: Object.freeze(
      reconciliation.folded.map(({ pattern, methodName }) =>
        resolveFolded(context, pattern, methodName),
      ),
    ),
  });
};

/** Entities of the same table that share a partition key template. */
export const itemCollectionPeers = (
  table: TableDefinition,
  entity: EntityDefinition,
): readonly string[] =>
  Object.freeze(
    table.entities
      .filter((other) => other.name !== entity.name && other.pkTemplate === entity.pkTemplate)
      .map((other) => other.name),
  );

// --- transactions -----------------------------------------------------------

const resolveParticipant = (
  transaction: CrossTablePatternDefinition,
  position: number,
  contexts: ReadonlyMap<string, EntityContext>,
  path: string,
): ResolvedParticipant => {
  const participant = transaction.participants[position];
  const participantPath = `${path}.entities_involved[${position}]`;
  if (participant === undefined) {
    throw new ResolverInvariantError(participantPath, "missing participant");
  }
  const context = contexts.get(participant.entity);
  if (context === undefined) {
    throw new ResolverInvariantError(
      `${participantPath}.entity`,
      `unknown entity '${participant.entity}'`,
    );
  }
  const action = narrow(participant.action, isTransactionAction, `${participantPath}.action`);
  const body = transaction.parameters.find(
    (param) => param.kind === "entity" && param.entityType === participant.entity,
  );

  const keys: KeyConstruction[] = [];
  if (body !== undefined) {
    keys.push(bodyConstruction("partition", context.partitionKey, body.name));
    if (context.sortKey !== undefined) {
      keys.push(bodyConstruction("sort", context.sortKey, body.name));
    }
  } else {
    const byName = new Map(
      transaction.parameters
        .filter((param) => context.keyFields.includes(param.name))
        .map((param) => [param.name, param.name]),
    );
    const partition = parameterConstruction("partition", context.partitionKey, byName);
    requireComplete(partition, participantPath);
    keys.push(partition);
    if (context.sortKey !== undefined) {
      const sort = parameterConstruction("sort", context.sortKey, byName);
      requireComplete(sort, participantPath);
      keys.push(sort);
    }
  }

  let update: ExpressionPlan | undefined;
  if (action === "Update") {
    const nonKeyFields = context.entity.fields
      .map((field) => field.name)
      .filter((name) => !context.keyFields.includes(name));
    const assignments: UpdateAssignment[] =
      body !== undefined
        ? nonKeyFields.map((field) =>
            Object.freeze({
              attribute: field,
              source: Object.freeze({
                kind: "entity-field" as const,
                parameter: body.name,
                field,
              }),
            }),
          )
        : transaction.parameters
            .filter((param) => nonKeyFields.includes(param.name))
            .map((param) =>
              Object.freeze({
                attribute: param.name,
                source: Object.freeze({
                  kind: "parameter" as const,
                  name: param.name,
                  prefix: "",
                }),
              }),
            );
    if (assignments.length > 0) update = compileUpdate(assignments);
  }

  return Object.freeze({
    table: context.table.name,
    entity: context.entity.name,
    action,
    condition: participant.condition,
    keys: Object.freeze(keys),
    bodyParameter: action === "Put" ? body?.name : undefined,
    update,
  });
};

const resolveTransaction = (
  transaction: CrossTablePatternDefinition,
  position: number,
  contexts: ReadonlyMap<string, EntityContext>,
): ResolvedTransaction => {
  const path = `cross_table_access_patterns[${position}]`;
  const participants = transaction.participants.map((_, index) =>
    resolveParticipant(transaction, index, contexts, path),
  );
  const keyNames = new Set(
    participants.flatMap((participant) =>
      participant.keys.flatMap((construction) =>
        construction.bindings.flatMap((binding) =>
          binding.source.kind === "parameter" ? [binding.source.name] : [],
        ),
      ),
    ),
  );

  return Object.freeze({
    id: transaction.id,
    name: transaction.name,
    methodName: toSnakeCase(transaction.name),
    description: transaction.description,
    operation: narrow(transaction.operation, isTransactionOperation, `${path}.operation`),
    returnShape: narrow(
      transaction.returnShape,
      isTransactionReturnShape,
      `${path}.return_type`,
    ),
    parameters: Object.freeze(
      transaction.parameters.map((param, index) =>
        resolveParameter(
          param,
          param.kind === "entity" ? "body" : keyNames.has(param.name) ? "key" : "value",
          `${path}.parameters[${index}]`,
        ),
      ),
    ),
    participants: Object.freeze(participants),
  });
};

// --- model ------------------------------------------------------------------

/**
 * Resolves a validated document.
 *
 * @throws {ResolverInvariantError} when the document breaks a rule that
 *   validation enforces
 */
export const resolveModel = (document: SchemaDocument): ResolvedModel => {
  const contexts = new Map<string, EntityContext>();
  const entities: ResolvedEntity[] = [];
  const tables: ResolvedTable[] = [];

  document.tables.forEach((table, tableIndex) => {
    for (const entity of table.entities) {
      const context = createEntityContext(table, tableIndex, entity);
      contexts.set(entity.name, context);
      entities.push(resolveEntity(context, itemCollectionPeers(table, entity)));
    }
    tables.push(
      Object.freeze({
        name: table.name,
        partitionKey: table.partitionKey,
        sortKey: table.sortKey,
        entities: Object.freeze(table.entities.map((entity) => entity.name)),
      }),
    );
  });

  const transactions = document.crossTablePatterns.map((transaction, position) =>
    resolveTransaction(transaction, position, contexts),
  );

  return Object.freeze({
    tables: Object.freeze(tables),
    entities: Object.freeze(entities),
    transactions: Object.freeze(transactions),
  });
};
