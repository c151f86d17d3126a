/**
 * Reconciles user access patterns with the CRUD methods every repository
 * gets.
 *
 * A pattern that repeats a CRUD method is folded into it; a pattern whose
 * name clashes with one but does something else is renamed.
 */

import type { AccessPatternDefinition, ParameterDefinition } from "../types/schema.js";
import { toSnakeCase } from "../utils/naming.js";

export interface CrudMethodNames {
  readonly create: string;
  readonly get: string;
  readonly update: string;
  readonly delete: string;
}

export const crudMethodNames = (entityName: string): CrudMethodNames => {
  const snake = toSnakeCase(entityName);
  return Object.freeze({
    create: `create_${snake}`,
    get: `get_${snake}`,
    update: `update_${snake}`,
    delete: `delete_${snake}`,
  });
};

/** A pattern kept after reconciliation, with its final method name. */
export interface ReconciledPattern {
  readonly pattern: AccessPatternDefinition;
  readonly methodName: string;
  readonly description: string;
  readonly renamedFrom?: string | undefined;
}

/** A pattern dropped because a CRUD method already does what it asks. */
export interface CrudFold {
  readonly pattern: AccessPatternDefinition;
  /** The CRUD method that serves it. */
  readonly methodName: string;
}

export interface Reconciliation {
  readonly patterns: readonly ReconciledPattern[];
  readonly folded: readonly CrudFold[];
  /** True when a folded `GetItem` asked for strongly consistent reads. */
  readonly getConsistentRead: boolean;
}

const signature = (params: readonly ParameterDefinition[]): string =>
  params.map((param) => param.kind).join(",");

/**
 * Parameter kinds each CRUD method takes: create and update take the entity,
 * get and delete take one text argument per key field.
 */
const crudSignature = (
  methodName: string,
  names: CrudMethodNames,
  keyFields: readonly string[],
): string => {
  if (methodName === names.create || methodName === names.update) return "entity";
  const count = Math.max(1, keyFields.length);
  return Array.from({ length: count }, () => "string").join(",");
};

const sameNames = (
  params: readonly ParameterDefinition[],
  keyFields: readonly string[],
): boolean => {
  const names = new Set(
    params.filter((param) => param.kind !== "entity").map((param) => param.name),
  );
  return names.size === new Set(keyFields).size && keyFields.every((field) => names.has(field));
};

/**
 * A pattern that does exactly what a CRUD method does: a `GetItem` or
 * `DeleteItem` over the primary key fields, or an `UpdateItem` taking only
 * the entity, whose name contains the CRUD method name.
 */
const equivalentCrudMethod = (
  pattern: AccessPatternDefinition,
  methodName: string,
  names: CrudMethodNames,
  keyFields: readonly string[],
): string | undefined => {
  switch (pattern.operation) {
    case "GetItem":
      return methodName.includes(names.get) && sameNames(pattern.parameters, keyFields)
        ? names.get
        : undefined;
    case "DeleteItem":
      return methodName.includes(names.delete) && sameNames(pattern.parameters, keyFields)
        ? names.delete
        : undefined;
    case "UpdateItem":
      return methodName.includes(names.update) &&
        pattern.parameters.length === 1 &&
        pattern.parameters[0]?.kind === "entity"
        ? names.update
        : undefined;
    default:
      return undefined;
  }
};

const suffixedName = (
  methodName: string,
  pattern: AccessPatternDefinition,
): string | undefined => {
  const entityParams = pattern.parameters.filter((param) => param.kind === "entity");
  if (entityParams.length > 1) return `${methodName}_with_refs`;
  if (pattern.operation === "Query" || pattern.operation === "Scan") {
    return `${methodName}_list`;
  }
  const others = pattern.parameters.filter((param) => param.kind !== "entity");
  if (others.length === 0) return undefined;
  const suffix = others
    .slice(0, 2)
    .map((param) => param.name)
    .join("_and_");
  return `${methodName}_with_${suffix}`;
};

/**
 * Builds a distinct name for a pattern whose name clashes with a CRUD
 * method but whose signature differs. A candidate already in `taken` falls
 * back to the pattern id, which is unique across the document.
 *
 * @example
 * ```ts
 * renameClashing("get_order", ordersByCustomer); // Query => "get_order_list"
 * renameClashing("get_order", orderByStatus);    // GetItem(status, day) => "get_order_with_status_and_day"
 * ```
 */
export const renameClashing = (
  methodName: string,
  pattern: AccessPatternDefinition,
  taken: ReadonlySet<string> = new Set(),
): string => {
  const fallback = `${methodName}_pattern_${pattern.id}`;
  const candidate = suffixedName(methodName, pattern);
  return candidate !== undefined && !taken.has(candidate) ? candidate : fallback;
};

const putName = (
  methodName: string,
  pattern: AccessPatternDefinition,
  taken: ReadonlySet<string>,
): string => {
  const candidate = methodName.startsWith("create_")
    ? `put_${methodName.slice("create_".length)}`
    : `put_${methodName}`;
  return taken.has(candidate) ? `${methodName}_pattern_${pattern.id}` : candidate;
};

const putDescription = (description: string): string =>
  description.toLowerCase().startsWith("create ")
    ? `Put (upsert) ${description.slice("create ".length)}`
    : description;

/**
 * Applies the CRUD rules to an entity's patterns, in declaration order.
 *
 * - `PutItem` patterns are always kept; a clashing name becomes `put_*`.
 * - Patterns equivalent to a CRUD method are dropped. A dropped `GetItem`
 *   passes its `consistent_read` on to the CRUD get.
 * - A clashing name with the CRUD signature is dropped the same way;
 *   with another signature it is renamed to a name no other method uses.
 *
 * @param keyFields - Primary key template fields, partition then sort.
 */
export const reconcileWithCrud = (
  entityName: string,
  patterns: readonly AccessPatternDefinition[],
  keyFields: readonly string[],
): Reconciliation => {
  const names = crudMethodNames(entityName);
  const reserved = new Set(Object.values(names));
  const taken = new Set<string>(reserved);
  for (const pattern of patterns) taken.add(toSnakeCase(pattern.name));
  const kept: ReconciledPattern[] = [];
  const folded: CrudFold[] = [];
  let getConsistentRead = false;

  const fold = (pattern: AccessPatternDefinition, crudMethod: string): void => {
    folded.push(Object.freeze({ pattern, methodName: crudMethod }));
    if (pattern.operation === "GetItem" && pattern.consistentRead === true) {
      getConsistentRead = true;
    }
  };

  for (const pattern of patterns) {
    const methodName = toSnakeCase(pattern.name);

    if (pattern.operation === "PutItem") {
      const renamed = reserved.has(methodName) ? putName(methodName, pattern, taken) : undefined;
      if (renamed !== undefined) taken.add(renamed);
      kept.push(
        renamed !== undefined
          ? Object.freeze({
              pattern,
              methodName: renamed,
              description: putDescription(pattern.description),
              renamedFrom: methodName,
            })
          : Object.freeze({ pattern, methodName, description: pattern.description }),
      );
      continue;
    }

    const equivalent = equivalentCrudMethod(pattern, methodName, names, keyFields);
    if (equivalent !== undefined) {
      fold(pattern, equivalent);
      continue;
    }

    if (!reserved.has(methodName)) {
      kept.push(Object.freeze({ pattern, methodName, description: pattern.description }));
      continue;
    }

    if (signature(pattern.parameters) === crudSignature(methodName, names, keyFields)) {
      fold(pattern, methodName);
      continue;
    }

    const renamed = renameClashing(methodName, pattern, taken);
    taken.add(renamed);
    kept.push(
      Object.freeze({
        pattern,
        methodName: renamed,
        description: pattern.description,
        renamedFrom: methodName,
      }),
    );
  }

  return Object.freeze({
    patterns: Object.freeze(kept),
    folded: Object.freeze(folded),
    getConsistentRead,
  });
};
