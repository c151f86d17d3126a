/**
 * Cross-table transaction rules.
 */

import type { EntityEntry, SchemaCatalog } from "../../core/catalog.js";
import { templateFieldNames } from "../../core/key-fields.js";
import {
  MAX_TRANSACTION_PARTICIPANTS,
  TRANSACTION_ACTION_NAMES,
  TRANSACTION_OPERATIONS,
  TRANSACTION_RETURN_SHAPES,
  isTransactionAction,
  isTransactionOperation,
  isTransactionReturnShape,
  transactionActionsFor,
} from "../../types/enums.js";
import type {
  CrossTablePatternDefinition,
  EntityDefinition,
  TransactionParticipantDefinition,
} from "../../types/schema.js";
import type { DiagnosticSink } from "../diagnostics.js";
import { joinPath } from "../diagnostics.js";
import { checkParameters } from "./parameters.js";

/**
 * Every participant must be able to build its primary key from the
 * transaction's arguments: a `Put` from an entity parameter of its type, the
 * other actions from such a parameter or from parameters named after each
 * key field.
 */
const checkParticipantKeys = (
  pattern: CrossTablePatternDefinition,
  participant: TransactionParticipantDefinition,
  entity: EntityDefinition,
  path: string,
  sink: DiagnosticSink,
): void => {
  const hasEntityParam = pattern.parameters.some(
    (param) => param.kind === "entity" && param.entityType === entity.name,
  );
  if (hasEntityParam) return;

  if (participant.action === "Put") {
    sink.consistency(
      `${path}.action`,
      `Transaction '${pattern.name}' puts '${entity.name}' but declares no entity parameter with entity_type '${entity.name}'`,
    );
    return;
  }

  const names = new Set(pattern.parameters.map((param) => param.name));
  const missing = [
    ...templateFieldNames(entity.pkTemplate),
    ...templateFieldNames(entity.skTemplate),
  ].filter((field) => !names.has(field));
  if (missing.length > 0) {
    sink.consistency(
      `${path}.entity`,
      `Transaction '${pattern.name}' cannot build the key of '${entity.name}': no parameter named ${missing.map((field) => `'${field}'`).join(", ")} and no entity parameter of that type`,
    );
  }
};

const checkParticipants = (
  pattern: CrossTablePatternDefinition,
  path: string,
  catalog: SchemaCatalog,
  sink: DiagnosticSink,
): void => {
  const operation = isTransactionOperation(pattern.operation)
    ? pattern.operation
    : undefined;

  if (pattern.participants.length > MAX_TRANSACTION_PARTICIPANTS) {
    sink.cardinality(
      `${path}.entities_involved`,
      `Transaction '${pattern.name}' has ${pattern.participants.length} participants; at most ${MAX_TRANSACTION_PARTICIPANTS} are allowed`,
    );
  }

  pattern.participants.forEach((participant, position) => {
    const participantPath = joinPath(`${path}.entities_involved`, position);
    const tableEntry = catalog.findTable(participant.table);
    const entityEntry = catalog.findEntity(participant.entity);

    if (tableEntry === undefined) {
      sink.reference(
        `${participantPath}.table`,
        `Transaction '${pattern.name}' references unknown table '${participant.table}'`,
        participant.table,
        catalog.tableNames,
      );
    }
    if (entityEntry === undefined) {
      sink.reference(
        `${participantPath}.entity`,
        `Transaction '${pattern.name}' references unknown entity '${participant.entity}'`,
        participant.entity,
        catalog.entityNames,
      );
    } else if (
      tableEntry !== undefined &&
      entityEntry.table.name !== tableEntry.table.name
    ) {
      sink.reference(
        `${participantPath}.entity`,
        `Entity '${participant.entity}' belongs to table '${entityEntry.table.name}', not '${participant.table}'`,
        participant.entity,
        tableEntry.table.entities.map((entity) => entity.name),
      );
    }

    if (!isTransactionAction(participant.action)) {
      sink.enumViolation(
        `${participantPath}.action`,
        "transaction action",
        participant.action,
        TRANSACTION_ACTION_NAMES,
      );
    } else if (operation !== undefined) {
      const allowed = transactionActionsFor(operation);
      if (!allowed.some((action) => action === participant.action)) {
        sink.consistency(
          `${participantPath}.action`,
          `Action '${participant.action}' is not allowed in ${operation}; allowed actions: ${allowed.join(", ")}`,
        );
      }
    }
    if (entityEntry !== undefined && isTransactionAction(participant.action)) {
      checkParticipantKeys(
        pattern,
        participant,
        entityEntry.entity,
        participantPath,
        sink,
      );
    }
    if (participant.action === "ConditionCheck" && participant.condition === undefined) {
      sink.structural(
        `${participantPath}.condition`,
        "ConditionCheck participants require a condition",
      );
    }
  });
};

/**
 * A parameter that shares its name with a field of a participating entity
 * must share its kind too.
 */
const checkParameterKinds = (
  pattern: CrossTablePatternDefinition,
  path: string,
  catalog: SchemaCatalog,
  sink: DiagnosticSink,
): void => {
  const participants = pattern.participants
    .map((participant) => catalog.findEntity(participant.entity))
    .filter((entry): entry is EntityEntry => entry !== undefined);

  pattern.parameters.forEach((param, position) => {
    if (param.kind === "entity") return;
    for (const { entity } of participants) {
      const field = entity.fields.find((f) => f.name === param.name);
      if (field !== undefined && field.kind !== param.kind) {
        sink.consistency(
          `${joinPath(`${path}.parameters`, position)}.type`,
          `Parameter '${param.name}' is declared as '${param.kind}' but field '${param.name}' of entity '${entity.name}' is '${field.kind}'`,
        );
        return;
      }
    }
  });
};

export const checkCrossTablePatterns = (
  catalog: SchemaCatalog,
  sink: DiagnosticSink,
): void => {
  catalog.document.crossTablePatterns.forEach((pattern, position) => {
    const path = joinPath("cross_table_access_patterns", position);

    if (pattern.name.trim().length === 0) {
      sink.structural(`${path}.name`, "Cross-table pattern name must not be empty");
    }
    if (!isTransactionOperation(pattern.operation)) {
      sink.enumViolation(
        `${path}.operation`,
        "transaction operation",
        pattern.operation,
        TRANSACTION_OPERATIONS,
      );
    }
    if (!isTransactionReturnShape(pattern.returnShape)) {
      sink.enumViolation(
        `${path}.return_type`,
        "transaction return_type",
        pattern.returnShape,
        TRANSACTION_RETURN_SHAPES,
      );
    }

    checkParameters(pattern.parameters, `${path}.parameters`, catalog, sink);
    checkParticipants(pattern, path, catalog, sink);
    checkParameterKinds(pattern, path, catalog, sink);
  });
};
