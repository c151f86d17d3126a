/**
 * Parameter rules shared by per-table and cross-table patterns.
 */

import type { SchemaCatalog } from "../../core/catalog.js";
import type { ParameterDefinition } from "../../types/schema.js";
import { PARAMETER_KINDS, isParameterKind } from "../../types/enums.js";
import type { DiagnosticSink } from "../diagnostics.js";
import { joinPath } from "../diagnostics.js";

export const checkParameters = (
  parameters: readonly ParameterDefinition[],
  basePath: string,
  catalog: SchemaCatalog,
  sink: DiagnosticSink,
): void => {
  parameters.forEach((param, index) => {
    const path = joinPath(basePath, index);
    if (param.name.trim().length === 0) {
      sink.structural(`${path}.name`, "Parameter name must not be empty");
    }
    if (!isParameterKind(param.kind)) {
      sink.enumViolation(`${path}.type`, "parameter type", param.kind, PARAMETER_KINDS);
      return;
    }

    if (param.kind !== "entity") {
      if (param.entityType !== undefined) {
        sink.structural(
          `${path}.entity_type`,
          `entity_type is only valid for parameters of type 'entity', got '${param.kind}'`,
        );
      }
      return;
    }

    if (param.entityType === undefined || param.entityType.length === 0) {
      sink.structural(
        `${path}.entity_type`,
        `Entity parameter '${param.name}' requires entity_type`,
      );
      return;
    }
    if (catalog.findEntity(param.entityType) === undefined) {
      sink.reference(
        `${path}.entity_type`,
        `Entity parameter '${param.name}' references unknown entity '${param.entityType}'`,
        param.entityType,
        catalog.entityNames,
      );
    }
  });
};
