/**
 * Entity rules: field definitions and primary key templates.
 */

import type { EntityEntry } from "../../core/catalog.js";
import { FIELD_KINDS, isFieldKind } from "../../types/enums.js";
import type { DiagnosticSink } from "../diagnostics.js";
import { joinPath } from "../diagnostics.js";
import { checkTemplate } from "./templates.js";

export const checkEntity = (
  { entity, table, path }: EntityEntry,
  sink: DiagnosticSink,
): void => {
  if (entity.name.trim().length === 0) {
    sink.structural(path, "Entity name must not be empty");
  }
  if (entity.entityType.trim().length === 0) {
    sink.structural(`${path}.entity_type`, "entity_type must not be empty");
  }

  entity.fields.forEach((field, index) => {
    const fieldPath = joinPath(`${path}.fields`, index);
    if (field.name.trim().length === 0) {
      sink.structural(`${fieldPath}.name`, "Field name must not be empty");
    }
    if (!isFieldKind(field.kind)) {
      sink.enumViolation(`${fieldPath}.type`, "field type", field.kind, FIELD_KINDS);
      return;
    }

    if (field.kind === "array") {
      if (field.itemKind === undefined) {
        sink.structural(
          `${fieldPath}.item_type`,
          `Array field '${field.name}' requires item_type`,
        );
      } else if (!isFieldKind(field.itemKind)) {
        sink.enumViolation(
          `${fieldPath}.item_type`,
          "item_type",
          field.itemKind,
          FIELD_KINDS,
        );
      }
    } else if (field.itemKind !== undefined) {
      sink.structural(
        `${fieldPath}.item_type`,
        `item_type is only valid for array fields, but '${field.name}' is '${field.kind}'`,
      );
    }
  });

  checkTemplate(entity.pkTemplate, `${path}.pk_template`, entity, sink);

  if (entity.skTemplate !== undefined) {
    checkTemplate(entity.skTemplate, `${path}.sk_template`, entity, sink);
    if (table.sortKey === undefined) {
      sink.consistency(
        `${path}.sk_template`,
        `Entity '${entity.name}' declares sk_template but table '${table.name}' has no sort_key`,
      );
    }
  } else if (table.sortKey !== undefined) {
    sink.consistency(
      path,
      `Table '${table.name}' has sort key '${table.sortKey}', so entity '${entity.name}' must declare sk_template`,
    );
  }
};
