/**
 * Usage-data rules: the optional illustrative values must line up with the
 * schema's entities and fields.
 */

import type { SchemaCatalog } from "../../core/catalog.js";
import { USAGE_SECTIONS, type UsageDataDocument } from "../../types/schema.js";
import type { DiagnosticSink } from "../diagnostics.js";

const KNOWN_TOP_LEVEL_KEYS: readonly string[] = ["entities"];
const KNOWN_SECTIONS: readonly string[] = USAGE_SECTIONS;

export const checkUsageData = (
  usageData: UsageDataDocument,
  catalog: SchemaCatalog,
  sink: DiagnosticSink,
): void => {
  for (const key of usageData.topLevelKeys) {
    if (!KNOWN_TOP_LEVEL_KEYS.includes(key)) {
      sink.structural(key, `Unknown top-level key '${key}'; valid keys: entities`);
    }
  }

  const provided = new Set(usageData.entities.map((entry) => entry.entity));
  for (const name of catalog.entityNames) {
    if (!provided.has(name)) {
      sink.structural("entities", `Missing usage data for entity '${name}'`);
    }
  }

  for (const { entity: entityName, sections } of usageData.entities) {
    const path = `entities.${entityName}`;
    const entry = catalog.findEntity(entityName);
    if (entry === undefined) {
      sink.reference(
        path,
        `Usage data describes unknown entity '${entityName}'`,
        entityName,
        catalog.entityNames,
      );
      continue;
    }

    const fieldNames = entry.entity.fields.map((field) => field.name);
    for (const section of USAGE_SECTIONS) {
      if (sections[section] === undefined) {
        sink.structural(`${path}.${section}`, `Missing required section '${section}'`);
      }
    }

    for (const [section, values] of Object.entries(sections)) {
      const sectionPath = `${path}.${section}`;
      if (!KNOWN_SECTIONS.includes(section)) {
        sink.enumViolation(sectionPath, "usage data section", section, KNOWN_SECTIONS);
        continue;
      }
      if (section === "sample_data" && Object.keys(values).length === 0) {
        sink.structural(sectionPath, "sample_data must contain at least one field value");
      }
      for (const fieldName of Object.keys(values)) {
        if (!fieldNames.includes(fieldName)) {
          sink.reference(
            `${sectionPath}.${fieldName}`,
            `Field '${fieldName}' is not a field of entity '${entityName}'`,
            fieldName,
            fieldNames,
          );
        }
      }
    }
  }
};
