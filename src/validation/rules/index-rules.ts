/**
 * Secondary index rules: index definitions, projections and the entity
 * mappings that feed them.
 */

import type { EntityEntry, TableEntry } from "../../core/catalog.js";
import { findIndex, keyAttributesOf } from "../../core/key-fields.js";
import { projectionCoverage } from "../../core/projection.js";
import { MAX_KEY_ATTRIBUTES } from "../../keys/key-template.js";
import { PROJECTION_KINDS, isProjectionKind } from "../../types/enums.js";
import type {
  EntityDefinition,
  KeyTemplateDefinition,
} from "../../types/schema.js";
import type { DiagnosticSink } from "../diagnostics.js";
import { joinPath } from "../diagnostics.js";
import { checkTemplate } from "./templates.js";

const checkAttributeCount = (
  count: number,
  path: string,
  label: string,
  sink: DiagnosticSink,
): void => {
  if (count === 0) {
    sink.cardinality(
      path,
      `${label} is an empty list; multi-attribute keys take 1-${MAX_KEY_ATTRIBUTES} attributes`,
    );
  } else if (count > MAX_KEY_ATTRIBUTES) {
    sink.cardinality(
      path,
      `${label} lists ${count} attributes; more than ${MAX_KEY_ATTRIBUTES} attributes is not supported`,
    );
  }
};

const checkKeyAttributes = (
  definition: KeyTemplateDefinition,
  path: string,
  label: string,
  sink: DiagnosticSink,
): void => {
  if (typeof definition === "string") {
    if (definition.trim().length === 0) {
      sink.structural(path, `${label} must not be empty`);
    }
    return;
  }
  checkAttributeCount(definition.length, path, label, sink);
  definition.forEach((attribute, index) => {
    if (attribute.trim().length === 0) {
      sink.structural(joinPath(path, index), "Key attribute name must not be empty");
    }
  });
};

/** Checks every index of a table, including its projection. */
export const checkTableIndexes = (
  { table, path }: TableEntry,
  sink: DiagnosticSink,
): void => {
  table.indexes.forEach((index, position) => {
    const indexPath = joinPath(`${path}.gsi_list`, position);
    const label = `Index '${index.name}'`;

    if (index.name.trim().length === 0) {
      sink.structural(`${indexPath}.name`, "Index name must not be empty");
    }
    checkKeyAttributes(
      index.partitionKey,
      `${indexPath}.partition_key`,
      `${label} partition_key`,
      sink,
    );
    if (index.sortKey !== undefined) {
      checkKeyAttributes(
        index.sortKey,
        `${indexPath}.sort_key`,
        `${label} sort_key`,
        sink,
      );
    }

    if (!isProjectionKind(index.projection)) {
      sink.enumViolation(
        `${indexPath}.projection`,
        "projection",
        index.projection,
        PROJECTION_KINDS,
      );
      return;
    }

    const included = index.includedAttributes;
    if (index.projection !== "INCLUDE") {
      if (included !== undefined) {
        sink.consistency(
          `${indexPath}.included_attributes`,
          `${label} has projection '${index.projection}' but lists included_attributes, which is only allowed for INCLUDE`,
        );
      }
      return;
    }

    if (included === undefined || included.length === 0) {
      sink.structural(
        `${indexPath}.included_attributes`,
        `${label} has projection 'INCLUDE' and needs a non-empty included_attributes list`,
      );
      return;
    }

    const keyAttributes = keyAttributesOf(table, index);
    const mappedEntities = table.entities.filter((entity) =>
      entity.indexMappings.some((mapping) => mapping.indexName === index.name),
    );
    const mappedFields = [
      ...new Set(
        mappedEntities.flatMap((entity) => entity.fields.map((f) => f.name)),
      ),
    ];

    included.forEach((attribute, attributePosition) => {
      const attributePath = joinPath(
        `${indexPath}.included_attributes`,
        attributePosition,
      );
      if (keyAttributes.has(attribute)) {
        sink.consistency(
          attributePath,
          `${label} lists key attribute '${attribute}' in included_attributes; key attributes are always projected`,
        );
      } else if (mappedEntities.length > 0 && !mappedFields.includes(attribute)) {
        sink.reference(
          attributePath,
          `${label} includes attribute '${attribute}' that no entity using this index defines`,
          attribute,
          mappedFields,
        );
      }
    });
  });
};

const checkMappingShape = (
  mappingKey: KeyTemplateDefinition,
  indexKey: KeyTemplateDefinition,
  path: string,
  what: string,
  indexName: string,
  sink: DiagnosticSink,
): void => {
  const indexCount = typeof indexKey === "string" ? undefined : indexKey.length;
  if (typeof mappingKey === "string") {
    if (indexCount !== undefined) {
      sink.cardinality(
        path,
        `Index '${indexName}' ${what} has ${indexCount} attributes, so this template must be an array of ${indexCount} templates`,
      );
    }
    return;
  }
  if (indexCount === undefined) {
    sink.cardinality(
      path,
      `Index '${indexName}' ${what} is a single attribute, so this template must be a string, not an array`,
    );
  } else if (indexCount !== mappingKey.length) {
    sink.cardinality(
      path,
      `Template lists ${mappingKey.length} templates but index '${indexName}' ${what} has ${indexCount} attributes`,
    );
  }
};

const checkMappingTemplate = (
  definition: KeyTemplateDefinition,
  path: string,
  entity: EntityDefinition,
  indexName: string,
  sink: DiagnosticSink,
): void => {
  if (typeof definition === "string") {
    checkTemplate(definition, path, entity, sink);
    return;
  }
  checkAttributeCount(
    definition.length,
    path,
    `Mapping for index '${indexName}'`,
    sink,
  );
  definition.forEach((source, index) =>
    checkTemplate(source, joinPath(path, index), entity, sink),
  );
};

/**
 * Checks an entity's index mappings against the table's index list and
 * warns when an INCLUDE projection drops required fields.
 */
export const checkIndexMappings = (
  { entity, table, path }: EntityEntry,
  sink: DiagnosticSink,
): void => {
  const indexNames = table.indexes.map((index) => index.name);

  entity.indexMappings.forEach((mapping, position) => {
    const mappingPath = joinPath(`${path}.gsi_mappings`, position);
    const index = findIndex(table, mapping.indexName);

    if (index === undefined) {
      sink.reference(
        `${mappingPath}.name`,
        `Index '${mapping.indexName}' is referenced by entity '${entity.name}' but not defined in the gsi_list of table '${table.name}'`,
        mapping.indexName,
        indexNames,
      );
    }

    checkMappingTemplate(
      mapping.pkTemplate,
      `${mappingPath}.pk_template`,
      entity,
      mapping.indexName,
      sink,
    );
    if (mapping.skTemplate !== undefined) {
      checkMappingTemplate(
        mapping.skTemplate,
        `${mappingPath}.sk_template`,
        entity,
        mapping.indexName,
        sink,
      );
    }
    if (index === undefined) return;

    checkMappingShape(
      mapping.pkTemplate,
      index.partitionKey,
      `${mappingPath}.pk_template`,
      "partition_key",
      index.name,
      sink,
    );
    if (mapping.skTemplate !== undefined) {
      if (index.sortKey === undefined) {
        sink.consistency(
          `${mappingPath}.sk_template`,
          `Index '${index.name}' has no sort_key, but the mapping declares sk_template`,
        );
      } else {
        checkMappingShape(
          mapping.skTemplate,
          index.sortKey,
          `${mappingPath}.sk_template`,
          "sort_key",
          index.name,
          sink,
        );
      }
    }

    if (index.projection === "INCLUDE") {
      const coverage = projectionCoverage(table, index, entity);
      if (coverage.missingRequiredFields.length > 0) {
        sink.consistency(
          path,
          `Index '${index.name}' uses INCLUDE projection but entity '${entity.name}' has required fields not in included_attributes: ${coverage.missingRequiredFields.join(", ")}. Reads through this index return raw attribute maps instead of '${entity.name}'`,
          "warning",
        );
      }
    }
  });
};
