/**
 * Template rules shared by primary keys and index mappings.
 */

import type { EntityDefinition } from "../../types/schema.js";
import { findTemplateSyntaxErrors, parseTemplate } from "../../keys/template-parser.js";
import type { DiagnosticSink } from "../diagnostics.js";

/**
 * Checks one template string: non-empty, well-formed placeholders, and every
 * placeholder naming a field of the entity.
 */
export const checkTemplate = (
  source: string,
  path: string,
  entity: EntityDefinition,
  sink: DiagnosticSink,
): void => {
  if (source.trim().length === 0) {
    sink.structural(path, "Template must not be empty");
    return;
  }

  const syntaxErrors = findTemplateSyntaxErrors(source);
  for (const problem of syntaxErrors) {
    sink.structural(path, `Malformed template '${source}': ${problem}`);
  }
  if (syntaxErrors.length > 0) return;

  const fieldNames = entity.fields.map((field) => field.name);
  for (const field of parseTemplate(source).fields) {
    if (!fieldNames.includes(field)) {
      sink.reference(
        path,
        `Template field '${field}' is not a field of entity '${entity.name}'`,
        field,
        fieldNames,
      );
    }
  }
};
