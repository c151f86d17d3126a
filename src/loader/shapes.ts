/**
 * Structural shapes of the wire format.
 *
 * These check JSON types, required keys and non-empty required arrays only.
 * Closed-set membership, references and uniqueness are the validator's job,
 * so enum-valued keys are plain strings here. Unknown keys are stripped.
 */

import { z } from "zod";

const KEY_TEMPLATE_MESSAGE = "Expected a template string or an array of template strings";

/** A single template string or a multi-attribute array. */
export const keyTemplateShape = z.union([z.string(), z.array(z.string())], {
  errorMap: () => ({ message: KEY_TEMPLATE_MESSAGE }),
});

export const fieldShape = z.object({
  name: z.string(),
  type: z.string(),
  required: z.boolean(),
  item_type: z.string().nullish(),
});

export const parameterShape = z.object({
  name: z.string(),
  type: z.string(),
  entity_type: z.string().nullish(),
});

export const filterConditionShape = z.object({
  field: z.string(),
  operator: z.string().nullish(),
  function: z.string().nullish(),
  param: z.string().nullish(),
  param2: z.string().nullish(),
  params: z.array(z.string()).nullish(),
});

export const filterExpressionShape = z.object({
  conditions: z.array(filterConditionShape).min(1),
  logical_operator: z.string().nullish(),
});

export const accessPatternShape = z.object({
  pattern_id: z.number().int(),
  name: z.string(),
  description: z.string(),
  operation: z.string(),
  parameters: z.array(parameterShape),
  return_type: z.string(),
  index_name: z.string().nullish(),
  range_condition: z.string().nullish(),
  consistent_read: z.boolean().nullish(),
  filter_expression: filterExpressionShape.nullish(),
});

export const indexMappingShape = z.object({
  name: z.string(),
  pk_template: keyTemplateShape,
  sk_template: keyTemplateShape.nullish(),
});

export const entityShape = z.object({
  entity_type: z.string(),
  pk_template: z.string(),
  sk_template: z.string().nullish(),
  gsi_mappings: z.array(indexMappingShape).nullish(),
  fields: z.array(fieldShape).min(1),
  access_patterns: z.array(accessPatternShape),
});

export const indexShape = z.object({
  name: z.string(),
  partition_key: keyTemplateShape,
  sort_key: keyTemplateShape.nullish(),
  projection: z.string().nullish(),
  included_attributes: z.array(z.string()).nullish(),
});

export const tableShape = z.object({
  table_config: z.object({
    table_name: z.string(),
    partition_key: z.string(),
    sort_key: z.string().nullish(),
  }),
  gsi_list: z.array(indexShape).nullish(),
  entities: z
    .record(z.string(), entityShape)
    .refine((entities) => Object.keys(entities).length > 0, {
      message: "Must define at least one entity",
    }),
});

export const participantShape = z.object({
  table: z.string(),
  entity: z.string(),
  action: z.string(),
  condition: z.string().nullish(),
});

export const crossTablePatternShape = z.object({
  pattern_id: z.number().int(),
  name: z.string(),
  description: z.string(),
  operation: z.string(),
  entities_involved: z.array(participantShape).min(1),
  parameters: z.array(parameterShape),
  return_type: z.string(),
});

export const usageDataShape = z.object({
  entities: z.record(
    z.string(),
    z.record(z.string(), z.record(z.string(), z.unknown())),
  ),
});

export type WireTable = z.infer<typeof tableShape>;
export type WireEntity = z.infer<typeof entityShape>;
export type WireIndex = z.infer<typeof indexShape>;
export type WireAccessPattern = z.infer<typeof accessPatternShape>;
export type WireParameter = z.infer<typeof parameterShape>;
export type WireFilterExpression = z.infer<typeof filterExpressionShape>;
export type WireCrossTablePattern = z.infer<typeof crossTablePatternShape>;
