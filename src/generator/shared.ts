/**
 * Language-neutral helpers the renderer backends share.
 */

import type { SingleKeyTemplate } from "../keys/key-template.js";
import { ResolverInvariantError } from "../resolver/errors.js";
import type {
  BindingSource,
  ExpressionName,
  ExpressionPlan,
  ExpressionValue,
  KeyConstruction,
  ResolvedEntity,
  ResolvedField,
  ResolvedModel,
} from "../types/resolved.js";

/** The template that builds one attribute of a key. */
export const attributeTemplate = (
  construction: KeyConstruction,
  position: number | undefined,
): SingleKeyTemplate => {
  const { compiled } = construction.key;
  if (compiled.form === "single") return compiled;
  const part = compiled.parts[position ?? 0];
  if (part === undefined) {
    throw new ResolverInvariantError(
      construction.part,
      `key has no attribute at position ${String(position)}`,
    );
  }
  return part;
};

/** Where the value of a key field comes from in a construction. */
export const bindingFor = (construction: KeyConstruction, field: string): BindingSource => {
  const binding = construction.bindings.find((candidate) => candidate.field === field);
  if (binding === undefined) {
    throw new ResolverInvariantError(construction.part, `no binding for key field '${field}'`);
  }
  return binding.source;
};

export const constructionFor = (
  constructions: readonly KeyConstruction[],
  part: "partition" | "sort",
): KeyConstruction => {
  const construction = constructions.find((candidate) => candidate.part === part);
  if (construction === undefined) {
    throw new ResolverInvariantError(part, "no key construction");
  }
  return construction;
};

/** Attribute name aliases of several plans, in order of first use. */
export const mergeNames = (
  plans: readonly (ExpressionPlan | undefined)[],
): readonly ExpressionName[] => {
  const seen = new Map<string, ExpressionName>();
  for (const plan of plans) {
    for (const name of plan?.names ?? []) {
      if (!seen.has(name.alias)) seen.set(name.alias, name);
    }
  }
  return [...seen.values()];
};

export const mergeValues = (
  plans: readonly (ExpressionPlan | undefined)[],
): readonly ExpressionValue[] => plans.flatMap((plan) => plan?.values ?? []);

export const findEntity = (model: ResolvedModel, name: string): ResolvedEntity => {
  const entity = model.entities.find((candidate) => candidate.name === name);
  if (entity === undefined) throw new ResolverInvariantError(name, "unknown entity");
  return entity;
};

export const fieldOf = (entity: ResolvedEntity, name: string): ResolvedField | undefined =>
  entity.fields.find((field) => field.name === name);

/** Fields outside the primary key, in declaration order. */
export const nonKeyFields = (entity: ResolvedEntity): readonly ResolvedField[] => {
  const keyFields = new Set([...entity.partitionKey.fields, ...(entity.sortKey?.fields ?? [])]);
  return entity.fields.filter((field) => !keyFields.has(field.name));
};

/** Header line marking a file as generated. */
export const GENERATED_NOTICE = "Auto-generated by ddb-repo-codegen. Do not edit by hand.";

/** One index key attribute and the template that fills it. */
export interface IndexAttribute {
  readonly attribute: string;
  readonly template: SingleKeyTemplate;
}

/**
 * Index key attributes an item must carry. Attributes that simply repeat a
 * field of the same name are skipped since the field is already stored.
 */
export const indexAttributes = (entity: ResolvedEntity): readonly IndexAttribute[] => {
  const seen = new Set<string>();
  const result: IndexAttribute[] = [];
  for (const index of entity.indexes) {
    for (const key of [index.partitionKey, index.sortKey]) {
      if (key === undefined) continue;
      const templates = key.compiled.form === "single" ? [key.compiled] : key.compiled.parts;
      key.attributes.forEach((attribute, position) => {
        const template = templates[position];
        if (template === undefined || seen.has(attribute)) return;
        const [onlyField] = template.template.fields;
        if (template.template.isPureFieldReference && onlyField === attribute) return;
        seen.add(attribute);
        result.push(Object.freeze({ attribute, template }));
      });
    }
  }
  return result;
};
