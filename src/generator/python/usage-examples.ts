import {
  type SampleValue,
  type UsageLookup,
  sampleFieldValue,
  sampleParameterValue,
  updateFieldValue,
} from "../../languages/sample-values.js";
import type { LanguageProfile } from "../../languages/types.js";
import { TRANSACTION_SERVICE, repositoryName } from "../../resolver/pattern-registry.js";
import type {
  ResolvedEntity,
  ResolvedModel,
  ResolvedParameter,
  ResolvedPattern,
  ResolvedTransaction,
} from "../../types/resolved.js";
import { toSnakeCase } from "../../utils/naming.js";
import { GENERATED_NOTICE, findEntity, nonKeyFields } from "../shared.js";
import { pyIndent } from "./syntax.js";

const repoVariable = (entity: ResolvedEntity): string => `${toSnakeCase(entity.name)}_repo`;

const created = (entity: ResolvedEntity): string => `created_entities[${JSON.stringify(entity.name)}]`;

const keyArguments = (entity: ResolvedEntity): string =>
  entity.crud.keyParameters.map((param) => `${created(entity)}.${param.name}`).join(", ");

/** `try:` block that prints the result of `call` and reports failures. */
const attempt = (label: string, call: string): string[] => [
  `print(${JSON.stringify(label)})`,
  "try:",
  `    result = ${call}`,
  '    print(f"  -> {result}")',
  "except Exception as error:",
  '    print(f"  failed: {error}")',
];

const sampleEntity = (
  entity: ResolvedEntity,
  profile: LanguageProfile,
  usage: UsageLookup,
): string[] => [
  `sample_${toSnakeCase(entity.name)} = ${entity.name}(`,
  ...entity.fields.map(
    (field) => `    ${field.name}=${profile.literal(sampleFieldValue(entity.name, field, usage))},`,
  ),
  ")",
  "try:",
  `    ${created(entity)} = ${repoVariable(entity)}.${entity.crud.create}(sample_${toSnakeCase(entity.name)})`,
  `    print(f"Created ${entity.name}: {${created(entity)}}")`,
  "except Exception as error:",
  `    print(f"Could not create ${entity.name}, continuing with the sample: {error}")`,
  `    ${created(entity)} = sample_${toSnakeCase(entity.name)}`,
];

const crudSection = (
  entity: ResolvedEntity,
  profile: LanguageProfile,
  usage: UsageLookup,
): string[] => {
  const lines = attempt(
    `Get ${entity.name} by primary key`,
    `${repoVariable(entity)}.${entity.crud.get}(${keyArguments(entity)})`,
  );
  const [field] = nonKeyFields(entity);
  if (field !== undefined) {
    const value = profile.literal(updateFieldValue(entity.name, field, usage));
    lines.push(
      ...attempt(
        `Update ${entity.name}.${field.name}`,
        `${repoVariable(entity)}.${entity.crud.update}(${created(entity)}.model_copy(update={${JSON.stringify(field.name)}: ${value}}))`,
      ),
    );
  }
  return lines;
};

const keyDict = (entity: ResolvedEntity): string =>
  `{${entity.crud.keyParameters
    .map((param) => `${JSON.stringify(param.name)}: ${created(entity)}.${param.name}`)
    .join(", ")}}`;

const patternArguments = (
  pattern: ResolvedPattern,
  entity: ResolvedEntity,
  profile: LanguageProfile,
  usage: UsageLookup,
): string => {
  if (pattern.operation === "BatchGetItem") return `[${keyDict(entity)}]`;
  if (pattern.operation === "BatchWriteItem") return `[${created(entity)}]`;
  return pattern.parameters
    .map((param) => profile.literal(sampleParameterValue(entity.name, entity.fields, param, usage)))
    .join(", ");
};

const patternSection = (
  pattern: ResolvedPattern,
  entity: ResolvedEntity,
  profile: LanguageProfile,
  usage: UsageLookup,
): string[] =>
  attempt(
    `Access pattern #${pattern.id}: ${pattern.description}`,
    `${repoVariable(entity)}.${profile.methodName(pattern.methodName)}(${patternArguments(pattern, entity, profile, usage)})`,
  );

/** Sample for a transaction argument, read from whichever participant has that field. */
const transactionArgument = (
  model: ResolvedModel,
  transaction: ResolvedTransaction,
  param: ResolvedParameter,
  usage: UsageLookup,
): SampleValue => {
  const participants = transaction.participants.map((participant) =>
    findEntity(model, participant.entity),
  );
  const owner =
    participants.find((entity) => entity.fields.some((field) => field.name === param.name)) ??
    participants[0];
  if (owner === undefined) return sampleParameterValue("", [], param, usage);
  return sampleParameterValue(owner.name, owner.fields, param, usage);
};

const transactionSection = (
  model: ResolvedModel,
  transaction: ResolvedTransaction,
  profile: LanguageProfile,
  usage: UsageLookup,
): string[] => {
  const args = transaction.parameters
    .map((param) => profile.literal(transactionArgument(model, transaction, param, usage)))
    .join(", ");
  return attempt(
    `Transaction #${transaction.id}: ${transaction.description}`,
    `transaction_service.${profile.methodName(transaction.methodName)}(${args})`,
  );
};

/** `usage_examples.py`: creates one entity of each type and calls every method. */
export const renderPythonUsageExamples = (
  model: ResolvedModel,
  profile: LanguageProfile,
  usage: UsageLookup,
): string => {
  const { entities, transactions } = model;
  const body: string[] = ["created_entities: dict[str, Any] = {}", ""];
  for (const entity of entities) {
    body.push(`${repoVariable(entity)} = ${repositoryName(entity.name)}()`);
  }
  if (transactions.length > 0) body.push(`transaction_service = ${TRANSACTION_SERVICE}()`);

  body.push("", 'print("== Creating sample entities ==")');
  for (const entity of entities) body.push(...sampleEntity(entity, profile, usage));

  body.push("", 'print("== CRUD operations ==")');
  for (const entity of entities) body.push(...crudSection(entity, profile, usage));

  body.push("", 'print("== Access patterns ==")');
  for (const entity of entities) {
    for (const pattern of entity.patterns) {
      body.push(...patternSection(pattern, entity, profile, usage));
    }
  }

  if (transactions.length > 0) {
    body.push("", 'print("== Cross-table transactions ==")');
    for (const transaction of transactions) {
      body.push(...transactionSection(model, transaction, profile, usage));
    }
  }

  body.push("", 'print("== Cleanup ==")');
  for (const entity of entities) {
    body.push(
      ...attempt(
        `Delete ${entity.name}`,
        `${repoVariable(entity)}.${entity.crud.delete}(${keyArguments(entity)})`,
      ),
    );
  }

  const imports = [
    `# ${GENERATED_NOTICE}`,
    '"""Calls every generated repository method against the configured tables."""',
    "",
    "from __future__ import annotations",
    "",
    "import time",
    "from decimal import Decimal",
    "from typing import Any",
    "",
    `from entities import ${entities.map((entity) => entity.name).join(", ")}`,
    `from repositories import ${entities.map((entity) => repositoryName(entity.name)).join(", ")}`,
  ];
  if (transactions.length > 0) imports.push(`from transaction_service import ${TRANSACTION_SERVICE}`);

  const lines = [
    ...imports,
    "",
    "",
    "def main() -> None:",
    ...pyIndent(body, 1),
    "",
    "",
    'if __name__ == "__main__":',
    "    main()",
  ];
  return `${lines.join("\n")}\n`;
};
