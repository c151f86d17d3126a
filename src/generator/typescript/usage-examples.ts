import {
  type SampleValue,
  type UsageLookup,
  sampleFieldValue,
  sampleParameterValue,
  updateFieldValue,
} from "../../languages/sample-values.js";
import { sampleVariable } from "../../languages/typescript.js";
import type { LanguageProfile } from "../../languages/types.js";
import { TRANSACTION_SERVICE, repositoryName } from "../../resolver/pattern-registry.js";
import type {
  ResolvedEntity,
  ResolvedModel,
  ResolvedParameter,
  ResolvedPattern,
  ResolvedTransaction,
} from "../../types/resolved.js";
import { toCamelCase } from "../../utils/naming.js";
import { GENERATED_NOTICE, findEntity, nonKeyFields } from "../shared.js";
import { tsIndent, tsPropertyName } from "./syntax.js";

const repoVariable = (entity: ResolvedEntity): string => `${toCamelCase(entity.name)}Repository`;

const keyArguments = (entity: ResolvedEntity): string =>
  entity.crud.keyParameters.map((param) => `${sampleVariable(entity.name)}.${param.name}`).join(", ");

const run = (label: string, call: string): string =>
  `await run(${JSON.stringify(label)}, () => ${call});`;

const sampleConstant = (
  entity: ResolvedEntity,
  profile: LanguageProfile,
  usage: UsageLookup,
): string[] => [
  `const ${sampleVariable(entity.name)}: ${entity.name} = {`,
  ...entity.fields.map(
    (field) =>
      `  ${tsPropertyName(field.name)}: ${profile.literal(sampleFieldValue(entity.name, field, usage))},`,
  ),
  "};",
];

const crudSection = (
  entity: ResolvedEntity,
  profile: LanguageProfile,
  usage: UsageLookup,
): string[] => {
  const repo = repoVariable(entity);
  const lines = [
    run(
      `Get ${entity.name} by primary key`,
      `${repo}.${profile.methodName(entity.crud.get)}(${keyArguments(entity)})`,
    ),
  ];
  const [field] = nonKeyFields(entity);
  if (field !== undefined) {
    const value = profile.literal(updateFieldValue(entity.name, field, usage));
    lines.push(
      run(
        `Update ${entity.name}.${field.name}`,
        `${repo}.${profile.methodName(entity.crud.update)}({ ...${sampleVariable(entity.name)}, ${tsPropertyName(field.name)}: ${value} })`,
      ),
    );
  }
  return lines;
};

const patternArguments = (
  pattern: ResolvedPattern,
  entity: ResolvedEntity,
  profile: LanguageProfile,
  usage: UsageLookup,
): string => {
  const sample = sampleVariable(entity.name);
  if (pattern.operation === "BatchGetItem") {
    const fields = entity.crud.keyParameters.map(
      (param) => `${tsPropertyName(param.name)}: ${sample}.${param.name}`,
    );
    return `[{ ${fields.join(", ")} }]`;
  }
  if (pattern.operation === "BatchWriteItem") return `[${sample}]`;
  return pattern.parameters
    .map((param) => profile.literal(sampleParameterValue(entity.name, entity.fields, param, usage)))
    .join(", ");
};

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

/** `usage-examples.ts`: creates one entity of each type and calls every method. */
export const renderTypeScriptUsageExamples = (
  model: ResolvedModel,
  profile: LanguageProfile,
  usage: UsageLookup,
): string => {
  const { entities, transactions } = model;
  const body: string[] = [];
  for (const entity of entities) {
    body.push(`const ${repoVariable(entity)} = new ${repositoryName(entity.name)}();`);
  }
  if (transactions.length > 0) {
    body.push(`const transactionService = new ${TRANSACTION_SERVICE}();`);
  }

  body.push("", 'console.log("== Creating sample entities ==");');
  for (const entity of entities) {
    body.push(
      run(
        `Create ${entity.name}`,
        `${repoVariable(entity)}.${profile.methodName(entity.crud.create)}(${sampleVariable(entity.name)})`,
      ),
    );
  }

  body.push("", 'console.log("== CRUD operations ==");');
  for (const entity of entities) body.push(...crudSection(entity, profile, usage));

  body.push("", 'console.log("== Access patterns ==");');
  for (const entity of entities) {
    for (const pattern of entity.patterns) {
      body.push(
        run(
          `Access pattern #${pattern.id}: ${pattern.description}`,
          `${repoVariable(entity)}.${profile.methodName(pattern.methodName)}(${patternArguments(pattern, entity, profile, usage)})`,
        ),
      );
    }
  }

  if (transactions.length > 0) {
    body.push("", 'console.log("== Cross-table transactions ==");');
    for (const transaction of transactions) {
      const args = transaction.parameters
        .map((param) => profile.literal(transactionArgument(model, transaction, param, usage)))
        .join(", ");
      body.push(
        run(
          `Transaction #${transaction.id}: ${transaction.description}`,
          `transactionService.${profile.methodName(transaction.methodName)}(${args})`,
        ),
      );
    }
  }

  body.push("", 'console.log("== Cleanup ==");');
  for (const entity of entities) {
    body.push(
      run(
        `Delete ${entity.name}`,
        `${repoVariable(entity)}.${profile.methodName(entity.crud.delete)}(${keyArguments(entity)})`,
      ),
    );
  }

  const lines = [
    `// ${GENERATED_NOTICE}`,
    `import type { ${entities.map((entity) => entity.name).join(", ")} } from "./entities.js";`,
    `import { ${entities.map((entity) => repositoryName(entity.name)).join(", ")} } from "./repositories.js";`,
  ];
  if (transactions.length > 0) {
    lines.push(`import { ${TRANSACTION_SERVICE} } from "./transaction-service.js";`);
  }
  lines.push(
    "",
    "const run = async (label: string, call: () => Promise<unknown>): Promise<void> => {",
    "  console.log(label);",
    "  try {",
    '    console.log("  ->", await call());',
    "  } catch (error) {",
    '    console.log("  failed:", error);',
    "  }",
    "};",
  );
  for (const entity of entities) lines.push("", ...sampleConstant(entity, profile, usage));
  lines.push(
    "",
    "const main = async (): Promise<void> => {",
    ...tsIndent(body, 1),
    "};",
    "",
    "main().catch((error: unknown) => {",
    "  console.error(error);",
    "  process.exitCode = 1;",
    "});",
  );
  return `${lines.join("\n")}\n`;
};
