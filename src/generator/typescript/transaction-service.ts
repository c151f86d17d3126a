import { type GenerationOptions, deployedTableName } from "../../config/options.js";
import type { LanguageProfile } from "../../languages/types.js";
import { TRANSACTION_SERVICE } from "../../resolver/pattern-registry.js";
import type {
  ResolvedModel,
  ResolvedParticipant,
  ResolvedTransaction,
} from "../../types/resolved.js";
import { toCamelCase } from "../../utils/naming.js";
import { GENERATED_NOTICE, findEntity } from "../shared.js";
import { configName } from "./entities.js";
import { tsMethodHead } from "./repositories.js";
import { tsDoc, tsIndent, tsKeyObject, tsNamesObject, tsPropertyName, tsValuesObject } from "./syntax.js";

const participantItem = (model: ResolvedModel, participant: ResolvedParticipant): string[] => {
  const members = [`TableName: this.table(${JSON.stringify(participant.table)})`];
  const key = `Key: ${tsKeyObject(participant.keys)}`;

  switch (participant.action) {
    case "Put": {
      const entity = findEntity(model, participant.entity);
      const names = [entity.partitionKey.attributes[0], entity.sortKey?.attributes[0]]
        .filter((name): name is string => name !== undefined)
        .map((name) => JSON.stringify(name));
      members.push(
        participant.bodyParameter === undefined
          ? `Item: ${tsKeyObject(participant.keys)}`
          : `Item: toStoredItem(${toCamelCase(participant.bodyParameter)}, ${configName(entity.name)}, ${names.join(", ")})`,
      );
      break;
    }
    case "Update": {
      members.push(key);
      const { update } = participant;
      if (update !== undefined) {
        members.push(
          `UpdateExpression: ${JSON.stringify(update.expression)}`,
          `ExpressionAttributeNames: ${tsNamesObject(update.names)}`,
          `ExpressionAttributeValues: ${tsValuesObject(update.values, participant.keys)}`,
        );
      }
      break;
    }
    case "Delete":
    case "ConditionCheck":
    case "Get":
      members.push(key);
      break;
  }
  if (participant.condition !== undefined && participant.action !== "Get") {
    members.push(`ConditionExpression: ${JSON.stringify(participant.condition)}`);
  }
  return [
    `{ ${participant.action}: {`,
    ...tsIndent(members.map((member) => `${member},`), 1),
    "} },",
  ];
};

const transactItems = (model: ResolvedModel, transaction: ResolvedTransaction): string[] => [
  "TransactItems: [",
  ...tsIndent(
    transaction.participants.flatMap((participant) => participantItem(model, participant)),
    1,
  ),
  "],",
];

const resultKeys = (transaction: ResolvedTransaction): string[] =>
  transaction.participants.map((participant, position) =>
    transaction.participants.filter((other) => other.entity === participant.entity).length > 1
      ? `${participant.entity}_${position}`
      : participant.entity,
  );

const writeBody = (model: ResolvedModel, transaction: ResolvedTransaction): string[] => {
  const lines = [
    "await this.client.send(",
    "  new TransactWriteCommand({",
    ...tsIndent(transactItems(model, transaction), 2),
    "  }),",
    ");",
  ];
  switch (transaction.returnShape) {
    case "boolean":
      lines.push("return true;");
      break;
    case "object":
      lines.push("return { success: true };");
      break;
    case "array":
      lines.push("return [];");
      break;
  }
  return lines;
};

const getBody = (model: ResolvedModel, transaction: ResolvedTransaction): string[] => {
  const lines = [
    "const { Responses = [] } = await this.client.send(",
    "  new TransactGetCommand({",
    ...tsIndent(transactItems(model, transaction), 2),
    "  }),",
    ");",
    "const items = Responses.map((response) => response.Item);",
  ];
  switch (transaction.returnShape) {
    case "boolean":
      lines.push("return items.every((item) => item !== undefined);");
      break;
    case "object":
      lines.push(
        "return {",
        ...resultKeys(transaction).map(
          (key, position) => `  ${tsPropertyName(key)}: items[${position}],`,
        ),
        "};",
      );
      break;
    case "array":
      lines.push(
        "return items.filter((item): item is Record<string, unknown> => item !== undefined);",
      );
      break;
  }
  return lines;
};

const renderTransaction = (
  model: ResolvedModel,
  transaction: ResolvedTransaction,
  profile: LanguageProfile,
): string[] => {
  const tables = [...new Set(transaction.participants.map((participant) => participant.table))];
  return [
    ...tsDoc([
      transaction.description,
      "",
      `Transaction #${transaction.id}: ${transaction.operation} across ${tables.join(", ")}`,
    ]),
    ...tsMethodHead(
      profile.methodName(transaction.methodName),
      transaction.parameters.map(
        (param) => `${profile.identifier(param.name)}: ${profile.parameterType(param)}`,
      ),
      profile.returnType(transaction.returnShape, undefined),
    ),
    ...tsIndent(
      transaction.operation === "TransactWrite"
        ? writeBody(model, transaction)
        : getBody(model, transaction),
      1,
    ),
    "}",
  ];
};

/** `transaction-service.ts`: one method per cross-table pattern. */
export const renderTypeScriptTransactionService = (
  model: ResolvedModel,
  profile: LanguageProfile,
  options: GenerationOptions,
): string => {
  const { transactions } = model;
  const stored = [
    ...new Set(
      transactions.flatMap((transaction) =>
        transaction.participants.flatMap((participant) =>
          participant.action === "Put" && participant.bodyParameter !== undefined
            ? [participant.entity]
            : [],
        ),
      ),
    ),
  ].sort();
  const typed = [
    ...new Set(
      transactions.flatMap((transaction) =>
        transaction.parameters.flatMap((param) =>
          param.entityType === undefined ? [] : [param.entityType],
        ),
      ),
    ),
  ].sort();
  const tables = [
    ...new Set(
      transactions.flatMap((transaction) =>
        transaction.participants.map((participant) => participant.table),
      ),
    ),
  ].sort();

  const commands = [
    transactions.some((transaction) => transaction.operation === "TransactGet")
      ? "TransactGetCommand"
      : undefined,
    transactions.some((transaction) => transaction.operation === "TransactWrite")
      ? "TransactWriteCommand"
      : undefined,
  ].filter((name): name is string => name !== undefined);

  const baseImports = ["createDocumentClient"];
  if (stored.length > 0) baseImports.push("toStoredItem");
  const entityImports = [
    ...typed.map((name) => `type ${name}`),
    ...stored.map((name) => configName(name)),
  ];

  const lines = [
    `// ${GENERATED_NOTICE}`,
    `import { ${[...commands, "type DynamoDBDocumentClient"].join(", ")} } from "@aws-sdk/lib-dynamodb";`,
    `import { ${baseImports.join(", ")} } from "./base-repository.js";`,
  ];
  if (entityImports.length > 0) {
    lines.push(`import { ${entityImports.join(", ")} } from "./entities.js";`);
  }

  const members = [
    "private readonly tableNames: Record<string, string>;",
    "",
    "constructor(",
    "  tableNames: Record<string, string> = {},",
    "  private readonly client: DynamoDBDocumentClient = createDocumentClient(),",
    ") {",
    "  this.tableNames = {",
    ...tables.map(
      (table) => `    ${tsPropertyName(table)}: ${JSON.stringify(deployedTableName(options, table))},`,
    ),
    "    ...tableNames,",
    "  };",
    "}",
    "",
    "private table(name: string): string {",
    "  return this.tableNames[name] ?? name;",
    "}",
  ];
  for (const transaction of transactions) {
    members.push("", ...renderTransaction(model, transaction, profile));
  }

  lines.push(
    "",
    ...tsDoc(["Cross-table transactions over the DynamoDB document client."]),
    `export class ${TRANSACTION_SERVICE} {`,
    ...tsIndent(members, 1),
    "}",
  );
  return `${lines.join("\n")}\n`;
};
