import { type GenerationOptions, deployedTableName } from "../../config/options.js";
import type { LanguageProfile } from "../../languages/types.js";
import { TRANSACTION_SERVICE } from "../../resolver/pattern-registry.js";
import type {
  ResolvedModel,
  ResolvedParticipant,
  ResolvedTransaction,
} from "../../types/resolved.js";
import { GENERATED_NOTICE, findEntity } from "../shared.js";
import { pyDef } from "./repositories.js";
import { pyDocstring, pyIndent, pyKeyDict, pyNamesDict, pyValuesDict } from "./syntax.js";

/** Lines of a `"Name": {...}` dict entry, trailing comma included. */
const entry = (name: string, members: readonly string[]): string[] => [
  `${JSON.stringify(name)}: {`,
  ...pyIndent(members.map((member) => `${member},`), 1),
  "},",
];

const attributeNames = (
  model: ResolvedModel,
  participant: ResolvedParticipant,
): readonly [string, string] => {
  const entity = findEntity(model, participant.entity);
  return [
    JSON.stringify(entity.partitionKey.attributes[0] ?? "pk"),
    entity.sortKey === undefined ? "None" : JSON.stringify(entity.sortKey.attributes[0] ?? "sk"),
  ];
};

const writeItem = (model: ResolvedModel, participant: ResolvedParticipant): string[] => {
  const table = `"TableName": self.table_names[${JSON.stringify(participant.table)}]`;
  const condition =
    participant.condition === undefined
      ? []
      : [`"ConditionExpression": ${JSON.stringify(participant.condition)}`];
  const key = `"Key": self._serialize(${pyKeyDict(participant.keys)})`;

  switch (participant.action) {
    case "Put": {
      const [pkey, skey] = attributeNames(model, participant);
      const item =
        participant.bodyParameter === undefined
          ? `self._serialize(${pyKeyDict(participant.keys)})`
          : `self._serialize(self._to_item(${participant.bodyParameter}, ${pkey}, ${skey}))`;
      return entry("Put", [table, `"Item": ${item}`, ...condition]);
    }
    case "Update": {
      const members = [table, key];
      const { update } = participant;
      if (update !== undefined) {
        members.push(
          `"UpdateExpression": ${JSON.stringify(update.expression)}`,
          `"ExpressionAttributeNames": ${pyNamesDict(update.names)}`,
          `"ExpressionAttributeValues": self._serialize(${pyValuesDict(update.values, participant.keys)})`,
        );
      }
      return entry("Update", [...members, ...condition]);
    }
    case "Delete":
      return entry("Delete", [table, key, ...condition]);
    case "ConditionCheck":
      return entry("ConditionCheck", [table, key, ...condition]);
    case "Get":
      return entry("Get", [table, key]);
  }
};

const transactItems = (model: ResolvedModel, transaction: ResolvedTransaction): string[] => [
  "TransactItems=[",
  ...pyIndent(
    transaction.participants.flatMap((participant) => [
      "{",
      ...pyIndent(writeItem(model, participant), 1),
      "},",
    ]),
    1,
  ),
  "]",
];

/** Result keys for a get transaction; repeated entities get their position appended. */
const resultKeys = (transaction: ResolvedTransaction): string[] =>
  transaction.participants.map((participant, position) =>
    transaction.participants.filter((other) => other.entity === participant.entity).length > 1
      ? `${participant.entity}_${position}`
      : participant.entity,
  );

const writeBody = (model: ResolvedModel, transaction: ResolvedTransaction): string[] => {
  const lines = [
    "self.client.transact_write_items(",
    ...pyIndent(transactItems(model, transaction), 1),
    ")",
  ];
  switch (transaction.returnShape) {
    case "boolean":
      lines.push("return True");
      break;
    case "object":
      lines.push('return {"success": True}');
      break;
    case "array":
      lines.push("return []");
      break;
  }
  return lines;
};

const getBody = (model: ResolvedModel, transaction: ResolvedTransaction): string[] => {
  const lines = [
    "response = self.client.transact_get_items(",
    ...pyIndent(transactItems(model, transaction), 1),
    ")",
    "items = [",
    '    self._deserialize(entry["Item"]) if "Item" in entry else None',
    '    for entry in response["Responses"]',
    "]",
  ];
  switch (transaction.returnShape) {
    case "boolean":
      lines.push("return all(item is not None for item in items)");
      break;
    case "object": {
      const keys = resultKeys(transaction);
      lines.push(
        "return {",
        ...keys.map((key, position) => `    ${JSON.stringify(key)}: items[${position}],`),
        "}",
      );
      break;
    }
    case "array":
      lines.push("return [item for item in items if item is not None]");
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
  const doc = pyDocstring([
    transaction.description,
    "",
    `Transaction #${transaction.id}: ${transaction.operation} across ${tables.join(", ")}`,
  ]);
  const body =
    transaction.operation === "TransactWrite"
      ? writeBody(model, transaction)
      : getBody(model, transaction);
  return [
    ...pyDef(
      profile.methodName(transaction.methodName),
      transaction.parameters.map(
        (param) => `${profile.identifier(param.name)}: ${profile.parameterType(param)}`,
      ),
      profile.returnType(transaction.returnShape, undefined),
    ),
    ...pyIndent([...doc, ...body], 1),
  ];
};

const HELPERS = [
  "def _serialize(self, value: dict[str, Any]) -> dict[str, Any]:",
  "    return {name: self._serializer.serialize(item) for name, item in value.items()}",
  "",
  "def _deserialize(self, value: dict[str, Any]) -> dict[str, Any]:",
  "    return {name: self._deserializer.deserialize(item) for name, item in value.items()}",
  "",
  "@staticmethod",
  "def _to_item(entity: ConfigurableEntity, pkey: str, skey: str | None) -> dict[str, Any]:",
  "    item = entity.model_dump(exclude_none=True)",
  "    item.update(entity.index_attributes())",
  "    item[pkey] = entity.pk()",
  "    if skey is not None:",
  "        item[skey] = entity.sk()",
  "    return item",
];

/** `transaction_service.py`: one method per cross-table pattern. */
export const renderPythonTransactionService = (
  model: ResolvedModel,
  profile: LanguageProfile,
  options: GenerationOptions,
): string => {
  const entityNames = [
    ...new Set(
      model.transactions.flatMap((transaction) =>
        transaction.parameters.flatMap((param) =>
          param.entityType === undefined ? [] : [param.entityType],
        ),
      ),
    ),
  ].sort();
  const tables = [
    ...new Set(
      model.transactions.flatMap((transaction) =>
        transaction.participants.map((participant) => participant.table),
      ),
    ),
  ].sort();

  const members = [
    "def __init__(self, table_names: dict[str, str] | None = None):",
    '    self.client = boto3.client("dynamodb")',
    "    self.table_names = {",
    ...tables.map(
      (table) => `        ${JSON.stringify(table)}: ${JSON.stringify(deployedTableName(options, table))},`,
    ),
    "    }",
    "    if table_names:",
    "        self.table_names.update(table_names)",
    "    self._serializer = TypeSerializer()",
    "    self._deserializer = TypeDeserializer()",
    "",
    ...HELPERS,
  ];
  for (const transaction of model.transactions) {
    members.push("", ...renderTransaction(model, transaction, profile));
  }

  const lines = [
    `# ${GENERATED_NOTICE}`,
    "from __future__ import annotations",
    "",
    "from decimal import Decimal",
    "from typing import Any",
    "",
    "import boto3",
    "from boto3.dynamodb.types import TypeDeserializer, TypeSerializer",
    "",
    "from base_repository import ConfigurableEntity",
  ];
  if (entityNames.length > 0) lines.push(`from entities import ${entityNames.join(", ")}`);
  lines.push(
    "",
    "",
    `class ${TRANSACTION_SERVICE}:`,
    ...pyIndent(pyDocstring(["Cross-table transactions over the low-level DynamoDB client."]), 1),
    "",
    ...pyIndent(members, 1),
  );
  return `${lines.join("\n")}\n`;
};
