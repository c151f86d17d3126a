import { type GenerationOptions, deployedTableName } from "../../config/options.js";
import type { LanguageProfile } from "../../languages/types.js";
import { repositoryName } from "../../resolver/pattern-registry.js";
import type { ResolvedEntity, ResolvedPattern } from "../../types/resolved.js";
import { toSnakeCase } from "../../utils/naming.js";
import { GENERATED_NOTICE, mergeNames, mergeValues } from "../shared.js";
import {
  pyDocstring,
  pyIndent,
  pyKeyDict,
  pyNamesDict,
  pyValuesDict,
} from "./syntax.js";

const MAX_LINE = 88;

const RAW_MAP = "dict[str, Any]";

const itemModel = (pattern: ResolvedPattern, entity: ResolvedEntity): string =>
  pattern.response === "mixed" || pattern.projection.itemShape === "raw-map"
    ? RAW_MAP
    : entity.name;

const returnAnnotation = (pattern: ResolvedPattern, entity: ResolvedEntity): string => {
  const model = itemModel(pattern, entity);
  switch (pattern.response) {
    case "single":
      return `${model} | None`;
    case "list":
    case "mixed":
      return pattern.paginated
        ? `tuple[list[${model}], dict[str, Any] | None]`
        : `list[${model}]`;
    case "boolean":
      return "bool";
    case "none":
      return "None";
  }
};

/** `def name(self, ...) -> T:`, one argument per line when it gets long. */
export const pyDef = (name: string, args: readonly string[], returns: string): string[] => {
  const all = ["self", ...args];
  const single = `def ${name}(${all.join(", ")}) -> ${returns}:`;
  if (single.length <= MAX_LINE) return [single];
  return [`def ${name}(`, ...all.map((arg) => `    ${arg},`), `) -> ${returns}:`];
};

const patternArguments = (
  pattern: ResolvedPattern,
  entity: ResolvedEntity,
  profile: LanguageProfile,
): string[] => {
  if (pattern.operation === "BatchGetItem") return ["keys: list[dict[str, Any]]"];
  if (pattern.operation === "BatchWriteItem") return [`entities: list[${entity.name}]`];

  const args = pattern.parameters.map(
    (param) => `${profile.identifier(param.name)}: ${profile.parameterType(param)}`,
  );
  if (pattern.paginated) {
    args.push("limit: int = 100", "exclusive_start_key: dict[str, Any] | None = None");
    if (itemModel(pattern, entity) !== RAW_MAP) args.push("skip_invalid_items: bool = True");
  }
  return args;
};

const patternDocstring = (pattern: ResolvedPattern): string[] => {
  const lines = [
    pattern.description,
    "",
    `Access pattern #${pattern.id}: ${pattern.operation}${pattern.indexName === undefined ? "" : ` on ${pattern.indexName}`}`,
  ];
  if (pattern.projection.itemShape === "raw-map") {
    const missing = pattern.projection.blockingFields;
    lines.push(
      missing.length > 0
        ? `${pattern.indexName ?? "The index"} projects ${pattern.projection.projection} without required field(s) ${missing.join(", ")}, so items are returned as dicts.`
        : `${pattern.indexName ?? "The index"} projects ${pattern.projection.projection}, so items are returned as dicts.`,
    );
  }
  if (pattern.renamedFrom !== undefined) {
    lines.push(`Named ${pattern.methodName} because ${pattern.renamedFrom} is a generated CRUD method.`);
  }
  return pyDocstring(lines);
};

/** Return statements for a call that yields the written entity. */
const returnWritten = (call: string, pattern: ResolvedPattern): string[] => {
  switch (pattern.response) {
    case "single":
      return [`return ${call}`];
    case "list":
      return [`return [${call}]`];
    case "mixed":
      return [`return [${call}.model_dump()]`];
    case "boolean":
      return [call, "return True"];
    case "none":
      return [call];
  }
};

/** Return statements for an optional item held in `variable`. */
const returnOptionalItem = (
  variable: string,
  pattern: ResolvedPattern,
  entity: ResolvedEntity,
): string[] => {
  const raw = itemModel(pattern, entity) === RAW_MAP;
  const build = raw ? variable : `self.model_class(**${variable})`;
  switch (pattern.response) {
    case "single":
      return [raw ? `return ${variable}` : `return ${build} if ${variable} else None`];
    case "list":
    case "mixed":
      return [`return [${build}] if ${variable} else []`];
    case "boolean":
      return [`return ${variable} is not None`];
    case "none":
      return [];
  }
};

const callLines = (call: string, args: readonly string[]): string[] => [
  `${call}(`,
  ...args.map((arg) => `    ${arg},`),
  ")",
];

const getItemBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => {
  const args = [`Key=${pyKeyDict(pattern.keys)}`];
  if (pattern.consistentRead) args.push("ConsistentRead=True");
  return [
    ...callLines("response = self.table.get_item", args),
    'item = response.get("Item")',
    ...returnOptionalItem("item", pattern, entity),
  ];
};

const deleteItemBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => [
  ...callLines("response = self.table.delete_item", [
    `Key=${pyKeyDict(pattern.keys)}`,
    'ReturnValues="ALL_OLD"',
  ]),
  'attributes = response.get("Attributes")',
  ...returnOptionalItem("attributes", pattern, entity),
];

const updateItemBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => {
  if (pattern.bodyParameter !== undefined) {
    return returnWritten(`self.update(${pattern.bodyParameter})`, pattern);
  }
  const { update } = pattern;
  if (update === undefined) {
    return ["# no attributes to set; returns the stored item", ...getItemBody(pattern, entity)];
  }

  const pk = pattern.keys.find((construction) => construction.part === "partition");
  const names = [
    ...mergeNames([update]),
    { alias: "#pk", attribute: pk?.key.attributes[0] ?? "pk" },
  ];
  return [
    ...callLines("response = self.table.update_item", [
      `Key=${pyKeyDict(pattern.keys)}`,
      `UpdateExpression=${JSON.stringify(update.expression)}`,
      'ConditionExpression="attribute_exists(#pk)"',
      `ExpressionAttributeNames=${pyNamesDict(names)}`,
      `ExpressionAttributeValues=${pyValuesDict(update.values, pattern.keys)}`,
      'ReturnValues="ALL_NEW"',
    ]),
    'attributes = response.get("Attributes")',
    ...returnOptionalItem("attributes", pattern, entity),
  ];
};

const readBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => {
  const plans = [pattern.keyCondition, pattern.filter];
  const names = mergeNames(plans);
  const values = mergeValues(plans);

  const entries: string[] = [];
  if (pattern.indexName !== undefined) {
    entries.push(`"IndexName": ${JSON.stringify(pattern.indexName)},`);
  }
  if (pattern.keyCondition !== undefined) {
    entries.push(`"KeyConditionExpression": ${JSON.stringify(pattern.keyCondition.expression)},`);
  }
  if (pattern.filter !== undefined) {
    entries.push(`"FilterExpression": ${JSON.stringify(pattern.filter.expression)},`);
  }
  if (names.length > 0) entries.push(`"ExpressionAttributeNames": ${pyNamesDict(names)},`);
  if (values.length > 0) {
    entries.push(`"ExpressionAttributeValues": ${pyValuesDict(values, pattern.keys)},`);
  }
  if (pattern.consistentRead) entries.push('"ConsistentRead": True,');

  const method = pattern.operation === "Query" ? "query" : "scan";
  const lines = ["args: dict[str, Any] = {", ...pyIndent(entries, 1), "}"];
  if (pattern.paginated) lines.push("args.update(self._page_args(limit, exclusive_start_key))");
  lines.push(`response = self.table.${method}(**args)`);

  const raw = itemModel(pattern, entity) === RAW_MAP;
  switch (pattern.response) {
    case "list":
    case "mixed":
      lines.push(
        raw
          ? 'return response.get("Items", []), response.get("LastEvaluatedKey")'
          : "return self._parse_query_response(response, skip_invalid_items)",
      );
      break;
    case "single":
      lines.push(
        raw ? 'items = response.get("Items", [])' : "items, _ = self._parse_query_response(response)",
        "return items[0] if items else None",
      );
      break;
    case "boolean":
      lines.push('return len(response.get("Items", [])) > 0');
      break;
    case "none":
      break;
  }
  return lines;
};

const lookupCall = (
  entity: ResolvedEntity,
  construction: "pk" | "sk",
  fields: readonly string[],
  argument: (field: string) => string,
): string =>
  `${entity.name}.build_${construction}_for_lookup(${fields.map(argument).join(", ")})`;

const batchGetBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => {
  const fromKey = (field: string): string => `key[${JSON.stringify(field)}]`;
  const keyArgs = [lookupCall(entity, "pk", entity.partitionKey.fields, fromKey)];
  if (entity.sortKey !== undefined) {
    keyArgs.push(lookupCall(entity, "sk", entity.sortKey.fields, fromKey));
  }
  const lines = [
    "request_keys = [",
    `    self._key(${keyArgs.join(", ")})`,
    "    for key in keys",
    "]",
    "items = self.batch_get(request_keys)",
  ];
  switch (pattern.response) {
    case "single":
      lines.push("return items[0] if items else None");
      break;
    case "list":
      lines.push("return items");
      break;
    case "mixed":
      lines.push("return [item.model_dump() for item in items]");
      break;
    case "boolean":
      lines.push("return len(items) > 0");
      break;
    case "none":
      break;
  }
  return lines;
};

const batchWriteBody = (pattern: ResolvedPattern): string[] => {
  switch (pattern.response) {
    case "boolean":
      return ["return self.batch_write(entities)"];
    case "single":
      return ["self.batch_write(entities)", "return entities[0] if entities else None"];
    case "list":
      return ["self.batch_write(entities)", "return entities"];
    case "mixed":
      return ["self.batch_write(entities)", "return [entity.model_dump() for entity in entities]"];
    case "none":
      return ["self.batch_write(entities)"];
  }
};

const patternBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => {
  switch (pattern.operation) {
    case "GetItem":
      return getItemBody(pattern, entity);
    case "PutItem":
      return returnWritten(`self.put(${pattern.bodyParameter ?? "entity"})`, pattern);
    case "DeleteItem":
      return deleteItemBody(pattern, entity);
    case "UpdateItem":
      return updateItemBody(pattern, entity);
    case "Query":
    case "Scan":
      return readBody(pattern, entity);
    case "BatchGetItem":
      return batchGetBody(pattern, entity);
    case "BatchWriteItem":
      return batchWriteBody(pattern);
  }
};

const renderPattern = (
  pattern: ResolvedPattern,
  entity: ResolvedEntity,
  profile: LanguageProfile,
): string[] => {
  const body = [...patternDocstring(pattern), ...patternBody(pattern, entity)];
  return [
    ...pyDef(
      profile.methodName(pattern.methodName),
      patternArguments(pattern, entity, profile),
      returnAnnotation(pattern, entity),
    ),
    ...pyIndent(body, 1),
  ];
};

const keyLookups = (entity: ResolvedEntity): string[] => {
  const lines = [`pk = ${lookupCall(entity, "pk", entity.partitionKey.fields, (field) => field)}`];
  if (entity.sortKey !== undefined) {
    lines.push(`sk = ${lookupCall(entity, "sk", entity.sortKey.fields, (field) => field)}`);
  }
  return lines;
};

const servesNote = (entity: ResolvedEntity, methodName: string): string[] => {
  const served = entity.foldedPatterns.filter((pattern) => pattern.methodName === methodName);
  return served.length === 0
    ? []
    : [`Serves access pattern${served.length > 1 ? "s" : ""} ${served.map((pattern) => `#${pattern.id}`).join(", ")}.`];
};

const renderCrud = (entity: ResolvedEntity, profile: LanguageProfile): string[] => {
  const { crud } = entity;
  const variable = toSnakeCase(entity.name);
  const keyArgs = crud.keyParameters.map(
    (param) => `${param.name}: ${profile.parameterType(param)}`,
  );
  const sortArgument = entity.sortKey === undefined ? "" : ", sk";
  const method = (
    name: string,
    args: readonly string[],
    returns: string,
    doc: string,
    body: readonly string[],
  ): string[] => [
    ...pyDef(name, args, returns),
    ...pyIndent([...pyDocstring([doc, ...servesNote(entity, name)]), ...body], 1),
  ];

  return [
    "# Basic CRUD operations",
    ...method(
      crud.create,
      [`${variable}: ${entity.name}`],
      entity.name,
      `Create a new ${entity.name}; fails when it already exists`,
      [`return self.create(${variable})`],
    ),
    "",
    ...method(crud.get, keyArgs, `${entity.name} | None`, `Get a ${entity.name} by its primary key`, [
      ...keyLookups(entity),
      `return self.get(pk${sortArgument}${crud.getConsistentRead ? ", consistent_read=True" : ""})`,
    ]),
    "",
    ...method(
      crud.update,
      [`${variable}: ${entity.name}`],
      entity.name,
      `Replace an existing ${entity.name}`,
      [`return self.update(${variable})`],
    ),
    "",
    ...method(crud.delete, keyArgs, "bool", `Delete a ${entity.name} by its primary key`, [
      ...keyLookups(entity),
      `return self.delete(pk${sortArgument})`,
    ]),
  ];
};

const renderRepository = (
  entity: ResolvedEntity,
  profile: LanguageProfile,
  options: GenerationOptions,
): string[] => {
  const tableName = deployedTableName(options, entity.table);
  const attributes = [entity.partitionKey.attributes[0], entity.sortKey?.attributes[0]]
    .filter((name): name is string => name !== undefined)
    .map((name) => JSON.stringify(name));
  const doc = [`Repository for ${entity.name} entities in table ${tableName}`];
  if (entity.itemCollectionPeers.length > 0) {
    doc.push("", `Shares partitions with: ${entity.itemCollectionPeers.join(", ")}`);
  }

  const members: string[] = [
    `def __init__(self, table_name: str = ${JSON.stringify(tableName)}):`,
    `    super().__init__(${entity.name}, table_name, ${attributes.join(", ")})`,
    "",
    ...renderCrud(entity, profile),
  ];
  if (entity.patterns.length > 0) {
    members.push("", "# Access patterns");
    entity.patterns.forEach((pattern, position) => {
      if (position > 0) members.push("");
      members.push(...renderPattern(pattern, entity, profile));
    });
  }

  return [
    `class ${repositoryName(entity.name)}(BaseRepository[${entity.name}]):`,
    ...pyIndent(pyDocstring(doc), 1),
    "",
    ...pyIndent(members, 1),
  ];
};

/** `repositories.py`: one repository class per entity. */
export const renderPythonRepositories = (
  entities: readonly ResolvedEntity[],
  profile: LanguageProfile,
  options: GenerationOptions,
): string => {
  const lines = [
    `# ${GENERATED_NOTICE}`,
    "from __future__ import annotations",
    "",
    "from decimal import Decimal",
    "from typing import Any",
    "",
    "from base_repository import BaseRepository",
    `from entities import ${entities.map((entity) => entity.name).join(", ")}`,
  ];
  for (const entity of entities) {
    lines.push("", "", ...renderRepository(entity, profile, options));
  }
  return `${lines.join("\n")}\n`;
};
