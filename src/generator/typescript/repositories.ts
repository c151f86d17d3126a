import { type GenerationOptions, deployedTableName } from "../../config/options.js";
import type { LanguageProfile } from "../../languages/types.js";
import { repositoryName } from "../../resolver/pattern-registry.js";
import type { AccessOperation } from "../../types/enums.js";
import type { ResolvedEntity, ResolvedPattern } from "../../types/resolved.js";
import { toCamelCase } from "../../utils/naming.js";
import { GENERATED_NOTICE, mergeNames, mergeValues } from "../shared.js";
import { configName, keysName } from "./entities.js";
import { tsDoc, tsIndent, tsKeyObject, tsNamesObject, tsValuesObject } from "./syntax.js";

const MAX_LINE = 100;

const RAW_MAP = "Record<string, unknown>";

const COMMANDS: Partial<Record<AccessOperation, string>> = {
  GetItem: "GetCommand",
  DeleteItem: "DeleteCommand",
  UpdateItem: "UpdateCommand",
  Query: "QueryCommand",
  Scan: "ScanCommand",
};

const isRaw = (pattern: ResolvedPattern): boolean =>
  pattern.response === "mixed" || pattern.projection.itemShape === "raw-map";

const itemModel = (pattern: ResolvedPattern, entity: ResolvedEntity): string =>
  isRaw(pattern) ? RAW_MAP : entity.name;

const resultType = (pattern: ResolvedPattern, entity: ResolvedEntity): string => {
  const model = itemModel(pattern, entity);
  switch (pattern.response) {
    case "single":
      return `${model} | undefined`;
    case "list":
    case "mixed":
      return pattern.paginated ? `Page<${model}>` : `${model}[]`;
    case "boolean":
      return "boolean";
    case "none":
      return "void";
  }
};

/** `async name(...): Promise<T> {`, one argument per line when it gets long. */
export const tsMethodHead = (name: string, args: readonly string[], returns: string): string[] => {
  const single = `async ${name}(${args.join(", ")}): Promise<${returns}> {`;
  if (single.length + 2 <= MAX_LINE) return [single];
  return [`async ${name}(`, ...args.map((arg) => `  ${arg},`), `): Promise<${returns}> {`];
};

const keyFieldsPick = (entity: ResolvedEntity): string =>
  `Pick<${entity.name}, ${entity.crud.keyParameters.map((param) => JSON.stringify(param.name)).join(" | ")}>`;

const patternArguments = (
  pattern: ResolvedPattern,
  entity: ResolvedEntity,
  profile: LanguageProfile,
): string[] => {
  if (pattern.operation === "BatchGetItem") return [`keys: readonly ${keyFieldsPick(entity)}[]`];
  if (pattern.operation === "BatchWriteItem") return [`entities: readonly ${entity.name}[]`];

  const args = pattern.parameters.map(
    (param) => `${profile.identifier(param.name)}: ${profile.parameterType(param)}`,
  );
  if (pattern.paginated) args.push("options: PageOptions = {}");
  return args;
};

const patternDoc = (pattern: ResolvedPattern): string[] => {
  const lines = [
    pattern.description,
    "",
    `Access pattern #${pattern.id}: ${pattern.operation}${pattern.indexName === undefined ? "" : ` on ${pattern.indexName}`}`,
  ];
  if (pattern.projection.itemShape === "raw-map") {
    const missing = pattern.projection.blockingFields;
    lines.push(
      missing.length > 0
        ? `${pattern.indexName ?? "The index"} projects ${pattern.projection.projection} without required field(s) ${missing.join(", ")}, so items are returned as plain records.`
        : `${pattern.indexName ?? "The index"} projects ${pattern.projection.projection}, so items are returned as plain records.`,
    );
  }
  if (pattern.renamedFrom !== undefined) {
    lines.push(
      `Named ${toCamelCase(pattern.methodName)} because ${toCamelCase(pattern.renamedFrom)} is a generated CRUD method.`,
    );
  }
  return tsDoc(lines);
};

const returnWritten = (call: string, pattern: ResolvedPattern): string[] => {
  switch (pattern.response) {
    case "single":
      return [`return ${call};`];
    case "list":
      return [`return [${call}];`];
    case "mixed":
      return [`return [{ ...(${call}) }];`];
    case "boolean":
      return [`${call};`, "return true;"];
    case "none":
      return [`${call};`];
  }
};

const returnOptionalItem = (
  variable: string,
  pattern: ResolvedPattern,
): string[] => {
  const raw = isRaw(pattern);
  const build = raw ? variable : `this.fromItem(${variable})`;
  switch (pattern.response) {
    case "single":
      return [raw ? `return ${variable};` : `return ${variable} === undefined ? undefined : ${build};`];
    case "list":
    case "mixed":
      return [`return ${variable} === undefined ? [] : [${build}];`];
    case "boolean":
      return [`return ${variable} !== undefined;`];
    case "none":
      return [];
  }
};

/** `const { Out } = await this.client.send(new Command({...}));` */
const sendLines = (
  destructure: string,
  command: string,
  members: readonly string[],
): string[] => [
  `const ${destructure} = await this.client.send(`,
  `  new ${command}({`,
  "    TableName: this.tableName,",
  ...tsIndent(members.map((member) => `${member},`), 2),
  "  }),",
  ");",
];

const getItemBody = (pattern: ResolvedPattern): string[] => {
  const members = [`Key: ${tsKeyObject(pattern.keys)}`];
  if (pattern.consistentRead) members.push("ConsistentRead: true");
  return [...sendLines("{ Item }", "GetCommand", members), ...returnOptionalItem("Item", pattern)];
};

const deleteItemBody = (pattern: ResolvedPattern): string[] => [
  ...sendLines("{ Attributes }", "DeleteCommand", [
    `Key: ${tsKeyObject(pattern.keys)}`,
    'ReturnValues: "ALL_OLD"',
  ]),
  ...returnOptionalItem("Attributes", pattern),
];

const updateItemBody = (pattern: ResolvedPattern): string[] => {
  if (pattern.bodyParameter !== undefined) {
    return returnWritten(`await this.update(${toCamelCase(pattern.bodyParameter)})`, pattern);
  }
  const { update } = pattern;
  if (update === undefined) {
    return ["// no attributes to set; returns the stored item", ...getItemBody(pattern)];
  }
  const pk = pattern.keys.find((construction) => construction.part === "partition");
  const names = [
    ...mergeNames([update]),
    { alias: "#pk", attribute: pk?.key.attributes[0] ?? "pk" },
  ];
  return [
    ...sendLines("{ Attributes }", "UpdateCommand", [
      `Key: ${tsKeyObject(pattern.keys)}`,
      `UpdateExpression: ${JSON.stringify(update.expression)}`,
      'ConditionExpression: "attribute_exists(#pk)"',
      `ExpressionAttributeNames: ${tsNamesObject(names)}`,
      `ExpressionAttributeValues: ${tsValuesObject(update.values, pattern.keys)}`,
      'ReturnValues: "ALL_NEW"',
    ]),
    ...returnOptionalItem("Attributes", pattern),
  ];
};

const readBody = (pattern: ResolvedPattern): string[] => {
  const plans = [pattern.keyCondition, pattern.filter];
  const names = mergeNames(plans);
  const values = mergeValues(plans);

  const members: string[] = [];
  if (pattern.indexName !== undefined) members.push(`IndexName: ${JSON.stringify(pattern.indexName)}`);
  if (pattern.keyCondition !== undefined) {
    members.push(`KeyConditionExpression: ${JSON.stringify(pattern.keyCondition.expression)}`);
  }
  if (pattern.filter !== undefined) {
    members.push(`FilterExpression: ${JSON.stringify(pattern.filter.expression)}`);
  }
  if (names.length > 0) members.push(`ExpressionAttributeNames: ${tsNamesObject(names)}`);
  if (values.length > 0) {
    members.push(`ExpressionAttributeValues: ${tsValuesObject(values, pattern.keys)}`);
  }
  if (pattern.consistentRead) members.push("ConsistentRead: true");
  if (pattern.paginated) members.push("...BaseRepository.pageArgs(options)");

  const command = pattern.operation === "Query" ? "QueryCommand" : "ScanCommand";
  const lines = sendLines("output", command, members);
  const raw = isRaw(pattern);
  switch (pattern.response) {
    case "list":
    case "mixed":
      lines.push(
        raw
          ? "return { items: output.Items ?? [], lastEvaluatedKey: output.LastEvaluatedKey };"
          : "return this.toPage(output);",
      );
      break;
    case "single":
      lines.push(raw ? "return output.Items?.[0];" : "return this.toPage(output).items[0];");
      break;
    case "boolean":
      lines.push("return (output.Items ?? []).length > 0;");
      break;
    case "none":
      break;
  }
  return lines;
};

const batchGetBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => {
  const lookup = (part: "partition" | "sort", fields: readonly string[]): string =>
    `${keysName(entity.name)}.${part}(${fields.map((field) => `key.${field}`).join(", ")})`;
  const keyArgs = [lookup("partition", entity.partitionKey.fields)];
  if (entity.sortKey !== undefined) keyArgs.push(lookup("sort", entity.sortKey.fields));
  const lines = [
    "const items = await this.batchGet(",
    `  keys.map((key) => this.key(${keyArgs.join(", ")})),`,
    ");",
  ];
  switch (pattern.response) {
    case "single":
      lines.push("return items[0];");
      break;
    case "list":
      lines.push("return items;");
      break;
    case "mixed":
      lines.push("return items.map((item) => ({ ...item }));");
      break;
    case "boolean":
      lines.push("return items.length > 0;");
      break;
    case "none":
      break;
  }
  return lines;
};

const batchWriteBody = (pattern: ResolvedPattern): string[] => {
  switch (pattern.response) {
    case "boolean":
      return ["return this.batchWrite(entities);"];
    case "single":
      return ["await this.batchWrite(entities);", "return entities[0];"];
    case "list":
      return ["await this.batchWrite(entities);", "return [...entities];"];
    case "mixed":
      return ["await this.batchWrite(entities);", "return entities.map((entity) => ({ ...entity }));"];
    case "none":
      return ["await this.batchWrite(entities);"];
  }
};

const patternBody = (pattern: ResolvedPattern, entity: ResolvedEntity): string[] => {
  switch (pattern.operation) {
    case "GetItem":
      return getItemBody(pattern);
    case "PutItem":
      return returnWritten(`await this.put(${toCamelCase(pattern.bodyParameter ?? "entity")})`, pattern);
    case "DeleteItem":
      return deleteItemBody(pattern);
    case "UpdateItem":
      return updateItemBody(pattern);
    case "Query":
    case "Scan":
      return readBody(pattern);
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
): string[] => [
  ...patternDoc(pattern),
  ...tsMethodHead(
    profile.methodName(pattern.methodName),
    patternArguments(pattern, entity, profile),
    resultType(pattern, entity),
  ),
  ...tsIndent(patternBody(pattern, entity), 1),
  "}",
];

const keyLookups = (entity: ResolvedEntity): string => {
  const args = [
    `${keysName(entity.name)}.partition(${entity.partitionKey.fields.map(toCamelCase).join(", ")})`,
  ];
  if (entity.sortKey !== undefined) {
    args.push(`${keysName(entity.name)}.sort(${entity.sortKey.fields.map(toCamelCase).join(", ")})`);
  }
  return args.join(", ");
};

const servesNote = (entity: ResolvedEntity, methodName: string): string[] => {
  const served = entity.foldedPatterns.filter((pattern) => pattern.methodName === methodName);
  return served.length === 0
    ? []
    : [`Serves access pattern${served.length > 1 ? "s" : ""} ${served.map((pattern) => `#${pattern.id}`).join(", ")}.`];
};

const renderCrud = (entity: ResolvedEntity, profile: LanguageProfile): string[] => {
  const { crud } = entity;
  const variable = toCamelCase(entity.name);
  const keyArgs = crud.keyParameters.map(
    (param) => `${toCamelCase(param.name)}: ${profile.parameterType(param)}`,
  );
  const method = (
    name: string,
    args: readonly string[],
    returns: string,
    doc: string,
    body: readonly string[],
  ): string[] => [
    ...tsDoc([doc, ...servesNote(entity, name)]),
    ...tsMethodHead(profile.methodName(name), args, returns),
    ...tsIndent(body, 1),
    "}",
  ];
  const sortless = entity.sortKey === undefined ? ", undefined" : "";

  return [
    "// Basic CRUD operations",
    "",
    ...method(
      crud.create,
      [`${variable}: ${entity.name}`],
      entity.name,
      `Create a new ${entity.name}; fails when it already exists`,
      [`return this.create(${variable});`],
    ),
    "",
    ...method(crud.get, keyArgs, `${entity.name} | undefined`, `Get a ${entity.name} by its primary key`, [
      crud.getConsistentRead
        ? `return this.get(${keyLookups(entity)}${sortless}, true);`
        : `return this.get(${keyLookups(entity)});`,
    ]),
    "",
    ...method(
      crud.update,
      [`${variable}: ${entity.name}`],
      entity.name,
      `Replace an existing ${entity.name}`,
      [`return this.update(${variable});`],
    ),
    "",
    ...method(crud.delete, keyArgs, "boolean", `Delete a ${entity.name} by its primary key`, [
      `return this.delete(${keyLookups(entity)});`,
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

  const members = [
    `constructor(tableName = ${JSON.stringify(tableName)}, client?: DynamoDBDocumentClient) {`,
    `  super(${configName(entity.name)}, tableName, ${attributes.join(", ")}${entity.sortKey === undefined ? ", undefined" : ""}, client);`,
    "}",
    "",
    ...renderCrud(entity, profile),
  ];
  if (entity.patterns.length > 0) {
    members.push("", "// Access patterns");
    for (const pattern of entity.patterns) {
      members.push("", ...renderPattern(pattern, entity, profile));
    }
  }

  return [
    ...tsDoc(doc),
    `export class ${repositoryName(entity.name)} extends BaseRepository<${entity.name}> {`,
    ...tsIndent(members, 1),
    "}",
  ];
};

/** `repositories.ts`: one repository class per entity. */
export const renderTypeScriptRepositories = (
  entities: readonly ResolvedEntity[],
  profile: LanguageProfile,
  options: GenerationOptions,
): string => {
  const patterns = entities.flatMap((entity) => entity.patterns);
  const commands = [
    ...new Set(
      patterns.flatMap((pattern) => {
        if (pattern.operation === "UpdateItem") {
          if (pattern.bodyParameter !== undefined) return [];
          return pattern.update === undefined ? ["GetCommand"] : ["UpdateCommand"];
        }
        const command = COMMANDS[pattern.operation];
        return command === undefined ? [] : [command];
      }),
    ),
  ].sort();
  const usesPages = patterns.some((pattern) => pattern.paginated);

  const baseImports = ["BaseRepository"];
  if (usesPages) baseImports.push("type Page", "type PageOptions");

  const entityImports = entities.flatMap((entity) => [
    `type ${entity.name}`,
    configName(entity.name),
    keysName(entity.name),
  ]);

  const lines = [
    `// ${GENERATED_NOTICE}`,
    `import { ${[...commands, "type DynamoDBDocumentClient"].join(", ")} } from "@aws-sdk/lib-dynamodb";`,
    `import { ${baseImports.join(", ")} } from "./base-repository.js";`,
    `import { ${entityImports.join(", ")} } from "./entities.js";`,
  ];
  for (const entity of entities) {
    lines.push("", ...renderRepository(entity, profile, options));
  }
  return `${lines.join("\n")}\n`;
};
