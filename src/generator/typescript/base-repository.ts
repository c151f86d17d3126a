import { GENERATED_NOTICE } from "../shared.js";

const BASE_REPOSITORY = [
  `// ${GENERATED_NOTICE}`,
  'import { DynamoDBClient } from "@aws-sdk/client-dynamodb";',
  "import {",
  "  BatchGetCommand,",
  "  BatchWriteCommand,",
  "  DeleteCommand,",
  "  DynamoDBDocumentClient,",
  "  GetCommand,",
  "  PutCommand,",
  "  type QueryCommandOutput,",
  "  type ScanCommandOutput,",
  '} from "@aws-sdk/lib-dynamodb";',
  "",
  "export type KeyValue = string | number;",
  "",
  "export type Key = Record<string, KeyValue>;",
  "",
  "/** Key construction rules for one entity type. */",
  "export interface EntityConfig<T> {",
  "  readonly entityType: string;",
  "  readonly partitionKey: (entity: T) => KeyValue;",
  "  readonly sortKey?: (entity: T) => KeyValue;",
  "  readonly sortKeyPrefix?: string;",
  "  readonly indexAttributes?: (entity: T) => Record<string, KeyValue | readonly KeyValue[]>;",
  "}",
  "",
  "export interface PageOptions {",
  "  readonly limit?: number;",
  "  readonly exclusiveStartKey?: Record<string, unknown>;",
  "}",
  "",
  "export interface Page<T> {",
  "  readonly items: T[];",
  "  readonly lastEvaluatedKey?: Record<string, unknown>;",
  "}",
  "",
  "const BATCH_GET_LIMIT = 100;",
  "const BATCH_WRITE_LIMIT = 25;",
  "",
  "export const createDocumentClient = (): DynamoDBDocumentClient =>",
  "  DynamoDBDocumentClient.from(new DynamoDBClient({}), {",
  "    marshallOptions: { removeUndefinedValues: true },",
  "  });",
  "",
  "/** The stored item of an entity: its fields plus every key attribute. */",
  "export const toStoredItem = <T extends object>(",
  "  entity: T,",
  "  config: EntityConfig<T>,",
  "  partitionKeyName: string,",
  "  sortKeyName?: string,",
  "): Record<string, unknown> => {",
  "  const item: Record<string, unknown> = { ...entity, ...config.indexAttributes?.(entity) };",
  "  item[partitionKeyName] = config.partitionKey(entity);",
  "  if (sortKeyName !== undefined && config.sortKey !== undefined) {",
  "    item[sortKeyName] = config.sortKey(entity);",
  "  }",
  "  return item;",
  "};",
  "",
  "const chunk = <T>(values: readonly T[], size: number): T[][] => {",
  "  const chunks: T[][] = [];",
  "  for (let start = 0; start < values.length; start += size) {",
  "    chunks.push(values.slice(start, start + size));",
  "  }",
  "  return chunks;",
  "};",
  "",
  "const isConditionFailure = (error: unknown): boolean =>",
  '  error instanceof Error && error.name === "ConditionalCheckFailedException";',
  "",
  "/** CRUD operations and response parsing shared by the generated repositories. */",
  "export class BaseRepository<T extends object> {",
  "  constructor(",
  "    protected readonly config: EntityConfig<T>,",
  "    protected readonly tableName: string,",
  "    protected readonly partitionKeyName: string,",
  "    protected readonly sortKeyName?: string,",
  "    protected readonly client: DynamoDBDocumentClient = createDocumentClient(),",
  "  ) {}",
  "",
  "  protected key(pk: KeyValue, sk?: KeyValue): Key {",
  "    const key: Key = { [this.partitionKeyName]: pk };",
  "    if (this.sortKeyName !== undefined && sk !== undefined) key[this.sortKeyName] = sk;",
  "    return key;",
  "  }",
  "",
  "  protected toItem(entity: T): Record<string, unknown> {",
  "    return toStoredItem(entity, this.config, this.partitionKeyName, this.sortKeyName);",
  "  }",
  "",
  "  protected fromItem(item: Record<string, unknown>): T {",
  "    return item as T;",
  "  }",
  "",
  "  async create(entity: T): Promise<T> {",
  "    try {",
  "      await this.client.send(",
  "        new PutCommand({",
  "          TableName: this.tableName,",
  "          Item: this.toItem(entity),",
  '          ConditionExpression: "attribute_not_exists(#pk)",',
  '          ExpressionAttributeNames: { "#pk": this.partitionKeyName },',
  "        }),",
  "      );",
  "    } catch (error) {",
  "      if (isConditionFailure(error)) {",
  "        throw new Error(`${this.config.entityType} already exists`, { cause: error });",
  "      }",
  "      throw error;",
  "    }",
  "    return entity;",
  "  }",
  "",
  "  async put(entity: T): Promise<T> {",
  "    await this.client.send(new PutCommand({ TableName: this.tableName, Item: this.toItem(entity) }));",
  "    return entity;",
  "  }",
  "",
  "  async get(pk: KeyValue, sk?: KeyValue, consistentRead = false): Promise<T | undefined> {",
  "    const { Item } = await this.client.send(",
  "      new GetCommand({",
  "        TableName: this.tableName,",
  "        Key: this.key(pk, sk),",
  "        ConsistentRead: consistentRead,",
  "      }),",
  "    );",
  "    return Item === undefined ? undefined : this.fromItem(Item);",
  "  }",
  "",
  "  async update(entity: T): Promise<T> {",
  "    try {",
  "      await this.client.send(",
  "        new PutCommand({",
  "          TableName: this.tableName,",
  "          Item: this.toItem(entity),",
  '          ConditionExpression: "attribute_exists(#pk)",',
  '          ExpressionAttributeNames: { "#pk": this.partitionKeyName },',
  "        }),",
  "      );",
  "    } catch (error) {",
  "      if (isConditionFailure(error)) {",
  "        throw new Error(`${this.config.entityType} not found`, { cause: error });",
  "      }",
  "      throw error;",
  "    }",
  "    return entity;",
  "  }",
  "",
  "  async delete(pk: KeyValue, sk?: KeyValue): Promise<boolean> {",
  "    const { Attributes } = await this.client.send(",
  "      new DeleteCommand({",
  "        TableName: this.tableName,",
  "        Key: this.key(pk, sk),",
  '        ReturnValues: "ALL_OLD",',
  "      }),",
  "    );",
  "    return Attributes !== undefined;",
  "  }",
  "",
  "  async batchGet(keys: readonly Key[]): Promise<T[]> {",
  "    const items: Record<string, unknown>[] = [];",
  "    for (const batch of chunk(keys, BATCH_GET_LIMIT)) {",
  "      let pending: Record<string, unknown>[] = batch;",
  "      while (pending.length > 0) {",
  "        const { Responses, UnprocessedKeys } = await this.client.send(",
  "          new BatchGetCommand({ RequestItems: { [this.tableName]: { Keys: pending } } }),",
  "        );",
  "        items.push(...(Responses?.[this.tableName] ?? []));",
  "        pending = UnprocessedKeys?.[this.tableName]?.Keys ?? [];",
  "      }",
  "    }",
  "    return items.map((item) => this.fromItem(item));",
  "  }",
  "",
  "  async batchWrite(entities: readonly T[]): Promise<boolean> {",
  "    for (const batch of chunk(entities, BATCH_WRITE_LIMIT)) {",
  "      let requests = batch.map((entity) => ({ PutRequest: { Item: this.toItem(entity) } }));",
  "      while (requests.length > 0) {",
  "        const { UnprocessedItems } = await this.client.send(",
  "          new BatchWriteCommand({ RequestItems: { [this.tableName]: requests } }),",
  "        );",
  "        requests = (UnprocessedItems?.[this.tableName] ?? []).flatMap((request) =>",
  "          request.PutRequest?.Item === undefined ? [] : [{ PutRequest: { Item: request.PutRequest.Item } }],",
  "        );",
  "      }",
  "    }",
  "    return true;",
  "  }",
  "",
  "  protected static pageArgs(options: PageOptions): {",
  "    Limit: number;",
  "    ExclusiveStartKey?: Record<string, unknown>;",
  "  } {",
  "    return { Limit: options.limit ?? 100, ExclusiveStartKey: options.exclusiveStartKey };",
  "  }",
  "",
  "  protected toPage(output: QueryCommandOutput | ScanCommandOutput): Page<T> {",
  "    return {",
  "      items: (output.Items ?? []).map((item) => this.fromItem(item)),",
  "      lastEvaluatedKey: output.LastEvaluatedKey,",
  "    };",
  "  }",
  "}",
];

/** `base-repository.ts`: entity configuration and the generic repository. */
export const renderTypeScriptBaseRepository = (): string => `${BASE_REPOSITORY.join("\n")}\n`;
