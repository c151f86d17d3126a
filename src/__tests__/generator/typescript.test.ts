import { describe, it, expect } from "vitest";
import { DEFAULT_GENERATION_OPTIONS, type GenerationOptions } from "../../config/options.js";
import { renderTypeScriptEntities } from "../../generator/typescript/entities.js";
import { renderTypeScriptRepositories } from "../../generator/typescript/repositories.js";
import { renderTypeScriptTransactionService } from "../../generator/typescript/transaction-service.js";
import { renderTypeScriptUsageExamples } from "../../generator/typescript/usage-examples.js";
import { createUsageLookup } from "../../languages/sample-values.js";
import { typescriptProfile } from "../../languages/typescript.js";
import { loadUsageData } from "../../loader/load-usage-data.js";
import { resolveSchema, usageDocument, usersSchema } from "../fixtures.js";
import { trimmedLines } from "./helpers.js";

const model = resolveSchema(usersSchema());

describe("renderTypeScriptEntities()", () => {
  const lines = trimmedLines(renderTypeScriptEntities(model.entities, typescriptProfile));

  it("declares an interface per entity", () => {
    expect(lines).toContain("export interface User {");
    expect(lines).toContain("created_at: number;");
    expect(lines).toContain("nickname?: string;");
  });

  it("builds the key configuration from the templates", () => {
    expect(lines).toContain("export const userConfig: EntityConfig<User> = {");
    expect(lines).toContain('entityType: "USER",');
    expect(lines).toContain("partitionKey: (entity) => `USER#${entity.user_id}`,");
    expect(lines).toContain('sortKey: (entity) => "PROFILE",');
    expect(lines).toContain('sortKeyPrefix: "PROFILE",');
    expect(lines).toContain("gsi1pk: `STATUS#${entity.status}`,");
    expect(lines).toContain("gsi1sk: entity.created_at,");
  });

  it("exports lookup key builders with camelCase arguments", () => {
    expect(lines).toContain("export const userKeys = {");
    expect(lines).toContain("partition: (userId: string): KeyValue => `USER#${userId}`,");
    expect(lines).toContain('sort: (): KeyValue => "PROFILE",');
    expect(lines).toContain("statusIndexPartition: (status: string): KeyValue => `STATUS#${status}`,");
    expect(lines).toContain("statusIndexSort: (createdAt: number): KeyValue => createdAt,");
  });
});

describe("renderTypeScriptRepositories()", () => {
  const render = (options: GenerationOptions = DEFAULT_GENERATION_OPTIONS): string[] =>
    trimmedLines(renderTypeScriptRepositories(model.entities, typescriptProfile, options));

  it("imports only the commands the patterns send", () => {
    const lines = render();
    expect(lines).toContain(
      'import { QueryCommand, UpdateCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";',
    );
    expect(lines).toContain(
      'import { BaseRepository, type Page, type PageOptions } from "./base-repository.js";',
    );
    expect(lines).toContain(
      'import { type User, userConfig, userKeys, type Order, orderConfig, orderKeys } from "./entities.js";',
    );
  });

  it("defaults the table name, honoring overrides", () => {
    expect(render()).toContain('constructor(tableName = "Users", client?: DynamoDBDocumentClient) {');
    expect(render()).toContain('super(userConfig, tableName, "pk", "sk", client);');
    const overridden = render({ ...DEFAULT_GENERATION_OPTIONS, tableNameOverrides: { Users: "prod-users" } });
    expect(overridden).toContain(
      'constructor(tableName = "prod-users", client?: DynamoDBDocumentClient) {',
    );
  });

  it("reads consistently in the CRUD get", () => {
    const lines = render();
    expect(lines).toContain("async getUser(userId: string): Promise<User | undefined> {");
    expect(lines).toContain("return this.get(userKeys.partition(userId), userKeys.sort(), true);");
  });

  it("renders a conditional update", () => {
    const lines = render();
    expect(lines).toContain(
      "async updateUserStatus(userId: string, status: string): Promise<User | undefined> {",
    );
    expect(lines).toContain('Key: { pk: `USER#${userId}`, sk: "PROFILE" },');
    expect(lines).toContain('UpdateExpression: "SET #u0 = :u0",');
    expect(lines).toContain('ExpressionAttributeNames: { "#u0": "status", "#pk": "pk" },');
  });

  it("renders a paginated item collection query", () => {
    const lines = render();
    expect(lines).toContain(
      "async getUserOrders(userId: string, options: PageOptions = {}): Promise<Page<Order>> {",
    );
    expect(lines).toContain('ExpressionAttributeNames: { "#pk": "pk", "#sk": "sk" },');
    expect(lines).toContain('ExpressionAttributeValues: { ":pk": `USER#${userId}`, ":sk": "ORDER#" },');
    expect(lines).toContain("...BaseRepository.pageArgs(options),");
    expect(lines).toContain("return this.toPage(output);");
  });
});

describe("renderTypeScriptTransactionService()", () => {
  const lines = trimmedLines(
    renderTypeScriptTransactionService(model, typescriptProfile, DEFAULT_GENERATION_OPTIONS),
  );

  it("imports what the transactions use", () => {
    expect(lines).toContain(
      'import { TransactWriteCommand, type DynamoDBDocumentClient } from "@aws-sdk/lib-dynamodb";',
    );
    expect(lines).toContain('import { createDocumentClient, toStoredItem } from "./base-repository.js";');
    expect(lines).toContain('import { type Order, orderConfig } from "./entities.js";');
  });

  it("renders the transaction items", () => {
    expect(lines).toContain(
      "async placeOrder(order: Order, userId: string, status: string): Promise<boolean> {",
    );
    expect(lines).toContain('Users: "Users",');
    expect(lines).toContain('Item: toStoredItem(order, orderConfig, "pk", "sk"),');
    expect(lines).toContain('ExpressionAttributeValues: { ":u0": status },');
  });
});

describe("renderTypeScriptUsageExamples()", () => {
  it("fills sample constants from usage data", () => {
    const usage = createUsageLookup(loadUsageData(usageDocument()).usageData);
    const lines = trimmedLines(renderTypeScriptUsageExamples(model, typescriptProfile, usage));
    expect(lines).toContain("const sampleUser: User = {");
    expect(lines).toContain('email: "ada@example.com",');
    expect(lines).toContain("total: 12.5,");
  });
});
