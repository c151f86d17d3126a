import type {
  WireAccessPattern,
  WireCrossTablePattern,
  WireEntity,
  WireTable,
} from "../loader/shapes.js";
import { loadSchema } from "../loader/load-schema.js";
import { resolveModel } from "../resolver/resolve-model.js";
import { hasErrors } from "../types/diagnostics.js";
import type { ResolvedModel } from "../types/resolved.js";
import type { Logger } from "../utils/logger.js";
import { formatDiagnostics } from "../validation/diagnostics.js";
import { validateDocument } from "../validation/validate-document.js";

export interface WireSchema {
  tables: WireTable[];
  cross_table_access_patterns?: WireCrossTablePattern[];
}

export const userPatterns = (): WireAccessPattern[] => [
  {
    pattern_id: 1,
    name: "get_user",
    description: "Get a user by id",
    operation: "GetItem",
    parameters: [{ name: "user_id", type: "string" }],
    return_type: "single_entity",
    consistent_read: true,
  },
  {
    pattern_id: 2,
    name: "create_user",
    description: "Create a user",
    operation: "PutItem",
    parameters: [{ name: "user", type: "entity", entity_type: "User" }],
    return_type: "single_entity",
  },
  {
    pattern_id: 3,
    name: "list_users_by_status",
    description: "List users with a status",
    operation: "Query",
    index_name: "StatusIndex",
    parameters: [{ name: "status", type: "string" }],
    return_type: "entity_list",
  },
  {
    pattern_id: 4,
    name: "update_user_status",
    description: "Change the status of a user",
    operation: "UpdateItem",
    parameters: [
      { name: "user_id", type: "string" },
      { name: "status", type: "string" },
    ],
    return_type: "single_entity",
  },
];

export const userEntity = (overrides: Partial<WireEntity> = {}): WireEntity => ({
  entity_type: "USER",
  pk_template: "USER#{user_id}",
  sk_template: "PROFILE",
  gsi_mappings: [{ name: "StatusIndex", pk_template: "STATUS#{status}", sk_template: "{created_at}" }],
  fields: [
    { name: "user_id", type: "string", required: true },
    { name: "email", type: "string", required: true },
    { name: "status", type: "string", required: true },
    { name: "created_at", type: "integer", required: true },
    { name: "nickname", type: "string", required: false },
  ],
  access_patterns: userPatterns(),
  ...overrides,
});

export const orderEntity = (overrides: Partial<WireEntity> = {}): WireEntity => ({
  entity_type: "ORDER",
  pk_template: "USER#{user_id}",
  sk_template: "ORDER#{order_id}",
  fields: [
    { name: "user_id", type: "string", required: true },
    { name: "order_id", type: "string", required: true },
    { name: "total", type: "decimal", required: true },
    { name: "placed_at", type: "integer", required: true },
  ],
  access_patterns: [
    {
      pattern_id: 5,
      name: "get_user_orders",
      description: "List the orders of a user",
      operation: "Query",
      parameters: [{ name: "user_id", type: "string" }],
      return_type: "entity_list",
    },
  ],
  ...overrides,
});

export const usersTable = (overrides: Partial<WireTable> = {}): WireTable => ({
  table_config: { table_name: "Users", partition_key: "pk", sort_key: "sk" },
  gsi_list: [
    {
      name: "StatusIndex",
      partition_key: "gsi1pk",
      sort_key: "gsi1sk",
      projection: "INCLUDE",
      included_attributes: ["email", "user_id"],
    },
  ],
  entities: { User: userEntity(), Order: orderEntity() },
  ...overrides,
});

export const placeOrderTransaction = (): WireCrossTablePattern => ({
  pattern_id: 20,
  name: "place_order",
  description: "Store an order and mark its user",
  operation: "TransactWrite",
  entities_involved: [
    { table: "Users", entity: "Order", action: "Put" },
    { table: "Users", entity: "User", action: "Update" },
  ],
  parameters: [
    { name: "order", type: "entity", entity_type: "Order" },
    { name: "user_id", type: "string" },
    { name: "status", type: "string" },
  ],
  return_type: "boolean",
});

export const schemaOf = (
  tables: WireTable[],
  crossTable: WireCrossTablePattern[] = [],
): WireSchema => ({ tables, cross_table_access_patterns: crossTable });

/** Users table with User and Order sharing partitions, plus one transaction. */
export const usersSchema = (): WireSchema => schemaOf([usersTable()], [placeOrderTransaction()]);

export const usageDocument = () => ({
  entities: {
    User: {
      sample_data: {
        user_id: "u-100",
        email: "ada@example.com",
        status: "active",
        created_at: 1700000000,
      },
      access_pattern_data: { user_id: "u-200" },
      update_data: { email: "ada.new@example.com" },
    },
    Order: {
      sample_data: { user_id: "u-100", order_id: "o-1", total: 12.5, placed_at: 1700000100 },
      access_pattern_data: {},
      update_data: { total: 20 },
    },
  },
});

/** Loads, validates and resolves a schema that must be valid. */
export const resolveSchema = (input: unknown): ResolvedModel => {
  const { document, diagnostics } = loadSchema(input);
  const all = [...diagnostics, ...(hasErrors(diagnostics) ? [] : validateDocument(document))];
  if (hasErrors(all)) throw new Error(`fixture is invalid:\n${formatDiagnostics(all)}`);
  return resolveModel(document);
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
