import { describe, it, expect } from "vitest";
import { loadSchema } from "../../loader/load-schema.js";
import { ResolverInvariantError } from "../../resolver/errors.js";
import { itemCollectionPeers, resolveModel } from "../../resolver/resolve-model.js";
import type { ResolvedEntity, ResolvedModel, ResolvedPattern } from "../../types/resolved.js";
import {
  orderEntity,
  resolveSchema,
  schemaOf,
  userEntity,
  userPatterns,
  usersSchema,
  usersTable,
} from "../fixtures.js";

const entityOf = (model: ResolvedModel, name: string): ResolvedEntity => {
  const entity = model.entities.find((candidate) => candidate.name === name);
  if (entity === undefined) throw new Error(`no entity ${name}`);
  return entity;
};

const patternOf = (entity: ResolvedEntity, id: number): ResolvedPattern => {
  const pattern = entity.patterns.find((candidate) => candidate.id === id);
  if (pattern === undefined) throw new Error(`no pattern ${id}`);
  return pattern;
};

describe("resolveModel()", () => {
  const model = resolveSchema(usersSchema());
  const user = entityOf(model, "User");
  const order = entityOf(model, "Order");

  it("lists tables with their entities", () => {
    expect(model.tables).toEqual([
      { name: "Users", partitionKey: "pk", sortKey: "sk", entities: ["User", "Order"] },
    ]);
  });

  it("finds entities sharing a partition key template", () => {
    expect(user.itemCollectionPeers).toEqual(["Order"]);
    expect(order.itemCollectionPeers).toEqual(["User"]);
  });

  it("folds the get pattern into the CRUD get and keeps its consistency", () => {
    expect(user.crud.getConsistentRead).toBe(true);
    expect(user.crud.keyParameters).toEqual([{ name: "user_id", kind: "string", role: "key" }]);
    expect(user.foldedPatterns.map((folded) => [folded.id, folded.methodName])).toEqual([
      [1, "get_user"],
    ]);
    expect(user.patterns.map((pattern) => pattern.methodName)).toEqual([
      "put_user",
      "list_users_by_status",
      "update_user_status",
    ]);
  });

  it("renames a create pattern to a put built from the entity", () => {
    const put = patternOf(user, 2);
    expect(put.renamedFrom).toBe("create_user");
    expect(put.description).toBe("Put (upsert) a user");
    expect(put.bodyParameter).toBe("user");
    expect(put.keys.map((construction) => construction.part)).toEqual(["partition", "sort"]);
    expect(put.keys[0]?.bindings).toEqual([
      { field: "user_id", source: { kind: "entity-field", parameter: "user" } },
    ]);
    expect(put.keys[1]?.bindings).toEqual([]);
  });

  it("queries an index by its partition key", () => {
    const list = patternOf(user, 3);
    expect(list.paginated).toBe(true);
    expect(list.consistentRead).toBe(false);
    expect(list.projection).toEqual({ projection: "INCLUDE", itemShape: "entity", blockingFields: [] });
    expect(list.keyCondition?.expression).toBe("#pk = :pk");
    expect(list.keyCondition?.names).toEqual([{ alias: "#pk", attribute: "gsi1pk" }]);
    expect(list.keyCondition?.values).toEqual([
      { placeholder: ":pk", source: { kind: "key", part: "partition" } },
    ]);
    expect(list.parameters).toEqual([{ name: "status", kind: "string", entityType: undefined, role: "key" }]);
  });

  it("turns non-key parameters of an update into assignments", () => {
    const update = patternOf(user, 4);
    expect(update.update?.expression).toBe("SET #u0 = :u0");
    expect(update.parameters.map((param) => param.role)).toEqual(["key", "value"]);
    expect(update.response).toBe("single");
  });

  it("restricts an item collection query to the entity's sort prefix", () => {
    const orders = patternOf(order, 5);
    expect(orders.keyCondition?.expression).toBe("#pk = :pk AND begins_with(#sk, :sk)");
    expect(orders.keyCondition?.names).toEqual([
      { alias: "#pk", attribute: "pk" },
      { alias: "#sk", attribute: "sk" },
    ]);
    expect(orders.keyCondition?.values[1]).toEqual({
      placeholder: ":sk",
      source: { kind: "literal", value: "ORDER#" },
    });
  });

  it("resolves transaction participants", () => {
    const [transaction] = model.transactions;
    expect(transaction?.methodName).toBe("place_order");
    expect(transaction?.parameters.map((param) => param.role)).toEqual(["body", "key", "value"]);
    expect(transaction?.participants[0]?.bodyParameter).toBe("order");
    expect(transaction?.participants[1]?.update?.expression).toBe("SET #u0 = :u0");
    expect(transaction?.participants[1]?.update?.values).toEqual([
      { placeholder: ":u0", source: { kind: "parameter", name: "status", prefix: "" } },
    ]);
  });
});

describe("index projection decisions", () => {
  const listPattern = (table: ReturnType<typeof usersTable>) =>
    patternOf(entityOf(resolveSchema(schemaOf([table])), "User"), 3).projection;

  it("falls back to raw maps when an included projection misses a required field", () => {
    const table = usersTable({
      gsi_list: [
        {
          name: "StatusIndex",
          partition_key: "gsi1pk",
          sort_key: "gsi1sk",
          projection: "INCLUDE",
          included_attributes: ["email"],
        },
      ],
    });
    expect(listPattern(table)).toEqual({
      projection: "INCLUDE",
      itemShape: "raw-map",
      blockingFields: ["user_id"],
    });
  });

  it("always returns raw maps for keys-only indexes", () => {
    const table = usersTable({
      gsi_list: [
        { name: "StatusIndex", partition_key: "gsi1pk", sort_key: "gsi1sk", projection: "KEYS_ONLY" },
      ],
    });
    expect(listPattern(table)).toEqual({
      projection: "KEYS_ONLY",
      itemShape: "raw-map",
      blockingFields: ["user_id", "email"],
    });
  });
});

describe("range conditions", () => {
  it("prefixes a range value with the sort key's static text", () => {
    const table = usersTable({
      entities: {
        User: userEntity(),
        Order: orderEntity({
          access_patterns: [
            {
              pattern_id: 6,
              name: "find_orders_with_prefix",
              description: "Orders whose id starts with a prefix",
              operation: "Query",
              range_condition: "begins_with",
              parameters: [
                { name: "user_id", type: "string" },
                { name: "order_prefix", type: "string" },
              ],
              return_type: "entity_list",
            },
          ],
        }),
      },
    });
    const pattern = patternOf(entityOf(resolveSchema(schemaOf([table])), "Order"), 6);
    expect(pattern.keyCondition?.expression).toBe("#pk = :pk AND begins_with(#sk, :sk)");
    expect(pattern.keyCondition?.values[1]?.source).toEqual({
      kind: "parameter",
      name: "order_prefix",
      prefix: "ORDER#",
    });
    expect(pattern.parameters.map((param) => param.role)).toEqual(["key", "range"]);
  });
});

describe("invariant violations", () => {
  it("throws when a pattern names an index the entity does not map", () => {
    const patterns = userPatterns().map((pattern) =>
      pattern.pattern_id === 3 ? { ...pattern, index_name: "Nope" } : pattern,
    );
    const { document } = loadSchema(
      schemaOf([usersTable({ entities: { User: userEntity({ access_patterns: patterns }) } })]),
    );
    expect(() => resolveModel(document)).toThrow(ResolverInvariantError);
    expect(() => resolveModel(document)).toThrow(
      "tables[0].entities.User.access_patterns[2].index_name: entity 'User' has no mapping for index 'Nope'",
    );
  });

  it("throws when a range query targets an index mapped without a sort key template", () => {
    const user = userEntity({
      gsi_mappings: [{ name: "StatusIndex", pk_template: "STATUS#{status}" }],
      access_patterns: [
        ...userPatterns(),
        {
          pattern_id: 6,
          name: "list_users_since",
          description: "Users with a status created since a time",
          operation: "Query",
          index_name: "StatusIndex",
          range_condition: ">=",
          parameters: [
            { name: "status", type: "string" },
            { name: "since", type: "integer" },
          ],
          return_type: "entity_list",
        },
      ],
    });
    const { document } = loadSchema(schemaOf([usersTable({ entities: { User: user } })]));
    expect(() => resolveModel(document)).toThrow(
      "tables[0].entities.User.access_patterns[4].range_condition: range condition '>=' has no sort key template to compare against",
    );
  });
});

describe("itemCollectionPeers()", () => {
  it("returns nothing for an entity alone in its partition", () => {
    const { document } = loadSchema(
      schemaOf([
        usersTable({
          entities: { User: userEntity(), Order: orderEntity({ pk_template: "ORDER#{order_id}" }) },
        }),
      ]),
    );
    const [table] = document.tables;
    const userDefinition = table?.entities.find((entity) => entity.name === "User");
    expect(table).toBeDefined();
    expect(userDefinition).toBeDefined();
    if (table === undefined || userDefinition === undefined) return;
    expect(itemCollectionPeers(table, userDefinition)).toEqual([]);
  });
});
