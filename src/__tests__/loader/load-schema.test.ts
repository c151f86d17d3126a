import { describe, it, expect } from "vitest";
import { loadSchema } from "../../loader/load-schema.js";
import { usersSchema, usersTable, schemaOf, userEntity } from "../fixtures.js";

const structural = (path: string, message: string) => ({
  kind: "StructuralError",
  severity: "error",
  path,
  message,
});

describe("loadSchema()", () => {
  it("normalizes a well-formed document", () => {
    const { document, diagnostics } = loadSchema(usersSchema());
    expect(diagnostics).toEqual([]);
    expect(document.tables.map((table) => table.name)).toEqual(["Users"]);

    const [table] = document.tables;
    expect(table?.sortKey).toBe("sk");
    expect(table?.entities.map((entity) => entity.name)).toEqual(["User", "Order"]);
    expect(table?.indexes[0]?.includedAttributes).toEqual(["email", "user_id"]);

    const user = table?.entities[0];
    expect(user?.indexMappings).toEqual([
      { indexName: "StatusIndex", pkTemplate: "STATUS#{status}", skTemplate: "{created_at}" },
    ]);
    expect(user?.accessPatterns[0]?.consistentRead).toBe(true);
    expect(user?.accessPatterns[1]?.parameters[0]).toEqual({
      name: "user",
      kind: "entity",
      entityType: "User",
    });
    expect(document.crossTablePatterns[0]?.participants.map((p) => p.action)).toEqual([
      "Put",
      "Update",
    ]);
  });

  it("returns a deeply frozen document", () => {
    const { document } = loadSchema(usersSchema());
    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.tables[0]?.entities[0]?.fields)).toBe(true);
  });

  it("defaults a missing projection to ALL", () => {
    const table = usersTable({ gsi_list: [{ name: "ByEmail", partition_key: "email" }] });
    const { document } = loadSchema(schemaOf([table]));
    expect(document.tables[0]?.indexes[0]?.projection).toBe("ALL");
  });

  it("keeps multi-attribute key templates as arrays", () => {
    const table = usersTable({
      gsi_list: [{ name: "ByTenant", partition_key: ["tenant", "region"] }],
      entities: {
        User: userEntity({
          gsi_mappings: [{ name: "ByTenant", pk_template: ["{user_id}", "{status}"] }],
          access_patterns: [],
        }),
      },
    });
    const { document } = loadSchema(schemaOf([table]));
    expect(document.tables[0]?.indexes[0]?.partitionKey).toEqual(["tenant", "region"]);
    expect(document.tables[0]?.entities[0]?.indexMappings[0]?.pkTemplate).toEqual([
      "{user_id}",
      "{status}",
    ]);
  });

  it("rejects a document that is not an object", () => {
    for (const input of [null, 42, "tables", []]) {
      const result = loadSchema(input);
      expect(result.diagnostics).toEqual([
        structural("$", "Schema document must be a JSON object"),
      ]);
      expect(result.document.tables).toEqual([]);
    }
  });

  it("rejects a missing, mistyped or empty tables list", () => {
    expect(loadSchema({}).diagnostics).toEqual([
      structural("tables", "Missing required field 'tables'"),
    ]);
    expect(loadSchema({ tables: {} }).diagnostics).toEqual([
      structural("tables", "Expected array of tables"),
    ]);
    expect(loadSchema({ tables: [] }).diagnostics).toEqual([
      structural("tables", "Must contain at least one table"),
    ]);
  });

  it("rejects cross-table patterns that are not a list", () => {
    const result = loadSchema({ tables: [usersTable()], cross_table_access_patterns: {} });
    expect(result.diagnostics).toEqual([
      structural("cross_table_access_patterns", "Expected array of cross-table access patterns"),
    ]);
  });

  it("reports missing keys with their wire path and leaves the table out", () => {
    const table = { ...usersTable(), table_config: { table_name: "Users", sort_key: "sk" } };
    const { document, diagnostics } = loadSchema({ tables: [table] });
    expect(diagnostics).toEqual([
      structural("tables[0].table_config.partition_key", "Missing required field 'partition_key'"),
    ]);
    expect(document.tables).toEqual([]);
  });

  it("reports wrong JSON types and empty required arrays", () => {
    const table = {
      ...usersTable(),
      entities: {
        User: { ...userEntity(), fields: [] },
        Order: { ...userEntity(), entity_type: 7 },
      },
    };
    const { diagnostics } = loadSchema({ tables: [table] });
    expect(diagnostics).toEqual([
      structural("tables[0].entities.User.fields", "Must not be empty"),
      structural("tables[0].entities.Order.entity_type", "Expected string, received number"),
    ]);
  });

  it("never throws on arbitrary input", () => {
    const inputs: unknown[] = [
      undefined,
      { tables: [null] },
      { tables: [{ entities: "x" }] },
      { tables: [usersTable()], cross_table_access_patterns: [1, { name: 2 }] },
    ];
    for (const input of inputs) {
      expect(() => loadSchema(input)).not.toThrow();
      expect(loadSchema(input).diagnostics.length).toBeGreaterThan(0);
    }
  });
});
