import { describe, it, expect } from "vitest";
import { crudMethodNames, reconcileWithCrud, renameClashing } from "../../resolver/crud.js";
import type { AccessPatternDefinition, ParameterDefinition } from "../../types/schema.js";

const text = (name: string): ParameterDefinition => ({ name, kind: "string" });
const body = (name: string, entityType = "User"): ParameterDefinition => ({
  name,
  kind: "entity",
  entityType,
});

const pattern = (
  id: number,
  name: string,
  operation: string,
  parameters: ParameterDefinition[],
  extra: Partial<AccessPatternDefinition> = {},
): AccessPatternDefinition => ({
  id,
  name,
  description: `Pattern ${name}`,
  operation,
  parameters,
  returnShape: "single_entity",
  ...extra,
});

describe("crudMethodNames()", () => {
  it("derives snake_case method names from the entity name", () => {
    expect(crudMethodNames("UserProfile")).toEqual({
      create: "create_user_profile",
      get: "get_user_profile",
      update: "update_user_profile",
      delete: "delete_user_profile",
    });
  });
});

describe("reconcileWithCrud()", () => {
  const keyFields = ["user_id"];

  it("folds patterns that repeat a CRUD method", () => {
    const result = reconcileWithCrud(
      "User",
      [
        pattern(1, "get_user", "GetItem", [text("user_id")], { consistentRead: true }),
        pattern(2, "delete_user_by_id", "DeleteItem", [text("user_id")]),
        pattern(3, "update_user", "UpdateItem", [body("user")]),
      ],
      keyFields,
    );
    expect(result.patterns).toEqual([]);
    expect(result.folded.map((fold) => [fold.pattern.id, fold.methodName])).toEqual([
      [1, "get_user"],
      [2, "delete_user"],
      [3, "update_user"],
    ]);
    expect(result.getConsistentRead).toBe(true);
  });

  it("keeps eventual consistency when no folded read asks otherwise", () => {
    const result = reconcileWithCrud("User", [pattern(1, "get_user", "GetItem", [text("user_id")])], keyFields);
    expect(result.getConsistentRead).toBe(false);
  });

  it("always keeps PutItem, renaming a clashing create", () => {
    const result = reconcileWithCrud(
      "User",
      [{ ...pattern(4, "create_user", "PutItem", [body("user")]), description: "Create a new user" }],
      keyFields,
    );
    expect(result.folded).toEqual([]);
    expect(result.patterns).toEqual([
      {
        pattern: expect.objectContaining({ id: 4 }),
        methodName: "put_user",
        description: "Put (upsert) a new user",
        renamedFrom: "create_user",
      },
    ]);
  });

  it("folds a reserved name with the CRUD signature", () => {
    const result = reconcileWithCrud("User", [pattern(5, "get_user", "Query", [text("user_id")])], keyFields);
    expect(result.folded.map((fold) => fold.methodName)).toEqual(["get_user"]);
  });

  it("renames a reserved name with another signature", () => {
    const result = reconcileWithCrud(
      "User",
      [
        pattern(6, "get_user", "GetItem", [text("email"), text("status")]),
        pattern(7, "update_user", "UpdateItem", [text("user_id"), text("status")]),
      ],
      keyFields,
    );
    expect(result.patterns.map((kept) => [kept.methodName, kept.renamedFrom])).toEqual([
      ["get_user_with_email_and_status", "get_user"],
      ["update_user_with_user_id_and_status", "update_user"],
    ]);
  });

  it("never renames onto a method name another pattern already uses", () => {
    const result = reconcileWithCrud(
      "User",
      [
        pattern(9, "get_user", "Scan", []),
        pattern(10, "get_user_list", "Query", [text("status")]),
        { ...pattern(11, "create_user", "PutItem", [body("user")]), description: "Create a new user" },
        pattern(12, "PutUser", "Query", [text("email")]),
      ],
      keyFields,
    );
    expect(result.patterns.map((kept) => [kept.methodName, kept.renamedFrom])).toEqual([
      ["get_user_pattern_9", "get_user"],
      ["get_user_list", undefined],
      ["create_user_pattern_11", "create_user"],
      ["put_user", undefined],
    ]);
  });

  it("keeps patterns whose names do not clash", () => {
    const result = reconcileWithCrud(
      "User",
      [pattern(8, "FindUserByEmail", "Query", [text("email")])],
      keyFields,
    );
    expect(result.patterns.map((kept) => [kept.methodName, kept.renamedFrom])).toEqual([
      ["find_user_by_email", undefined],
    ]);
  });
});

describe("renameClashing()", () => {
  it("picks a suffix from the operation and parameters", () => {
    expect(renameClashing("get_user", pattern(1, "get_user", "Scan", []))).toBe("get_user_list");
    expect(
      renameClashing("get_user", pattern(2, "get_user", "GetItem", [body("a"), body("b")])),
    ).toBe("get_user_with_refs");
    expect(renameClashing("get_user", pattern(3, "get_user", "GetItem", []))).toBe(
      "get_user_pattern_3",
    );
  });

  it("falls back to the pattern id when the suffixed name is taken", () => {
    expect(
      renameClashing("get_user", pattern(4, "get_user", "Scan", []), new Set(["get_user_list"])),
    ).toBe("get_user_pattern_4");
  });
});
