import { describe, it, expect } from "vitest";
import { formatJsonLiteral, quote } from "../../languages/literals.js";
import { pythonProfile } from "../../languages/python.js";
import { typescriptProfile } from "../../languages/typescript.js";

describe("formatJsonLiteral()", () => {
  const words = { null: "None", true: "True", false: "False" };

  it("prints nested values with the target's keywords", () => {
    expect(formatJsonLiteral({ tags: ["a", 1], on: false, gone: null }, words)).toBe(
      '{"tags": ["a", 1], "on": False, "gone": None}',
    );
  });

  it("prints non-finite numbers as null", () => {
    expect(formatJsonLiteral(Number.NaN, words)).toBe("None");
  });
});

describe("quote()", () => {
  it("escapes quotes and backslashes", () => {
    expect(quote('say "hi" \\ bye')).toBe('"say \\"hi\\" \\\\ bye"');
  });
});

describe("pythonProfile", () => {
  it("maps field kinds to annotations", () => {
    expect(pythonProfile.fieldType("decimal")).toBe("Decimal");
    expect(pythonProfile.fieldType("array", "integer")).toBe("list[int]");
    expect(pythonProfile.fieldType("array")).toBe("list[str]");
  });

  it("types entity parameters by their entity", () => {
    expect(pythonProfile.parameterType({ name: "user", kind: "entity", entityType: "User", role: "body" })).toBe(
      "User",
    );
  });

  it("maps return shapes", () => {
    expect(pythonProfile.returnType("single_entity", "User")).toBe("User | None");
    expect(pythonProfile.returnType("entity_list", "User")).toBe("list[User]");
    expect(pythonProfile.returnType("boolean", undefined)).toBe("bool");
  });

  it("prints sample literals", () => {
    expect(pythonProfile.literal({ kind: "decimal", value: "12.5" })).toBe('Decimal("12.5")');
    expect(pythonProfile.literal({ kind: "boolean", value: true })).toBe("True");
    expect(pythonProfile.literal({ kind: "created-field", entity: "User", field: "user_id" })).toBe(
      'created_entities["User"].user_id',
    );
    expect(pythonProfile.literal({ kind: "epoch-seconds" })).toBe("int(time.time())");
  });

  it("keeps snake_case names", () => {
    expect(pythonProfile.methodName("get_user_orders")).toBe("get_user_orders");
  });
});

describe("typescriptProfile", () => {
  it("maps field kinds to types", () => {
    expect(typescriptProfile.fieldType("integer")).toBe("number");
    expect(typescriptProfile.fieldType("array", "string")).toBe("string[]");
    expect(typescriptProfile.fieldType("object")).toBe("Record<string, unknown>");
  });

  it("maps return shapes", () => {
    expect(typescriptProfile.returnType("single_entity", "User")).toBe("User | undefined");
    expect(typescriptProfile.returnType("entity_list", "User")).toBe("User[]");
    expect(typescriptProfile.returnType("void", undefined)).toBe("void");
  });

  it("prints sample literals", () => {
    expect(typescriptProfile.literal({ kind: "decimal", value: "12.5" })).toBe("12.5");
    expect(typescriptProfile.literal({ kind: "decimal", value: "1e3" })).toBe('Number("1e3")');
    expect(typescriptProfile.literal({ kind: "created-entity", entity: "Order" })).toBe("sampleOrder");
    expect(typescriptProfile.literal({ kind: "json", value: { a: null } })).toBe('{"a": null}');
  });

  it("uses camelCase names", () => {
    expect(typescriptProfile.methodName("get_user_orders")).toBe("getUserOrders");
    expect(typescriptProfile.identifier("user_id")).toBe("userId");
  });
});
