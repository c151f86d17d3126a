import { describe, it, expect } from "vitest";
import { buildCompiledKey, buildKey, buildKeyValue } from "../../keys/key-builder.js";
import {
  compileKeyTemplate,
  compileSingleTemplate,
  compiledKeyFields,
  fieldKindLookup,
  keyAttributeCount,
} from "../../keys/key-template.js";

const kindOf = fieldKindLookup([
  { name: "tenant_id", kind: "string", required: true },
  { name: "user_id", kind: "string", required: true },
  { name: "score", kind: "integer", required: true },
  { name: "price", kind: "decimal", required: true },
]);

describe("compileSingleTemplate()", () => {
  it("marks a pure reference to a numeric field as passthrough", () => {
    expect(compileSingleTemplate("{score}", kindOf).passthrough).toBe(true);
    expect(compileSingleTemplate("{price}", kindOf).passthrough).toBe(true);
  });

  it("does not pass through text fields or templates with literals", () => {
    expect(compileSingleTemplate("{user_id}", kindOf).passthrough).toBe(false);
    expect(compileSingleTemplate("SCORE#{score}", kindOf).passthrough).toBe(false);
  });
});

describe("compileKeyTemplate()", () => {
  it("compiles an array into a multi-attribute template, even with one element", () => {
    const compiled = compileKeyTemplate(["{tenant_id}"], kindOf);
    expect(compiled.form).toBe("multi");
    expect(keyAttributeCount(compiled)).toBe(1);
  });

  it("lists consumed fields once in order of first use", () => {
    const compiled = compileKeyTemplate(["{tenant_id}", "{user_id}#{tenant_id}"], kindOf);
    expect(compiledKeyFields(compiled)).toEqual(["tenant_id", "user_id"]);
  });
});

describe("buildKeyValue()", () => {
  it("builds a literal template", () => {
    const result = buildKeyValue(compileSingleTemplate("PROFILE", kindOf), {});
    expect(result).toEqual({ success: true, data: "PROFILE" });
  });

  it("concatenates literals and field values", () => {
    const template = compileSingleTemplate("TENANT#{tenant_id}#USER#{user_id}", kindOf);
    const result = buildKeyValue(template, { tenant_id: "acme", user_id: "42" });
    expect(result).toEqual({ success: true, data: "TENANT#acme#USER#42" });
  });

  it("returns the raw number for a numeric passthrough", () => {
    const result = buildKeyValue(compileSingleTemplate("{score}", kindOf), { score: 17 });
    expect(result).toEqual({ success: true, data: 17 });
  });

  it("stringifies numbers inside text templates", () => {
    const result = buildKeyValue(compileSingleTemplate("SCORE#{score}", kindOf), { score: 17 });
    expect(result).toEqual({ success: true, data: "SCORE#17" });
  });

  it("fails when a field is missing or null", () => {
    const template = compileSingleTemplate("USER#{user_id}", kindOf);
    const missing = buildKeyValue(template, {});
    expect(missing.success).toBe(false);
    if (!missing.success) {
      expect(missing.error.message).toBe('Missing required key field "user_id" in entity data');
    }
    expect(buildKeyValue(template, { user_id: null }).success).toBe(false);
  });

  it("fails when a passthrough value is not a number", () => {
    const result = buildKeyValue(compileSingleTemplate("{score}", kindOf), { score: "17" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe('Key field "score" must be a number, got string');
    }
  });
});

describe("buildCompiledKey()", () => {
  it("builds a tuple for a multi-attribute template", () => {
    const compiled = compileKeyTemplate(["{tenant_id}", "{score}"], kindOf);
    const result = buildCompiledKey(compiled, { tenant_id: "acme", score: 3 });
    expect(result).toEqual({ success: true, data: ["acme", 3] });
  });
});

describe("buildKey()", () => {
  it("builds a partition-only key", () => {
    const result = buildKey(
      { partitionKey: { name: "pk", template: compileKeyTemplate("USER#{user_id}", kindOf) } },
      { user_id: "123" },
    );
    expect(result).toEqual({ success: true, data: { pk: "USER#123" } });
  });

  it("builds a partition and sort key", () => {
    const result = buildKey(
      {
        partitionKey: { name: "pk", template: compileKeyTemplate("USER#{user_id}", kindOf) },
        sortKey: { name: "sk", template: compileKeyTemplate("PROFILE", kindOf) },
      },
      { user_id: "123" },
    );
    expect(result).toEqual({ success: true, data: { pk: "USER#123", sk: "PROFILE" } });
  });

  it("returns the first build error", () => {
    const result = buildKey(
      {
        partitionKey: { name: "pk", template: compileKeyTemplate("USER#{user_id}", kindOf) },
        sortKey: { name: "sk", template: compileKeyTemplate("{score}", kindOf) },
      },
      { user_id: "123" },
    );
    expect(result.success).toBe(false);
  });
});
