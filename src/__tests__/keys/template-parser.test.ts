import { describe, it, expect } from "vitest";
import {
  findTemplateSyntaxErrors,
  parseTemplate,
  templatePrefix,
} from "../../keys/template-parser.js";

describe("parseTemplate()", () => {
  it("parses a literal-only template", () => {
    const result = parseTemplate("PROFILE");
    expect(result.isLiteral).toBe(true);
    expect(result.isPureFieldReference).toBe(false);
    expect(result.fields).toHaveLength(0);
    expect(result.segments).toEqual([{ type: "literal", value: "PROFILE" }]);
  });

  it("parses a pure field reference", () => {
    const result = parseTemplate("{score}");
    expect(result.isLiteral).toBe(false);
    expect(result.isPureFieldReference).toBe(true);
    expect(result.fields).toEqual(["score"]);
    expect(result.segments).toEqual([{ type: "field", name: "score" }]);
  });

  it("parses a template with a prefix and placeholder", () => {
    const result = parseTemplate("USER#{user_id}");
    expect(result.isPureFieldReference).toBe(false);
    expect(result.segments).toEqual([
      { type: "literal", value: "USER#" },
      { type: "field", name: "user_id" },
    ]);
  });

  it("parses a template with multiple placeholders and a suffix", () => {
    const result = parseTemplate("TENANT#{tenant_id}#USER#{user_id}#X");
    expect(result.fields).toEqual(["tenant_id", "user_id"]);
    expect(result.segments).toEqual([
      { type: "literal", value: "TENANT#" },
      { type: "field", name: "tenant_id" },
      { type: "literal", value: "#USER#" },
      { type: "field", name: "user_id" },
      { type: "literal", value: "#X" },
    ]);
  });

  it("keeps repeated placeholders in order", () => {
    expect(parseTemplate("{a}#{a}").fields).toEqual(["a", "a"]);
  });

  it("returns a frozen object", () => {
    const result = parseTemplate("USER#{user_id}");
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.segments)).toBe(true);
  });
});

describe("templatePrefix()", () => {
  it("returns the literal text before the first placeholder", () => {
    expect(templatePrefix(parseTemplate("ORDER#{order_id}"))).toBe("ORDER#");
  });

  it("returns an empty string when the template starts with a placeholder", () => {
    expect(templatePrefix(parseTemplate("{order_id}#X"))).toBe("");
  });

  it("returns the whole text of a literal template", () => {
    expect(templatePrefix(parseTemplate("PROFILE"))).toBe("PROFILE");
  });
});

describe("findTemplateSyntaxErrors()", () => {
  it("accepts well-formed templates", () => {
    expect(findTemplateSyntaxErrors("USER#{user_id}#{created_at}")).toEqual([]);
  });

  it("reports an unclosed brace", () => {
    expect(findTemplateSyntaxErrors("USER#{user_id")).toEqual(["Unclosed '{' at position 5"]);
  });

  it("reports an unmatched closing brace", () => {
    expect(findTemplateSyntaxErrors("USER}")).toEqual(["Unmatched '}' at position 4"]);
  });

  it("reports empty and invalid placeholder names", () => {
    expect(findTemplateSyntaxErrors("{}")).toEqual(["Empty placeholder '{}' at position 0"]);
    expect(findTemplateSyntaxErrors("A#{user-id}")).toEqual([
      "Invalid placeholder name 'user-id' at position 2",
    ]);
  });
});
