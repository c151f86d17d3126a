import { describe, it, expect } from "vitest";
import { getLanguageProfile, listLanguages } from "../../languages/registry.js";

describe("listLanguages()", () => {
  it("lists the supported targets in order", () => {
    expect(listLanguages()).toEqual(["python", "typescript"]);
  });
});

describe("getLanguageProfile()", () => {
  it("matches ignoring case and surrounding spaces", () => {
    const result = getLanguageProfile("  TypeScript ");
    expect(result.success).toBe(true);
    if (result.success) expect(result.data.id).toBe("typescript");
  });

  it("reports the supported languages for an unknown target", () => {
    const result = getLanguageProfile("cobol");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("unknown-language");
      expect(result.error.message).toBe(
        "Unsupported language 'cobol'. Supported languages: python, typescript",
      );
    }
  });

  it("does not accept inherited object keys", () => {
    expect(getLanguageProfile("constructor").success).toBe(false);
  });
});
