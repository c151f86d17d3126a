import { describe, it, expect } from "vitest";
import {
  DEFAULT_GENERATION_OPTIONS,
  deployedTableName,
  resolveGenerationOptions,
} from "../../config/options.js";

describe("resolveGenerationOptions()", () => {
  it("returns the defaults when no options are given", () => {
    expect(resolveGenerationOptions(undefined)).toEqual({
      success: true,
      data: DEFAULT_GENERATION_OPTIONS,
    });
  });

  it("fills in missing options", () => {
    expect(resolveGenerationOptions({ includeMapping: false })).toEqual({
      success: true,
      data: { includeUsageExamples: true, includeMapping: false, tableNameOverrides: {} },
    });
  });

  it("reports wrongly typed options", () => {
    const result = resolveGenerationOptions({ includeMapping: "yes" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("invalid-options");
      expect(result.error.message).toBe(
        "Invalid generation options: includeMapping: Expected boolean, received string",
      );
    }
  });

  it("rejects unknown options", () => {
    const result = resolveGenerationOptions({ language: "python" });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        "Invalid generation options: options: Unrecognized key(s) in object: 'language'",
      );
    }
  });

  it("rejects empty table name overrides", () => {
    const result = resolveGenerationOptions({ tableNameOverrides: { Users: "" } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        "Invalid generation options: tableNameOverrides.Users: String must contain at least 1 character(s)",
      );
    }
  });
});

describe("deployedTableName()", () => {
  it("maps overridden tables and keeps the rest", () => {
    const options = { ...DEFAULT_GENERATION_OPTIONS, tableNameOverrides: { Users: "prod-users" } };
    expect(deployedTableName(options, "Users")).toBe("prod-users");
    expect(deployedTableName(options, "Orders")).toBe("Orders");
  });
});
