import { describe, it, expect } from "vitest";
import { collectResults, err, mapResult, ok } from "../../types/common.js";
import { createGenerationFailure } from "../../types/errors.js";

describe("ok()", () => {
  it("creates a successful result with the given data", () => {
    const data = { x: 1 };
    const result = ok(data);
    expect(result.success).toBe(true);
    if (result.success) expect(result.data).toBe(data);
  });

  it("produces a frozen object", () => {
    expect(Object.isFrozen(ok(1))).toBe(true);
  });
});

describe("err()", () => {
  it("creates a failed result with the given error", () => {
    const result = err("bad");
    expect(result).toEqual({ success: false, error: "bad" });
    expect(Object.isFrozen(result)).toBe(true);
  });
});

describe("mapResult()", () => {
  it("maps a successful value", () => {
    expect(mapResult(ok(2), (n) => n * 3)).toEqual({ success: true, data: 6 });
  });

  it("passes errors through unchanged", () => {
    const failed = err("bad");
    expect(mapResult(failed, (n: number) => n * 3)).toBe(failed);
  });
});

describe("collectResults()", () => {
  it("collects every success", () => {
    expect(collectResults([ok(1), ok(2)])).toEqual({ success: true, data: [1, 2] });
  });

  it("stops at the first failure", () => {
    expect(collectResults([ok(1), err("first"), err("second")])).toEqual({
      success: false,
      error: "first",
    });
  });
});

describe("createGenerationFailure()", () => {
  it("freezes the failure and copies its diagnostics", () => {
    const diagnostics = [
      {
        kind: "StructuralError" as const,
        severity: "error" as const,
        path: "tables",
        message: "Missing required field 'tables'",
      },
    ];
    const failure = createGenerationFailure("invalid-schema", "failed", diagnostics);
    expect(Object.isFrozen(failure)).toBe(true);
    expect(failure.diagnostics).toEqual(diagnostics);
    expect(failure.diagnostics).not.toBe(diagnostics);
    expect(failure.cause).toBeUndefined();
  });
});
