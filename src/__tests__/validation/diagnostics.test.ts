import { describe, it, expect } from "vitest";
import type { Diagnostic } from "../../types/diagnostics.js";
import {
  createDiagnosticSink,
  formatDiagnostics,
  joinPath,
} from "../../validation/diagnostics.js";

describe("joinPath()", () => {
  it("appends indexes in brackets and keys with dots", () => {
    expect(joinPath("tables", 0)).toBe("tables[0]");
    expect(joinPath("tables[0]", "entities")).toBe("tables[0].entities");
    expect(joinPath("", "entities")).toBe("entities");
  });
});

describe("createDiagnosticSink()", () => {
  it("lists entries in the order they were reported", () => {
    const sink = createDiagnosticSink();
    sink.structural("a", "first");
    sink.cardinality("b", "second");
    sink.consistency("c", "third", "warning");
    expect(sink.list().map((d) => [d.kind, d.severity, d.path])).toEqual([
      ["StructuralError", "error", "a"],
      ["CardinalityError", "error", "b"],
      ["ConsistencyError", "warning", "c"],
    ]);
  });

  it("lists candidates when no name is close enough to suggest", () => {
    const sink = createDiagnosticSink();
    sink.reference("p", "Unknown entity 'Invoice'", "Invoice", ["User", "Order"]);
    sink.reference("q", "Unknown entity 'Invoice'", "Invoice", []);
    const [listed, bare] = sink.list();
    expect(listed?.message).toBe("Unknown entity 'Invoice'. Available: Order, User");
    expect(listed?.suggestion).toBeUndefined();
    expect(bare?.message).toBe("Unknown entity 'Invoice'.");
  });

  it("formats enum violations with the allowed values", () => {
    const sink = createDiagnosticSink();
    sink.enumViolation("x.projection", "projection", "all", ["ALL", "KEYS_ONLY", "INCLUDE"]);
    expect(sink.list()[0]).toEqual({
      kind: "EnumViolation",
      severity: "error",
      path: "x.projection",
      value: "all",
      message: "Invalid projection 'all'. Valid values: ALL, KEYS_ONLY, INCLUDE",
      suggestion: "ALL",
    });
  });

  it("returns a frozen snapshot", () => {
    const sink = createDiagnosticSink();
    sink.structural("a", "first");
    const snapshot = sink.list();
    sink.structural("b", "second");
    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });
});

describe("formatDiagnostics()", () => {
  it("prints errors before warnings, one line each", () => {
    const diagnostics: Diagnostic[] = [
      { kind: "ConsistencyError", severity: "warning", path: "a", message: "m1" },
      { kind: "ReferenceError", severity: "error", path: "b", message: "m2", suggestion: "x" },
      { kind: "CardinalityError", severity: "error", path: "c", message: "m3" },
    ];
    expect(formatDiagnostics(diagnostics)).toBe(
      [
        "[error] ReferenceError at b: m2 (suggestion: x)",
        "[error] CardinalityError at c: m3",
        "[warning] ConsistencyError at a: m1",
      ].join("\n"),
    );
  });

  it("returns an empty string for no diagnostics", () => {
    expect(formatDiagnostics([])).toBe("");
  });
});
