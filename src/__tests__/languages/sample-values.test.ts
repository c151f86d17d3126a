import { describe, it, expect } from "vitest";
import { loadUsageData } from "../../loader/load-usage-data.js";
import {
  createUsageLookup,
  sampleFieldValue,
  sampleParameterValue,
  updateFieldValue,
  usageValue,
} from "../../languages/sample-values.js";
import type { ResolvedField } from "../../types/resolved.js";
import { usageDocument } from "../fixtures.js";

const field = (name: string, kind: ResolvedField["kind"]): ResolvedField => ({
  name,
  kind,
  required: true,
});

const usage = createUsageLookup(loadUsageData(usageDocument()).usageData);

describe("usageValue()", () => {
  it("keeps decimal digits as text", () => {
    expect(usageValue(12.5, "decimal")).toEqual({ kind: "decimal", value: "12.5" });
  });

  it("classifies plain values", () => {
    expect(usageValue("x", "string")).toEqual({ kind: "text", value: "x" });
    expect(usageValue(3, "integer")).toEqual({ kind: "integer", value: 3 });
    expect(usageValue(1.5, "integer")).toEqual({ kind: "json", value: 1.5 });
  });
});

describe("sampleFieldValue()", () => {
  it("prefers usage data", () => {
    expect(sampleFieldValue("User", field("email", "string"), usage)).toEqual({
      kind: "text",
      value: "ada@example.com",
    });
    expect(sampleFieldValue("User", field("user_id", "string"), usage, "access_pattern_data")).toEqual({
      kind: "text",
      value: "u-200",
    });
  });

  it("falls back to name hints and kind defaults", () => {
    expect(sampleFieldValue("Deal", field("category", "string"))).toEqual({
      kind: "text",
      value: "electronics",
    });
    expect(sampleFieldValue("Deal", field("deal_id", "string"))).toEqual({
      kind: "text",
      value: "deal_id123",
    });
    expect(sampleFieldValue("Deal", field("title", "string"))).toEqual({
      kind: "text",
      value: "sample_title",
    });
    expect(sampleFieldValue("Deal", field("created_time", "integer"))).toEqual({
      kind: "epoch-seconds",
    });
    expect(sampleFieldValue("Deal", field("price", "decimal"))).toEqual({
      kind: "decimal",
      value: "29.99",
    });
  });
});

describe("updateFieldValue()", () => {
  it("reads update data, then falls back per kind", () => {
    expect(updateFieldValue("Order", field("total", "decimal"), usage)).toEqual({
      kind: "decimal",
      value: "20",
    });
    expect(updateFieldValue("Deal", field("title", "string"))).toEqual({
      kind: "text",
      value: "updated_title",
    });
    expect(updateFieldValue("Deal", field("active", "boolean"))).toEqual({
      kind: "boolean",
      value: false,
    });
  });
});

describe("sampleParameterValue()", () => {
  const fields = [field("user_id", "string"), field("status", "string")];

  it("refers to the created entity for entity and field parameters", () => {
    expect(
      sampleParameterValue("User", fields, { name: "user", kind: "entity", entityType: "User", role: "body" }),
    ).toEqual({ kind: "created-entity", entity: "User" });
    expect(sampleParameterValue("User", fields, { name: "user_id", kind: "string", role: "key" })).toEqual({
      kind: "created-field",
      entity: "User",
      field: "user_id",
    });
  });

  it("picks range bounds from the parameter name", () => {
    expect(sampleParameterValue("User", fields, { name: "start_date", kind: "string", role: "range" })).toEqual({
      kind: "text",
      value: "2024-01-01",
    });
    expect(sampleParameterValue("User", fields, { name: "max_score", kind: "integer", role: "range" })).toEqual({
      kind: "integer",
      value: 9999,
    });
    expect(sampleParameterValue("User", fields, { name: "limit", kind: "integer", role: "filter" })).toEqual({
      kind: "integer",
      value: 100,
    });
  });
});
