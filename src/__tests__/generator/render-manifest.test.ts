import { describe, it, expect } from "vitest";
import { DEFAULT_GENERATION_OPTIONS } from "../../config/options.js";
import { renderManifest } from "../../generator/render-manifest.js";
import { pythonProfile } from "../../languages/python.js";
import { typescriptProfile } from "../../languages/typescript.js";
import { loadUsageData } from "../../loader/load-usage-data.js";
import { resolveSchema, schemaOf, usageDocument, usersSchema, usersTable } from "../fixtures.js";
import { fileAt } from "./helpers.js";

const model = resolveSchema(usersSchema());

describe("renderManifest()", () => {
  it("lists python files in a fixed order", () => {
    const manifest = renderManifest(model, pythonProfile, DEFAULT_GENERATION_OPTIONS);
    expect(manifest.map((file) => file.path)).toEqual([
      "entities.py",
      "repositories.py",
      "base_repository.py",
      "transaction_service.py",
      "usage_examples.py",
      "access_pattern_mapping.json",
    ]);
  });

  it("lists typescript files with their categories and descriptions", () => {
    const manifest = renderManifest(model, typescriptProfile, DEFAULT_GENERATION_OPTIONS);
    expect(manifest.map((file) => [file.path, file.category, file.description])).toEqual([
      ["entities.ts", "entities", "2 entities"],
      ["repositories.ts", "repositories", "2 repositories"],
      ["base-repository.ts", "support", "Base repository and entity configuration"],
      ["transaction-service.ts", "services", "1 cross-table transaction pattern"],
      ["usage-examples.ts", "examples", "Interactive examples"],
      ["access_pattern_mapping.json", "mapping", "6 access patterns mapped to generated methods"],
    ]);
    expect(fileAt(manifest, "entities.ts").count).toBe(2);
    expect(fileAt(manifest, "access_pattern_mapping.json").count).toBe(6);
  });

  it("renders byte-identical content for the same input", () => {
    const options = { ...DEFAULT_GENERATION_OPTIONS, usageData: loadUsageData(usageDocument()).usageData };
    const first = renderManifest(model, pythonProfile, options);
    const second = renderManifest(resolveSchema(usersSchema()), pythonProfile, options);
    expect(second.map((file) => file.content)).toEqual(first.map((file) => file.content));
  });

  it("omits the transaction service without cross-table patterns", () => {
    const manifest = renderManifest(
      resolveSchema(schemaOf([usersTable()])),
      pythonProfile,
      DEFAULT_GENERATION_OPTIONS,
    );
    expect(manifest.map((file) => file.path)).not.toContain("transaction_service.py");
    expect(fileAt(manifest, "access_pattern_mapping.json").description).toBe(
      "5 access patterns mapped to generated methods",
    );
  });

  it("leaves out optional files when disabled", () => {
    const manifest = renderManifest(model, pythonProfile, {
      ...DEFAULT_GENERATION_OPTIONS,
      includeUsageExamples: false,
      includeMapping: false,
    });
    expect(manifest.map((file) => file.path)).toEqual([
      "entities.py",
      "repositories.py",
      "base_repository.py",
      "transaction_service.py",
    ]);
  });

  it("freezes the manifest", () => {
    expect(Object.isFrozen(renderManifest(model, pythonProfile, DEFAULT_GENERATION_OPTIONS))).toBe(true);
  });
});

describe("access_pattern_mapping.json", () => {
  const parseMapping = (content: string): Record<string, Record<string, unknown>> => {
    const parsed: unknown = JSON.parse(content);
    const mapping: Record<string, Record<string, unknown>> = {};
    if (typeof parsed !== "object" || parsed === null) return mapping;
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === "object" && value !== null) mapping[key] = { ...value };
    }
    return mapping;
  };

  it("keys entries by pattern id with language return types", () => {
    const python = parseMapping(
      fileAt(renderManifest(model, pythonProfile, DEFAULT_GENERATION_OPTIONS), "access_pattern_mapping.json")
        .content,
    );
    expect(Object.keys(python)).toEqual(["1", "2", "3", "4", "5", "20"]);
    expect(python["3"]?.["return_type"]).toBe("list[User]");
    expect(python["20"]?.["return_type"]).toBe("bool");
    expect(python["1"]?.["crud_method"]).toBe(true);

    const typescript = parseMapping(
      fileAt(
        renderManifest(model, typescriptProfile, DEFAULT_GENERATION_OPTIONS),
        "access_pattern_mapping.json",
      ).content,
    );
    expect(typescript["3"]?.["return_type"]).toBe("User[]");
    expect(typescript["3"]?.["method_name"]).toBe("listUsersByStatus");
    expect(typescript["20"]?.["return_type"]).toBe("boolean");
  });

  it("ends with a newline", () => {
    const content = fileAt(
      renderManifest(model, pythonProfile, DEFAULT_GENERATION_OPTIONS),
      "access_pattern_mapping.json",
    ).content;
    expect(content.endsWith("}\n")).toBe(true);
  });
});
