import { describe, it, expect } from "vitest";
import { formatDiagnostics, generate, validateSchema } from "../../pipeline.js";
import type { Logger, LogContext } from "../../utils/logger.js";
import {
  schemaOf,
  silentLogger,
  usageDocument,
  userEntity,
  userPatterns,
  usersSchema,
  usersTable,
  orderEntity,
  placeOrderTransaction,
} from "../fixtures.js";

const withTypoIndex = () =>
  schemaOf(
    [
      usersTable({
        entities: {
          User: userEntity({
            access_patterns: userPatterns().map((pattern) =>
              pattern.pattern_id === 3 ? { ...pattern, index_name: "StatusIdx" } : pattern,
            ),
          }),
          Order: orderEntity(),
        },
      }),
    ],
    [placeOrderTransaction()],
  );

const recordingLogger = (): { logger: Logger; warnings: [string, LogContext | undefined][] } => {
  const warnings: [string, LogContext | undefined][] = [];
  const logger: Logger = {
    ...silentLogger,
    warn: (message, context) => {
      warnings.push([message, context]);
    },
    child: () => logger,
  };
  return { logger, warnings };
};

describe("validateSchema()", () => {
  it("accepts a valid schema with matching usage data", () => {
    expect(
      validateSchema(usersSchema(), { usageData: usageDocument(), logger: silentLogger }),
    ).toEqual({ valid: true, diagnostics: [] });
  });

  it("reports diagnostics without throwing", () => {
    const report = validateSchema(withTypoIndex(), { logger: silentLogger });
    expect(report.valid).toBe(false);
    expect(report.diagnostics.map((diagnostic) => diagnostic.suggestion)).toEqual(["StatusIndex"]);
  });

  it("handles input that is not an object", () => {
    expect(validateSchema("tables", { logger: silentLogger })).toEqual({
      valid: false,
      diagnostics: [
        {
          kind: "StructuralError",
          severity: "error",
          path: "$",
          message: "Schema document must be a JSON object",
        },
      ],
    });
  });
});

describe("generate()", () => {
  it("renders the manifest and the registry", () => {
    const result = generate(usersSchema(), {
      language: "typescript",
      usageData: usageDocument(),
      logger: silentLogger,
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.manifest).toHaveLength(6);
    expect(result.data.registry.map((entry) => entry.method_name)).toEqual([
      "getUser",
      "putUser",
      "listUsersByStatus",
      "updateUserStatus",
      "getUserOrders",
      "placeOrder",
    ]);
    expect(result.data.warnings).toEqual([]);
  });

  it("refuses to generate from an invalid schema", () => {
    const { logger, warnings } = recordingLogger();
    const result = generate(withTypoIndex(), { language: "python", logger });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.type).toBe("invalid-schema");
    expect(result.error.message).toBe("Schema validation failed with 1 error");
    expect(formatDiagnostics(result.error.diagnostics)).toBe(
      "[error] ReferenceError at tables[0].entities.User.access_patterns[2].index_name: Pattern 3 (list_users_by_status) references unknown index 'StatusIdx' in table 'Users'. Did you mean 'StatusIndex'? (suggestion: StatusIndex)",
    );
    expect(warnings).toEqual([["Generation refused", { reason: "invalid-schema", errors: 1 }]]);
  });

  it("refuses an unknown language before loading the schema", () => {
    const { logger, warnings } = recordingLogger();
    const result = generate("not a schema", { language: "cobol", logger });
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.type).toBe("unknown-language");
    expect(warnings).toEqual([["Generation refused", { reason: "unknown-language", errors: 0 }]]);
  });

  it("refuses invalid options", () => {
    const result = generate(usersSchema(), {
      language: "python",
      options: { includeUsageExamples: 1 },
      logger: silentLogger,
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.type).toBe("invalid-options");
      expect(result.error.message).toBe(
        "Invalid generation options: includeUsageExamples: Expected boolean, received number",
      );
    }
  });

  it("passes warnings through a successful run", () => {
    const table = usersTable();
    const schema = schemaOf([
      {
        ...table,
        gsi_list: [
          {
            name: "StatusIndex",
            partition_key: "gsi1pk",
            sort_key: "gsi1sk",
            projection: "INCLUDE",
            included_attributes: ["email"],
          },
        ],
      },
    ]);
    const result = generate(schema, {
      language: "python",
      options: { includeUsageExamples: false },
      logger: silentLogger,
    });
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.data.warnings.map((warning) => [warning.severity, warning.path])).toEqual([
      ["warning", "tables[0].entities.User"],
    ]);
    expect(result.data.manifest.map((file) => file.path)).toEqual([
      "entities.py",
      "repositories.py",
      "base_repository.py",
      "access_pattern_mapping.json",
    ]);
  });
});
