/**
 * Generation options, validated with zod and merged with defaults.
 */

import { z } from "zod";
import { type Result, err, ok } from "../types/common.js";
import { type GenerationFailure, createGenerationFailure } from "../types/errors.js";

export const generationOptionsShape = z
  .object({
    /** Emit the usage examples file. */
    includeUsageExamples: z.boolean().default(true),
    /** Emit `access_pattern_mapping.json`. */
    includeMapping: z.boolean().default(true),
    /** Deployed table names keyed by schema table name. */
    tableNameOverrides: z.record(z.string().min(1)).default({}),
  })
  .strict();

export type GenerationOptions = z.output<typeof generationOptionsShape>;
export type GenerationOptionsInput = z.input<typeof generationOptionsShape>;

export const DEFAULT_GENERATION_OPTIONS: GenerationOptions = Object.freeze({
  includeUsageExamples: true,
  includeMapping: true,
  tableNameOverrides: {},
});

/**
 * Validates caller options and fills in defaults.
 *
 * @example
 * ```ts
 * resolveGenerationOptions({ includeMapping: false });
 * // => { success: true, data: { includeUsageExamples: true, includeMapping: false, tableNameOverrides: {} } }
 * ```
 */
export const resolveGenerationOptions = (
  input: unknown,
): Result<GenerationOptions, GenerationFailure> => {
  if (input === undefined) return ok(DEFAULT_GENERATION_OPTIONS);

  const parsed = generationOptionsShape.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    return err(
      createGenerationFailure("invalid-options", `Invalid generation options: ${details}`, [], parsed.error),
    );
  }
  return ok(
    Object.freeze({
      ...parsed.data,
      tableNameOverrides: Object.freeze({ ...parsed.data.tableNameOverrides }),
    }),
  );
};

/** Deployed name of a schema table. */
export const deployedTableName = (options: GenerationOptions, table: string): string =>
  options.tableNameOverrides[table] ?? table;
