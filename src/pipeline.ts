/**
 * Entry points: validate-only and generate modes over raw JSON-shaped input.
 */

import { resolveGenerationOptions } from "./config/options.js";
import { renderManifest } from "./generator/render-manifest.js";
import { getLanguageProfile } from "./languages/registry.js";
import { loadSchema } from "./loader/load-schema.js";
import { loadUsageData } from "./loader/load-usage-data.js";
import { buildPatternRegistry } from "./resolver/pattern-registry.js";
import { resolveModel } from "./resolver/resolve-model.js";
import { type Result, err, ok } from "./types/common.js";
import { type Diagnostic, hasErrors, isError } from "./types/diagnostics.js";
import { type GenerationFailure, createGenerationFailure } from "./types/errors.js";
import type { Manifest, PatternRegistryEntry } from "./types/manifest.js";
import type { SchemaDocument, UsageDataDocument } from "./types/schema.js";
import { type Logger, logger as defaultLogger } from "./utils/logger.js";
import { validateDocument } from "./validation/validate-document.js";

export { formatDiagnostics } from "./validation/diagnostics.js";

export interface ValidateInput {
  /** Raw usage-data document, checked against the schema. */
  readonly usageData?: unknown;
  readonly logger?: Logger;
}

export interface ValidationReport {
  readonly valid: boolean;
  readonly diagnostics: readonly Diagnostic[];
}

export interface GenerateInput extends ValidateInput {
  readonly language: string;
  /** Raw generation options; validated before anything else runs. */
  readonly options?: unknown;
}

export interface GenerationOutput {
  readonly manifest: Manifest;
  readonly registry: readonly PatternRegistryEntry[];
  /** Non-blocking diagnostics found along the way. */
  readonly warnings: readonly Diagnostic[];
}

interface CheckedDocuments {
  readonly document: SchemaDocument | undefined;
  readonly usageData: UsageDataDocument | undefined;
  readonly diagnostics: readonly Diagnostic[];
}

const elapsed = (start: number): number => Math.round(performance.now() - start);

/** Loads and validates both documents; the schema is undefined when it cannot be loaded. */
const checkDocuments = (input: unknown, usageInput: unknown, log: Logger): CheckedDocuments => {
  const start = performance.now();
  const loaded = loadSchema(input);
  const usage =
    usageInput === undefined
      ? { usageData: undefined, diagnostics: [] }
      : loadUsageData(usageInput);
  log.debug("Loaded documents", {
    durationMs: elapsed(start),
    diagnostics: loaded.diagnostics.length + usage.diagnostics.length,
  });

  if (hasErrors(loaded.diagnostics)) {
    return {
      document: undefined,
      usageData: usage.usageData,
      diagnostics: [...loaded.diagnostics, ...usage.diagnostics],
    };
  }

  const validateStart = performance.now();
  const validated = validateDocument(loaded.document, usage.usageData);
  log.debug("Validated schema", {
    durationMs: elapsed(validateStart),
    diagnostics: validated.length,
  });
  return {
    document: loaded.document,
    usageData: usage.usageData,
    diagnostics: [...loaded.diagnostics, ...usage.diagnostics, ...validated],
  };
};

/**
 * Validate-only mode. Never throws on malformed input.
 *
 * @example
 * ```ts
 * const report = validateSchema(JSON.parse(text));
 * if (!report.valid) console.error(formatDiagnostics(report.diagnostics));
 * ```
 */
export const validateSchema = (input: unknown, options: ValidateInput = {}): ValidationReport => {
  const log = (options.logger ?? defaultLogger).child({ mode: "validate" });
  const { diagnostics } = checkDocuments(input, options.usageData, log);
  return Object.freeze({ valid: !hasErrors(diagnostics), diagnostics: Object.freeze(diagnostics) });
};

/**
 * Generate mode: validates, resolves and renders. Any error diagnostic
 * refuses generation and is returned with the full diagnostics list.
 *
 * @example
 * ```ts
 * const result = generate(schema, { language: "python" });
 * if (result.success) {
 *   for (const file of result.data.manifest) console.log(file.path);
 * }
 * ```
 */
export const generate = (
  input: unknown,
  request: GenerateInput,
): Result<GenerationOutput, GenerationFailure> => {
  const log = (request.logger ?? defaultLogger).child({ mode: "generate", language: request.language });
  const refuse = (failure: GenerationFailure): Result<never, GenerationFailure> => {
    log.warn("Generation refused", {
      reason: failure.type,
      errors: failure.diagnostics.filter(isError).length,
    });
    return err(failure);
  };

  const options = resolveGenerationOptions(request.options);
  if (!options.success) return refuse(options.error);

  const profile = getLanguageProfile(request.language);
  if (!profile.success) return refuse(profile.error);

  const checked = checkDocuments(input, request.usageData, log);
  const errorCount = checked.diagnostics.filter(isError).length;
  if (checked.document === undefined || errorCount > 0) {
    return refuse(
      createGenerationFailure(
        "invalid-schema",
        `Schema validation failed with ${errorCount} error${errorCount === 1 ? "" : "s"}`,
        checked.diagnostics,
      ),
    );
  }

  const resolveStart = performance.now();
  const model = resolveModel(checked.document);
  log.debug("Resolved model", {
    durationMs: elapsed(resolveStart),
    entities: model.entities.length,
    transactions: model.transactions.length,
  });

  const renderStart = performance.now();
  const manifest = renderManifest(model, profile.data, {
    ...options.data,
    usageData: checked.usageData,
  });
  log.debug("Rendered manifest", { durationMs: elapsed(renderStart), files: manifest.length });

  return ok(
    Object.freeze({
      manifest,
      registry: buildPatternRegistry(model, profile.data.methodName),
      warnings: Object.freeze(checked.diagnostics.filter((diagnostic) => !isError(diagnostic))),
    }),
  );
};
