/**
 * ddb-repo-codegen: compiles a declarative wide-column data model into
 * validated, typed data-access code.
 *
 * @example
 * ```ts
 * import { generate, formatDiagnostics } from "ddb-repo-codegen";
 *
 * const result = generate(JSON.parse(schemaText), { language: "typescript" });
 * if (!result.success) {
 *   console.error(result.error.message);
 *   console.error(formatDiagnostics(result.error.diagnostics));
 * } else {
 *   for (const file of result.data.manifest) console.log(file.path, file.description);
 * }
 * ```
 */

// Pipeline
export { validateSchema, generate, formatDiagnostics } from "./pipeline.js";
export type { ValidateInput, ValidationReport, GenerateInput, GenerationOutput } from "./pipeline.js";

// Loading and validation
export { loadSchema, type LoadResult } from "./loader/load-schema.js";
export { loadUsageData, type UsageDataLoadResult } from "./loader/load-usage-data.js";
export { validateDocument } from "./validation/validate-document.js";
export type { Diagnostic, DiagnosticKind, DiagnosticSeverity } from "./types/diagnostics.js";
export type * from "./types/schema.js";

// Key templates
export {
  parseTemplate,
  templatePrefix,
  findTemplateSyntaxErrors,
  type ParsedTemplate,
} from "./keys/template-parser.js";
export {
  compileKeyTemplate,
  fieldKindLookup,
  MAX_KEY_ATTRIBUTES,
  type CompiledKeyTemplate,
} from "./keys/key-template.js";
export { buildKey, buildKeyValue, buildCompiledKey, type KeyValue } from "./keys/key-builder.js";

// Resolution
export { resolveModel } from "./resolver/resolve-model.js";
export { buildPatternRegistry } from "./resolver/pattern-registry.js";
export { ResolverInvariantError } from "./resolver/errors.js";
export type * from "./types/resolved.js";

// Languages and rendering
export { getLanguageProfile, listLanguages } from "./languages/registry.js";
export type { LanguageId, LanguageProfile, OutputRole } from "./languages/types.js";
export { renderManifest, type RenderOptions } from "./generator/render-manifest.js";
export type { Manifest, ManifestFile, ManifestCategory, PatternRegistryEntry } from "./types/manifest.js";

// Options, errors and logging
export {
  resolveGenerationOptions,
  DEFAULT_GENERATION_OPTIONS,
  type GenerationOptions,
  type GenerationOptionsInput,
} from "./config/options.js";
export { type GenerationFailure, createGenerationFailure } from "./types/errors.js";
export { type Result, ok, err, mapResult } from "./types/common.js";
export { createLogger, type Logger, type LogLevel } from "./utils/logger.js";
