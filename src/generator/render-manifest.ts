/**
 * Manifest assembly: runs the renderer backend of a language over a
 * resolved model and lists the files in a fixed order.
 */

import type { GenerationOptions } from "../config/options.js";
import { type UsageLookup, createUsageLookup } from "../languages/sample-values.js";
import type { LanguageId, LanguageProfile, OutputRole } from "../languages/types.js";
import { buildPatternRegistry } from "../resolver/pattern-registry.js";
import type { Manifest, ManifestCategory, ManifestFile } from "../types/manifest.js";
import type { ResolvedEntity, ResolvedModel } from "../types/resolved.js";
import type { UsageDataDocument } from "../types/schema.js";
import { renderMapping } from "./mapping.js";
import { renderPythonBaseRepository } from "./python/base-repository.js";
import { renderPythonEntities } from "./python/entities.js";
import { renderPythonRepositories } from "./python/repositories.js";
import { renderPythonTransactionService } from "./python/transaction-service.js";
import { renderPythonUsageExamples } from "./python/usage-examples.js";
import { renderTypeScriptBaseRepository } from "./typescript/base-repository.js";
import { renderTypeScriptEntities } from "./typescript/entities.js";
import { renderTypeScriptRepositories } from "./typescript/repositories.js";
import { renderTypeScriptTransactionService } from "./typescript/transaction-service.js";
import { renderTypeScriptUsageExamples } from "./typescript/usage-examples.js";

/** Source renderers of one target language. */
export interface RendererBackend {
  readonly entities: (entities: readonly ResolvedEntity[], profile: LanguageProfile) => string;
  readonly repositories: (
    entities: readonly ResolvedEntity[],
    profile: LanguageProfile,
    options: GenerationOptions,
  ) => string;
  readonly baseRepository: () => string;
  readonly transactionService: (
    model: ResolvedModel,
    profile: LanguageProfile,
    options: GenerationOptions,
  ) => string;
  readonly usageExamples: (
    model: ResolvedModel,
    profile: LanguageProfile,
    usage: UsageLookup,
  ) => string;
}

const BACKENDS: Readonly<Record<LanguageId, RendererBackend>> = Object.freeze({
  python: {
    entities: renderPythonEntities,
    repositories: renderPythonRepositories,
    baseRepository: renderPythonBaseRepository,
    transactionService: renderPythonTransactionService,
    usageExamples: renderPythonUsageExamples,
  },
  typescript: {
    entities: renderTypeScriptEntities,
    repositories: renderTypeScriptRepositories,
    baseRepository: renderTypeScriptBaseRepository,
    transactionService: renderTypeScriptTransactionService,
    usageExamples: renderTypeScriptUsageExamples,
  },
});

export interface RenderOptions extends GenerationOptions {
  /** Realistic sample values for the usage examples. */
  readonly usageData?: UsageDataDocument | undefined;
}

const counted = (count: number, singular: string, plural: string): string =>
  `${count} ${count === 1 ? singular : plural}`;

/**
 * Renders every output file of a model. Pure: the same model, profile and
 * options always give byte-identical content.
 *
 * @example
 * ```ts
 * renderManifest(model, pythonProfile, DEFAULT_GENERATION_OPTIONS).map((file) => file.path);
 * // => ["entities.py", "repositories.py", "base_repository.py",
 * //     "usage_examples.py", "access_pattern_mapping.json"]
 * ```
 */
export const renderManifest = (
  model: ResolvedModel,
  profile: LanguageProfile,
  options: RenderOptions,
): Manifest => {
  const backend = BACKENDS[profile.id];
  const files: ManifestFile[] = [];
  const add = (
    role: OutputRole,
    category: ManifestCategory,
    description: string,
    content: string,
    count?: number,
  ): void => {
    files.push(Object.freeze({ path: profile.outputs[role], category, description, content, count }));
  };

  const entityCount = model.entities.length;
  add(
    "entities",
    "entities",
    counted(entityCount, "entity", "entities"),
    backend.entities(model.entities, profile),
    entityCount,
  );
  add(
    "repositories",
    "repositories",
    counted(entityCount, "repository", "repositories"),
    backend.repositories(model.entities, profile, options),
    entityCount,
  );
  add("base_repository", "support", "Base repository and entity configuration", backend.baseRepository());

  const transactionCount = model.transactions.length;
  if (transactionCount > 0) {
    add(
      "transaction_service",
      "services",
      counted(
        transactionCount,
        "cross-table transaction pattern",
        "cross-table transaction patterns",
      ),
      backend.transactionService(model, profile, options),
      transactionCount,
    );
  }
  if (options.includeUsageExamples) {
    add(
      "usage_examples",
      "examples",
      "Interactive examples",
      backend.usageExamples(model, profile, createUsageLookup(options.usageData)),
    );
  }
  if (options.includeMapping) {
    const registry = buildPatternRegistry(model, profile.methodName);
    add(
      "access_pattern_mapping",
      "mapping",
      `${counted(registry.length, "access pattern", "access patterns")} mapped to generated methods`,
      renderMapping(registry, profile),
      registry.length,
    );
  }
  return Object.freeze(files);
};
