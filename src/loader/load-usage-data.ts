/**
 * Loader for the optional usage-data document: per-entity illustrative
 * values used to make generated examples read naturally.
 */

import type { Diagnostic } from "../types/diagnostics.js";
import type { UsageDataDocument } from "../types/schema.js";
import { isRecord } from "../utils/guards.js";
import { deepFreeze } from "../utils/freeze.js";
import { issuesToDiagnostics } from "./issues.js";
import { usageDataShape } from "./shapes.js";

export interface UsageDataLoadResult {
  /** Undefined when the document is not usable at all. */
  readonly usageData: UsageDataDocument | undefined;
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Loads a usage-data document. Checks that `entities` maps entity names to
 * objects whose sections are objects; which entities, sections and fields are
 * allowed is decided by the validator against the schema.
 *
 * @example
 * ```ts
 * loadUsageData({ entities: { User: { sample_data: { user_id: "u-1" } } } });
 * // => { usageData: { topLevelKeys: ["entities"], entities: [...] }, diagnostics: [] }
 * ```
 */
export const loadUsageData = (input: unknown): UsageDataLoadResult => {
  if (!isRecord(input)) {
    return Object.freeze({
      usageData: undefined,
      diagnostics: Object.freeze([
        Object.freeze({
          kind: "StructuralError" as const,
          severity: "error" as const,
          path: "$",
          message: "Usage data must be a JSON object",
        }),
      ]),
    });
  }

  const parsed = usageDataShape.safeParse(input);
  if (!parsed.success) {
    return Object.freeze({
      usageData: undefined,
      diagnostics: issuesToDiagnostics(parsed.error.issues, input, ""),
    });
  }

  return Object.freeze({
    usageData: deepFreeze<UsageDataDocument>({
      topLevelKeys: Object.keys(input),
      entities: Object.entries(parsed.data.entities).map(
        ([entity, sections]) => ({ entity, sections }),
      ),
    }),
    diagnostics: Object.freeze([]),
  });
};
