/**
 * Language profile lookup.
 */

import { type Result, err, ok } from "../types/common.js";
import { type GenerationFailure, createGenerationFailure } from "../types/errors.js";
import { pythonProfile } from "./python.js";
import type { LanguageId, LanguageProfile } from "./types.js";
import { typescriptProfile } from "./typescript.js";

const PROFILES: Readonly<Record<LanguageId, LanguageProfile>> = Object.freeze({
  python: pythonProfile,
  typescript: typescriptProfile,
});

const isLanguageId = (value: string): value is LanguageId =>
  Object.prototype.hasOwnProperty.call(PROFILES, value);

/** Identifiers of every supported target language, sorted. */
export const listLanguages = (): readonly LanguageId[] =>
  Object.freeze(Object.values(PROFILES).map((profile) => profile.id).sort());

/**
 * Looks up a target language. Matching ignores case and surrounding spaces.
 *
 * @example
 * ```ts
 * getLanguageProfile("Python");  // => { success: true, data: pythonProfile }
 * getLanguageProfile("cobol");   // => { success: false, error: { type: "unknown-language", ... } }
 * ```
 */
export const getLanguageProfile = (
  language: string,
): Result<LanguageProfile, GenerationFailure> => {
  const id = language.trim().toLowerCase();
  if (!isLanguageId(id)) {
    return err(
      createGenerationFailure(
        "unknown-language",
        `Unsupported language '${language}'. Supported languages: ${listLanguages().join(", ")}`,
      ),
    );
  }
  return ok(PROFILES[id]);
};
