import type { LanguageProfile } from "../languages/types.js";
import type { PatternRegistryEntry } from "../types/manifest.js";

/**
 * `access_pattern_mapping.json`: registry entries keyed by pattern id, with
 * return types spelled in the target language.
 */
export const renderMapping = (
  registry: readonly PatternRegistryEntry[],
  profile: LanguageProfile,
): string => {
  const mapping: Record<string, PatternRegistryEntry> = {};
  for (const entry of registry) {
    mapping[String(entry.pattern_id)] = {
      ...entry,
      return_type: profile.returnType(entry.return_type, entry.entity),
    };
  }
  return `${JSON.stringify(mapping, null, 2)}\n`;
};
