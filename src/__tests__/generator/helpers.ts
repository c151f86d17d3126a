import type { ManifestFile } from "../../types/manifest.js";

/** Content lines with indentation stripped. */
export const trimmedLines = (content: string): string[] =>
  content.split("\n").map((line) => line.trim());

export const fileAt = (manifest: readonly ManifestFile[], path: string): ManifestFile => {
  const file = manifest.find((candidate) => candidate.path === path);
  if (file === undefined) throw new Error(`no file ${path}`);
  return file;
};
