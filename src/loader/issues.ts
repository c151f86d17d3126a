/**
 * Maps zod issues onto structural diagnostics.
 */

import type { ZodIssue } from "zod";
import type { Diagnostic } from "../types/diagnostics.js";
import { joinPath } from "../validation/diagnostics.js";
import { isRecord } from "../utils/guards.js";

const valueAt = (root: unknown, path: readonly (string | number)[]): unknown => {
  let current = root;
  for (const key of path) {
    if (typeof key === "number") {
      if (!Array.isArray(current)) return undefined;
      current = current[key];
    } else {
      if (!isRecord(current)) return undefined;
      current = current[key];
    }
  }
  return current;
};

const describeIssue = (issue: ZodIssue, input: unknown): string => {
  const last = issue.path[issue.path.length - 1];
  if (issue.path.length > 0 && valueAt(input, issue.path) === undefined) {
    return `Missing required field '${String(last)}'`;
  }
  switch (issue.code) {
    case "invalid_type":
      return `Expected ${issue.expected}, received ${issue.received}`;
    case "too_small":
      return issue.type === "array" && issue.minimum === 1
        ? "Must not be empty"
        : issue.message;
    default:
      return issue.message;
  }
};

/**
 * Converts zod issues for a value located at `basePath` into frozen
 * `StructuralError` diagnostics.
 *
 * @param issues - Issues from a failed `safeParse`
 * @param input - The value that was parsed, used to detect missing keys
 * @param basePath - Wire path of `input` inside the whole document
 */
export const issuesToDiagnostics = (
  issues: readonly ZodIssue[],
  input: unknown,
  basePath: string,
): readonly Diagnostic[] =>
  issues.map((issue) =>
    Object.freeze({
      kind: "StructuralError" as const,
      severity: "error" as const,
      path: issue.path.reduce<string>(
        (path, key) => joinPath(path, key),
        basePath,
      ),
      message: describeIssue(issue, input),
    }),
  );
