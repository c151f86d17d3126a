/**
 * Append-only diagnostics collection threaded through every rule group.
 */

import type {
  Diagnostic,
  DiagnosticKind,
  DiagnosticSeverity,
} from "../types/diagnostics.js";
import { closeMatch, nearest } from "./suggest.js";

export interface DiagnosticInput {
  readonly kind: DiagnosticKind;
  readonly path: string;
  readonly message: string;
  readonly severity?: DiagnosticSeverity | undefined;
  readonly suggestion?: string | undefined;
  readonly value?: string | undefined;
  readonly locations?: readonly string[] | undefined;
}

/** Shared sink that rule groups append to. Never throws, never drops entries. */
export interface DiagnosticSink {
  readonly report: (input: DiagnosticInput) => void;
  readonly structural: (path: string, message: string) => void;
  /** Reports a value outside a closed set, suggesting the nearest member. */
  readonly enumViolation: (
    path: string,
    label: string,
    value: string,
    allowed: readonly string[],
  ) => void;
  readonly uniqueness: (
    path: string,
    message: string,
    locations: readonly string[],
  ) => void;
  /**
   * Reports an unresolved name. Suggests the closest candidate when it looks
   * like a typo, otherwise lists the candidates in the message.
   */
  readonly reference: (
    path: string,
    message: string,
    value: string,
    candidates: readonly string[],
  ) => void;
  readonly cardinality: (path: string, message: string) => void;
  readonly consistency: (
    path: string,
    message: string,
    severity?: DiagnosticSeverity,
  ) => void;
  readonly list: () => readonly Diagnostic[];
}

const freezeDiagnostic = (input: DiagnosticInput): Diagnostic =>
  Object.freeze({
    kind: input.kind,
    severity: input.severity ?? "error",
    path: input.path,
    message: input.message,
    ...(input.suggestion !== undefined ? { suggestion: input.suggestion } : {}),
    ...(input.value !== undefined ? { value: input.value } : {}),
    ...(input.locations !== undefined
      ? { locations: Object.freeze([...input.locations]) }
      : {}),
  });

/** Creates an empty {@link DiagnosticSink}. */
export const createDiagnosticSink = (): DiagnosticSink => {
  const entries: Diagnostic[] = [];
  const report = (input: DiagnosticInput): void => {
    entries.push(freezeDiagnostic(input));
  };

  return Object.freeze({
    report,
    structural: (path: string, message: string) =>
      report({ kind: "StructuralError", path, message }),
    enumViolation: (
      path: string,
      label: string,
      value: string,
      allowed: readonly string[],
    ) =>
      report({
        kind: "EnumViolation",
        path,
        value,
        message: `Invalid ${label} '${value}'. Valid values: ${allowed.join(", ")}`,
        suggestion: nearest(value, allowed),
      }),
    uniqueness: (path: string, message: string, locations: readonly string[]) =>
      report({ kind: "UniquenessViolation", path, message, locations }),
    reference: (
      path: string,
      message: string,
      value: string,
      candidates: readonly string[],
    ) => {
      const suggestion = closeMatch(value, candidates);
      const hint =
        suggestion !== undefined
          ? ` Did you mean '${suggestion}'?`
          : candidates.length > 0
            ? ` Available: ${[...candidates].sort().join(", ")}`
            : "";
      report({
        kind: "ReferenceError",
        path,
        value,
        message: `${message}.${hint}`,
        suggestion,
      });
    },
    cardinality: (path: string, message: string) =>
      report({ kind: "CardinalityError", path, message }),
    consistency: (
      path: string,
      message: string,
      severity: DiagnosticSeverity = "error",
    ) => report({ kind: "ConsistencyError", path, message, severity }),
    list: () => Object.freeze([...entries]),
  });
};

/**
 * Appends a key or index to a wire path.
 *
 * @example
 * ```ts
 * joinPath("tables", 0);          // => "tables[0]"
 * joinPath("tables[0]", "entities"); // => "tables[0].entities"
 * ```
 */
export const joinPath = (base: string, key: string | number): string => {
  if (typeof key === "number") return `${base}[${key}]`;
  return base.length === 0 ? key : `${base}.${key}`;
};

/**
 * Formats diagnostics as one line each, errors first, keeping the original
 * order within a severity.
 */
export const formatDiagnostics = (
  diagnostics: readonly Diagnostic[],
): string => {
  const ordered = [
    ...diagnostics.filter((d) => d.severity === "error"),
    ...diagnostics.filter((d) => d.severity === "warning"),
  ];
  return ordered
    .map((d) => {
      const suggestion =
        d.suggestion !== undefined ? ` (suggestion: ${d.suggestion})` : "";
      return `[${d.severity}] ${d.kind} at ${d.path}: ${d.message}${suggestion}`;
    })
    .join("\n");
};
