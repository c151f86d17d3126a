/**
 * Diagnostic taxonomy shared by the loader and the validator.
 */

export const DIAGNOSTIC_KINDS = [
  "StructuralError",
  "EnumViolation",
  "UniquenessViolation",
  "ReferenceError",
  "CardinalityError",
  "ConsistencyError",
] as const;
export type DiagnosticKind = (typeof DIAGNOSTIC_KINDS)[number];

export type DiagnosticSeverity = "error" | "warning";

/** A single problem found in a schema or usage-data document. */
export interface Diagnostic {
  readonly kind: DiagnosticKind;
  readonly severity: DiagnosticSeverity;
  /** Location in wire terms, e.g. `tables[0].entities.User.fields[1].type`. */
  readonly path: string;
  readonly message: string;
  readonly suggestion?: string | undefined;
  /** The offending value, for enum and reference diagnostics. */
  readonly value?: string | undefined;
  /** Both sides of a uniqueness conflict. */
  readonly locations?: readonly string[] | undefined;
}

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some(isError);
