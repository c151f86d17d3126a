import type { Diagnostic } from "./diagnostics.js";

/** Why a generate run produced no manifest. */
export interface GenerationFailure {
  readonly type: "invalid-schema" | "unknown-language" | "invalid-options";
  readonly message: string;
  /** Every diagnostic of the run, warnings included. */
  readonly diagnostics: readonly Diagnostic[];
  readonly cause?: unknown;
}

/** Creates a GenerationFailure. */
export const createGenerationFailure = (
  type: GenerationFailure["type"],
  message: string,
  diagnostics: readonly Diagnostic[] = [],
  cause?: unknown,
): GenerationFailure =>
  Object.freeze({ type, message, diagnostics: Object.freeze([...diagnostics]), cause });
