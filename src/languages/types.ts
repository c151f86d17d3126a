import type { FieldKind } from "../types/enums.js";
import type { ResolvedParameter } from "../types/resolved.js";
import type { SampleValue } from "./sample-values.js";

export type LanguageId = "python" | "typescript";

/**
 * Files a generator run can produce. `transaction_service` only appears
 * with cross-table patterns and `usage_examples` only when enabled.
 */
export type OutputRole =
  | "entities"
  | "repositories"
  | "base_repository"
  | "transaction_service"
  | "usage_examples"
  | "access_pattern_mapping";

/** Everything language specific that the renderers look up. */
export interface LanguageProfile {
  readonly id: LanguageId;
  readonly displayName: string;
  readonly fileExtension: string;
  /** Output path per role, relative to the output directory. */
  readonly outputs: Readonly<Record<OutputRole, string>>;
  readonly fieldType: (kind: FieldKind, itemKind?: FieldKind) => string;
  readonly parameterType: (param: ResolvedParameter) => string;
  /** Method name from the snake_case name the resolver assigns. */
  readonly methodName: (snakeName: string) => string;
  /** Argument or local variable name from a schema name. */
  readonly identifier: (name: string) => string;
  /** Declared return type of a pattern method. */
  readonly returnType: (returnShape: string, entity: string | undefined) => string;
  readonly literal: (value: SampleValue) => string;
}
