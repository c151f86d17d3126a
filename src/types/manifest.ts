/**
 * Generated output: the pattern registry and the file manifest.
 *
 * Registry entries use snake_case keys because they are serialized as-is
 * into `access_pattern_mapping.json`.
 */

export interface RegistryParameter {
  readonly name: string;
  readonly type: string;
  readonly entity_type?: string | undefined;
}

export interface RegistryParticipant {
  readonly table: string;
  readonly entity: string;
  readonly action: string;
}

export interface PatternRegistryEntry {
  readonly pattern_id: number;
  readonly description: string;
  /** Set for entity patterns. */
  readonly entity?: string | undefined;
  readonly repository?: string | undefined;
  /** Set for cross-table patterns. */
  readonly service?: string | undefined;
  readonly entities_involved?: readonly RegistryParticipant[] | undefined;
  readonly method_name: string;
  readonly parameters: readonly RegistryParameter[];
  readonly return_type: string;
  readonly operation: string;
  readonly index?: string | undefined;
  readonly range_condition?: string | undefined;
  readonly consistent_read?: boolean | undefined;
  readonly transaction_type?: "cross_table" | undefined;
  /** The pattern is served by a generated CRUD method. */
  readonly crud_method?: boolean | undefined;
}

export type ManifestCategory =
  | "entities"
  | "repositories"
  | "support"
  | "services"
  | "examples"
  | "mapping";

export interface ManifestFile {
  /** Path relative to the output directory. */
  readonly path: string;
  readonly category: ManifestCategory;
  readonly description: string;
  readonly content: string;
  readonly count?: number | undefined;
}

export type Manifest = readonly ManifestFile[];
