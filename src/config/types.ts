/**
 * Project descriptor type definitions
 *
 * The raw tree is what YAML parsing yields; the settings types are the
 * normalized view the resolution stages work from.
 */

// =============================================================================
// Raw Tree
// =============================================================================

/**
 * Any value that can appear in a parsed descriptor
 */
export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | ConfigValue[]
  | ConfigTree;

/**
 * A mapping node of a parsed descriptor
 */
export interface ConfigTree {
  [key: string]: ConfigValue;
}

// =============================================================================
// Section Keys
// =============================================================================

export const METADATA_KEY = 'metadata';
export const SAMPLE_ANNOTATION_KEY = 'sample_annotation';
export const SAMPLE_SUBANNOTATION_KEY = 'sample_subannotation';
export const OUTPUT_DIR_KEY = 'output_dir';
export const DATA_SOURCES_KEY = 'data_sources';
export const MODIFIERS_KEY = 'sample_modifiers';
export const IMPORTS_KEY = 'imports';
export const AMENDMENTS_KEY = 'amendments';
export const SUBPROJECTS_KEY = 'subprojects';
export const NAME_KEY = 'name';
export const DESCRIPTION_KEY = 'description';

/** Legacy top-level forms of the derive and imply modifiers */
export const LEGACY_DERIVED_KEY = 'derived_attributes';
export const LEGACY_IMPLIED_KEY = 'implied_attributes';

/** Sample attribute that identifies a sample */
export const SAMPLE_NAME_ATTR = 'sample_name';
/** Subsample attribute that identifies a subsample row */
export const SUBSAMPLE_NAME_ATTR = 'subsample_name';

/** Keys under `metadata` that hold file paths */
export const METADATA_PATH_KEYS = [
  SAMPLE_ANNOTATION_KEY,
  SAMPLE_SUBANNOTATION_KEY,
  OUTPUT_DIR_KEY,
] as const;

// =============================================================================
// Loaded Config
// =============================================================================

/**
 * A loaded project descriptor
 *
 * Values of this type are never mutated; overlay activation produces a new one.
 */
export interface ProjectConfig {
  /** Absolute path of the main descriptor file */
  readonly filePath: string;
  /** Absolute paths of every file merged into the base, main file last */
  readonly sources: readonly string[];
  /** Base tree: imports merged, paths absolute, no overlay applied */
  readonly base: Readonly<ConfigTree>;
  /** Effective tree: base with the active overlay merged in */
  readonly tree: Readonly<ConfigTree>;
  /** Active overlay name, or null */
  readonly activeAmendment: string | null;
}

// =============================================================================
// Normalized Settings
// =============================================================================

/**
 * A rule under `sample_modifiers.imply`
 */
export interface ImplyRule {
  /** Attribute → accepted values; every condition must match */
  when: Record<string, string[]>;
  /** Attribute → value assigned on match */
  then: Record<string, string | string[]>;
}

/**
 * Normalized `sample_modifiers` section
 */
export interface ModifierSettings {
  append: Record<string, string | string[]>;
  duplicate: Record<string, string>;
  derive: {
    attributes: string[];
    /** `derive.sources`, layered over `data_sources` */
    sources: Record<string, string>;
  };
  imply: ImplyRule[];
  remove: string[];
}

/**
 * Normalized view of the effective tree used by the build
 */
export interface ProjectSettings {
  sampleAnnotation: string;
  sampleSubannotations: string[];
  outputDir?: string;
  dataSources: Record<string, string>;
  modifiers: ModifierSettings;
  /** Keys under `sample_modifiers` that are not modifier stages */
  unknownModifiers: string[];
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a mapping node
 */
export function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is a scalar leaf
 */
export function isScalar(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
