/**
 * Descriptor validation
 *
 * Structural checks run on a tree after imports are merged:
 * 1. Required metadata - `metadata.sample_annotation` names a table
 * 2. Section shapes - `data_sources`, `sample_modifiers`, `imports`
 * 3. Overlays - every `amendments`/`subprojects` entry is a mapping whose
 *    own sections have valid shapes
 *
 * @example Valid Descriptor
 * ```yaml
 * metadata:
 *   sample_annotation: samples.csv
 * data_sources:
 *   source1: /data/{organism}_{time}h.fastq
 * sample_modifiers:
 *   derive: [file]
 * amendments:
 *   newLib:
 *     metadata:
 *       sample_annotation: samples_new.csv
 * ```
 */

import {
  type ConfigTree,
  AMENDMENTS_KEY,
  IMPORTS_KEY,
  NAME_KEY,
  SUBPROJECTS_KEY,
  isConfigTree,
  isScalar,
} from './types.js';
import {
  type ValidationIssue,
  type ValidationResult,
  invalidAmendment,
  invalidFieldType,
  validationResult,
} from './issues.js';
import { readSettings } from './settings.js';

// =============================================================================
// Validation Options
// =============================================================================

export interface ConfigValidationOptions {
  /**
   * Skip the `metadata.sample_annotation` requirement. Overlay bodies are
   * partial configs and are checked this way.
   */
  partial?: boolean;
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Validate a descriptor tree
 */
export function validateConfig(
  tree: Readonly<ConfigTree>,
  options: ConfigValidationOptions = {}
): ValidationResult {
  const issues: ValidationIssue[] = [];

  const { issues: settingsIssues } = readSettings(tree);
  issues.push(
    ...(options.partial
      ? settingsIssues.filter(issue => issue.code !== 'MISSING_REQUIRED_FIELD' || issue.path !== 'metadata')
      : settingsIssues)
  );

  const name = tree[NAME_KEY];
  if (name !== undefined && name !== null && !isScalar(name)) {
    issues.push(invalidFieldType(NAME_KEY, 'a string', name));
  }

  checkImports(tree, issues);

  for (const section of [AMENDMENTS_KEY, SUBPROJECTS_KEY]) {
    checkOverlaySection(tree, section, issues);
  }

  return validationResult(issues);
}

// =============================================================================
// Section Checks
// =============================================================================

function checkImports(tree: Readonly<ConfigTree>, issues: ValidationIssue[]): void {
  const imports = tree[IMPORTS_KEY];
  if (imports === undefined || imports === null || typeof imports === 'string') {
    return;
  }
  if (!Array.isArray(imports) || !imports.every(item => typeof item === 'string')) {
    issues.push(invalidFieldType(IMPORTS_KEY, 'a path or list of paths', imports));
  }
}

function checkOverlaySection(
  tree: Readonly<ConfigTree>,
  section: string,
  issues: ValidationIssue[]
): void {
  const overlays = tree[section];
  if (overlays === undefined || overlays === null) {
    return;
  }
  if (!isConfigTree(overlays)) {
    issues.push(invalidFieldType(section, 'a mapping of named overlays', overlays));
    return;
  }

  for (const [name, body] of Object.entries(overlays)) {
    const path = `${section}.${name}`;
    if (!isConfigTree(body)) {
      issues.push(invalidAmendment(path, name, body));
      continue;
    }
    // Overlay bodies carry no sample_annotation requirement of their own
    const nested = validateConfig(body, { partial: true });
    for (const issue of nested.issues) {
      issues.push({ ...issue, path: `${path}.${issue.path}` });
    }
  }
}
