/**
 * Normalized settings view of a descriptor tree
 *
 * Reads `metadata`, `data_sources` and `sample_modifiers` out of an effective
 * tree, accepting the shorthand and legacy forms each section allows, and
 * reports anything malformed as validation issues.
 */

import {
  type ConfigTree,
  type ConfigValue,
  type ImplyRule,
  type ModifierSettings,
  type ProjectSettings,
  DATA_SOURCES_KEY,
  LEGACY_DERIVED_KEY,
  LEGACY_IMPLIED_KEY,
  METADATA_KEY,
  MODIFIERS_KEY,
  OUTPUT_DIR_KEY,
  SAMPLE_ANNOTATION_KEY,
  SAMPLE_SUBANNOTATION_KEY,
  isConfigTree,
  isScalar,
} from './types.js';
import {
  type ValidationIssue,
  invalidFieldType,
  invalidModifier,
  missingRequiredField,
} from './issues.js';

/**
 * Result of reading settings from a tree
 */
export interface SettingsReadResult {
  /** Present when the required fields could be read */
  settings?: ProjectSettings;
  issues: ValidationIssue[];
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Read normalized settings from an effective tree
 */
export function readSettings(tree: Readonly<ConfigTree>): SettingsReadResult {
  const issues: ValidationIssue[] = [];

  const metadata = tree[METADATA_KEY];
  let sampleAnnotation: string | undefined;
  let sampleSubannotations: string[] = [];
  let outputDir: string | undefined;

  if (metadata === undefined || metadata === null) {
    issues.push(missingRequiredField(METADATA_KEY, `${METADATA_KEY}.${SAMPLE_ANNOTATION_KEY}`));
  } else if (!isConfigTree(metadata)) {
    issues.push(invalidFieldType(METADATA_KEY, 'a mapping', metadata));
  } else {
    const annotation = metadata[SAMPLE_ANNOTATION_KEY];
    if (typeof annotation === 'string' && annotation.length > 0) {
      sampleAnnotation = annotation;
    } else if (annotation === undefined || annotation === null || annotation === '') {
      issues.push(missingRequiredField(METADATA_KEY, SAMPLE_ANNOTATION_KEY));
    } else {
      issues.push(invalidFieldType(`${METADATA_KEY}.${SAMPLE_ANNOTATION_KEY}`, 'a path', annotation));
    }

    sampleSubannotations = readStringList(
      metadata[SAMPLE_SUBANNOTATION_KEY],
      `${METADATA_KEY}.${SAMPLE_SUBANNOTATION_KEY}`,
      issues
    );

    const out = metadata[OUTPUT_DIR_KEY];
    if (typeof out === 'string') {
      outputDir = out;
    } else if (out !== undefined && out !== null) {
      issues.push(invalidFieldType(`${METADATA_KEY}.${OUTPUT_DIR_KEY}`, 'a path', out));
    }
  }

  const dataSources = readStringMap(tree[DATA_SOURCES_KEY], DATA_SOURCES_KEY, issues);
  const { modifiers, unknownModifiers } = readModifiers(tree, dataSources, issues);

  if (sampleAnnotation === undefined) {
    return { issues };
  }

  return {
    settings: {
      sampleAnnotation,
      sampleSubannotations,
      outputDir,
      dataSources,
      modifiers,
      unknownModifiers,
    },
    issues,
  };
}

// =============================================================================
// Modifiers
// =============================================================================

function readModifiers(
  tree: Readonly<ConfigTree>,
  dataSources: Record<string, string>,
  issues: ValidationIssue[]
): { modifiers: ModifierSettings; unknownModifiers: string[] } {
  const modifiers: ModifierSettings = {
    append: {},
    duplicate: {},
    derive: { attributes: [], sources: { ...dataSources } },
    imply: [],
    remove: [],
  };
  const unknownModifiers: string[] = [];

  // Legacy top-level sections run first so `sample_modifiers` entries win
  const legacyDerived = tree[LEGACY_DERIVED_KEY];
  if (legacyDerived !== undefined && legacyDerived !== null) {
    modifiers.derive.attributes.push(...readStringList(legacyDerived, LEGACY_DERIVED_KEY, issues));
  }
  const legacyImplied = tree[LEGACY_IMPLIED_KEY];
  if (legacyImplied !== undefined && legacyImplied !== null) {
    modifiers.imply.push(...readImplyRules(legacyImplied, LEGACY_IMPLIED_KEY, issues));
  }

  const section = tree[MODIFIERS_KEY];
  if (section === undefined || section === null) {
    return { modifiers, unknownModifiers };
  }
  if (!isConfigTree(section)) {
    issues.push(invalidFieldType(MODIFIERS_KEY, 'a mapping', section));
    return { modifiers, unknownModifiers };
  }

  for (const [key, value] of Object.entries(section)) {
    const path = `${MODIFIERS_KEY}.${key}`;
    if (value === null) continue;

    switch (key) {
      case 'append':
        modifiers.append = readAttributeMap(value, path, issues);
        break;
      case 'duplicate':
        modifiers.duplicate = readStringMap(value, path, issues);
        break;
      case 'derive':
        readDerive(value, path, modifiers, issues);
        break;
      case 'imply':
        modifiers.imply.push(...readImplyRules(value, path, issues));
        break;
      case 'remove':
        modifiers.remove = readStringList(value, path, issues);
        break;
      default:
        unknownModifiers.push(key);
    }
  }

  modifiers.derive.attributes = [...new Set(modifiers.derive.attributes)];
  return { modifiers, unknownModifiers };
}

/**
 * `derive` is either a list of attribute names or
 * `{ attributes: [...], sources: {...} }`
 */
function readDerive(
  value: ConfigValue,
  path: string,
  modifiers: ModifierSettings,
  issues: ValidationIssue[]
): void {
  if (!isConfigTree(value)) {
    modifiers.derive.attributes.push(...readStringList(value, path, issues));
    return;
  }

  const attributes = value.attributes;
  if (attributes === undefined || attributes === null) {
    issues.push(missingRequiredField(path, 'attributes'));
  } else {
    modifiers.derive.attributes.push(...readStringList(attributes, `${path}.attributes`, issues));
  }

  const sources = value.sources;
  if (sources !== undefined && sources !== null) {
    Object.assign(modifiers.derive.sources, readStringMap(sources, `${path}.sources`, issues));
  }
}

/**
 * `imply` is a list of `{ if: {...}, then: {...} }` rules, or the legacy
 * mapping `{ trigger_attr: { trigger_value: { attr: value } } }`
 */
function readImplyRules(value: ConfigValue, path: string, issues: ValidationIssue[]): ImplyRule[] {
  const rules: ImplyRule[] = [];

  if (Array.isArray(value)) {
    value.forEach((entry, index) => {
      const entryPath = `${path}[${index}]`;
      if (!isConfigTree(entry)) {
        issues.push(invalidFieldType(entryPath, 'a mapping with "if" and "then"', entry));
        return;
      }
      const cond = entry.if;
      const then = entry.then;
      if (!isConfigTree(cond) || !isConfigTree(then)) {
        issues.push(invalidModifier(entryPath, 'each imply rule needs "if" and "then" mappings'));
        return;
      }
      const when: Record<string, string[]> = {};
      for (const [attr, accepted] of Object.entries(cond)) {
        const values = toAttributeValue(accepted);
        if (values === undefined) {
          issues.push(invalidFieldType(`${entryPath}.if.${attr}`, 'a value or list of values', accepted));
          return;
        }
        when[attr] = typeof values === 'string' ? [values] : values;
      }
      if (Object.keys(when).length === 0) {
        issues.push(invalidModifier(entryPath, '"if" must name at least one attribute'));
        return;
      }
      rules.push({ when, then: readAttributeMap(then, `${entryPath}.then`, issues) });
    });
    return rules;
  }

  if (!isConfigTree(value)) {
    issues.push(invalidFieldType(path, 'a list of rules', value));
    return rules;
  }

  for (const [trigger, byValue] of Object.entries(value)) {
    if (!isConfigTree(byValue)) {
      issues.push(invalidFieldType(`${path}.${trigger}`, 'a mapping of trigger values', byValue));
      continue;
    }
    for (const [triggerValue, assignments] of Object.entries(byValue)) {
      rules.push({
        when: { [trigger]: [triggerValue] },
        then: readAttributeMap(assignments, `${path}.${trigger}.${triggerValue}`, issues),
      });
    }
  }
  return rules;
}

// =============================================================================
// Value Readers
// =============================================================================

/**
 * Stringify a scalar or list of scalars; undefined for anything else
 */
export function toAttributeValue(value: ConfigValue | undefined): string | string[] | undefined {
  if (isScalar(value)) {
    return String(value);
  }
  if (Array.isArray(value) && value.every(isScalar)) {
    return value.map(item => String(item));
  }
  return undefined;
}

function readAttributeMap(
  value: ConfigValue,
  path: string,
  issues: ValidationIssue[]
): Record<string, string | string[]> {
  const result: Record<string, string | string[]> = {};
  if (!isConfigTree(value)) {
    issues.push(invalidFieldType(path, 'a mapping', value));
    return result;
  }
  for (const [key, item] of Object.entries(value)) {
    const converted = toAttributeValue(item);
    if (converted === undefined) {
      issues.push(invalidFieldType(`${path}.${key}`, 'a value or list of values', item));
      continue;
    }
    result[key] = converted;
  }
  return result;
}

function readStringMap(
  value: ConfigValue | undefined,
  path: string,
  issues: ValidationIssue[]
): Record<string, string> {
  const result: Record<string, string> = {};
  if (value === undefined || value === null) {
    return result;
  }
  if (!isConfigTree(value)) {
    issues.push(invalidFieldType(path, 'a mapping', value));
    return result;
  }
  for (const [key, item] of Object.entries(value)) {
    if (!isScalar(item)) {
      issues.push(invalidFieldType(`${path}.${key}`, 'a string', item));
      continue;
    }
    result[key] = String(item);
  }
  return result;
}

function readStringList(
  value: ConfigValue | undefined,
  path: string,
  issues: ValidationIssue[]
): string[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (isScalar(value)) {
    return [String(value)];
  }
  if (Array.isArray(value) && value.every(isScalar)) {
    return value.map(item => String(item));
  }
  issues.push(invalidFieldType(path, 'a string or list of strings', value));
  return [];
}

