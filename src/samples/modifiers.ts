/**
 * Sample modifier pipeline
 *
 * Stages run per sample in a fixed order:
 * 1. append    - add attributes a sample lacks
 * 2. duplicate - copy an attribute under another name
 * 3. derive    - expand data source templates
 * 4. imply     - set attributes when triggers match
 * 5. remove    - drop attributes
 *
 * No stage throws for a single sample or attribute; problems become
 * diagnostics and the value is left as it was.
 */

import type { ImplyRule, ModifierSettings } from '../config/types.js';
import { SAMPLE_NAME_ATTR } from '../config/types.js';
import type { Diagnostics } from '../diagnostics.js';
import { UnresolvedVariableError } from '../errors.js';
import { type Environment, type VariableScope, expandTemplate } from '../substitution/expand.js';
import { expandWildcard, hasWildcard } from '../substitution/wildcard.js';
import type { Sample } from './sample.js';

/**
 * Shared inputs for the modifier stages
 */
export interface ModifierContext {
  /** Project tier of the substitution namespace */
  project: VariableScope;
  env: Environment;
  diagnostics: Diagnostics;
}

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Run every modifier stage over every sample
 */
export function applyModifiers(
  samples: readonly Sample[],
  modifiers: ModifierSettings,
  context: ModifierContext
): void {
  const removable = modifiers.remove.filter(attribute => attribute !== SAMPLE_NAME_ATTR);
  if (removable.length !== modifiers.remove.length) {
    context.diagnostics.warn('PROTECTED_ATTRIBUTE', `"${SAMPLE_NAME_ATTR}" cannot be removed`, {
      attribute: SAMPLE_NAME_ATTR,
    });
  }

  for (const sample of samples) {
    applyAppend(sample, modifiers.append);
    applyDuplicate(sample, modifiers.duplicate, context.diagnostics);
    applyDerive(sample, modifiers.derive, context);
    applyImply(sample, modifiers.imply);
    applyRemove(sample, removable);
  }
}

// =============================================================================
// Stages
// =============================================================================

/**
 * Add attributes the sample does not already have
 */
export function applyAppend(sample: Sample, append: ModifierSettings['append']): void {
  for (const [attribute, value] of Object.entries(append)) {
    if (!sample.has(attribute)) {
      sample.set(attribute, value);
    }
  }
}

/**
 * Copy `source` to `target`; an occupied target gets the first free
 * `target_N` suffix instead
 */
export function applyDuplicate(
  sample: Sample,
  duplicate: ModifierSettings['duplicate'],
  diagnostics: Diagnostics
): void {
  for (const [source, target] of Object.entries(duplicate)) {
    if (!sample.has(source)) {
      diagnostics.warn('DUPLICATE_SOURCE_MISSING', `Cannot duplicate missing attribute "${source}"`, {
        sample: sample.name,
        attribute: source,
      });
      continue;
    }

    let destination = target;
    if (sample.has(target)) {
      let suffix = 1;
      while (sample.has(`${target}_${suffix}`)) suffix++;
      destination = `${target}_${suffix}`;
      diagnostics.warn(
        'DUPLICATE_TARGET_EXISTS',
        `Attribute "${target}" already exists; duplicated "${source}" as "${destination}"`,
        { sample: sample.name, attribute: target, context: { source, destination } }
      );
    }

    const values = sample.getValues(source);
    sample.set(destination, sample.isMultiValued(source) ? values : values.join(' '));
  }
}

/**
 * Replace data source keys with their expanded templates
 *
 * Values of merged attributes expand against their own subsample row first
 * and are never globbed.
 */
export function applyDerive(
  sample: Sample,
  derive: ModifierSettings['derive'],
  context: ModifierContext
): void {
  const { diagnostics } = context;

  for (const attribute of derive.attributes) {
    if (!sample.has(attribute)) continue;

    const tokens = sample.getValues(attribute);
    const merged = sample.isMerged(attribute);
    const rowIndexes = sample.mergedRowsOf(attribute);
    const sampleScope = sample.toRecord();
    const where = { sample: sample.name, attribute };

    const result: string[] = [];
    const usedSources: string[] = [];
    let failed = false;

    tokens.forEach((token, position) => {
      if (failed) return;
      if (!Object.hasOwn(derive.sources, token)) {
        result.push(token);
        return;
      }

      const template = derive.sources[token];
      const scopes: VariableScope[] = [sampleScope, context.project, context.env];
      const rowIndex = rowIndexes[position];
      if (merged && rowIndex !== undefined) {
        const row = sample.subsamples[rowIndex];
        if (row) scopes.unshift(row.values);
      }

      let expanded: string;
      try {
        expanded = expandTemplate(template, scopes);
      } catch (err) {
        if (!(err instanceof UnresolvedVariableError)) throw err;
        diagnostics.warn('UNRESOLVED_VARIABLE', `Cannot derive "${attribute}" from "${token}": ${err.message}`, {
          ...where,
          context: { source: token, missing: err.missing },
        });
        failed = true;
        return;
      }

      if (!usedSources.includes(token)) usedSources.push(token);

      if (!hasWildcard(expanded)) {
        result.push(expanded);
      } else if (merged) {
        diagnostics.warn(
          'WILDCARD_SUPPRESSED',
          `Wildcard in "${expanded}" not expanded; subsample values take precedence`,
          { ...where, context: { source: token, path: expanded } }
        );
        result.push(expanded);
      } else {
        const matches = expandWildcard(expanded);
        if (matches.length === 0) {
          diagnostics.warn('UNMATCHED_WILDCARD', `No files match "${expanded}"`, {
            ...where,
            context: { source: token, path: expanded },
          });
        }
        result.push(...matches);
      }
    });

    if (failed) continue;

    if (usedSources.length === 0) {
      diagnostics.note('UNKNOWN_DATA_SOURCE', `Value of "${attribute}" names no data source; left as is`, where);
      continue;
    }

    if (merged) {
      sample.set(attribute, result);
      sample.markMerged(attribute, rowIndexes);
    } else if (result.length > 1) {
      sample.set(attribute, result);
    } else {
      sample.set(attribute, result.length === 1 ? result[0] : '');
    }
    sample.recordDerivation(attribute, usedSources);
  }
}

/**
 * Apply every rule whose conditions all match the sample's current values;
 * later rules win
 */
export function applyImply(sample: Sample, rules: readonly ImplyRule[]): void {
  const snapshot = sample.toRecord();

  for (const rule of rules) {
    const matches = Object.entries(rule.when).every(([attribute, accepted]) => {
      const value = snapshot[attribute];
      return value !== undefined && accepted.includes(value);
    });
    if (!matches) continue;

    for (const [attribute, value] of Object.entries(rule.then)) {
      sample.set(attribute, value);
    }
  }
}

/**
 * Drop the named attributes
 */
export function applyRemove(sample: Sample, remove: readonly string[]): void {
  for (const attribute of remove) {
    sample.delete(attribute);
  }
}
