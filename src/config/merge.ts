/**
 * Merge semantics for descriptor trees
 *
 * Two strategies are in play:
 * 1. Shallow (imports): top-level keys of the later tree replace earlier ones
 * 2. Deep key-path (overlays): mappings merge recursively, everything else
 *    (scalars, lists, null) replaces the base value
 *
 * Neither strategy mutates its inputs.
 */

import type { ConfigTree, ConfigValue } from './types.js';
import { isConfigTree } from './types.js';

// =============================================================================
// Cloning
// =============================================================================

/**
 * Deep clone a config value
 */
function cloneValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) {
    return value.map(item => cloneValue(item));
  }
  if (isConfigTree(value)) {
    return cloneTree(value);
  }
  return value;
}

/**
 * Deep clone a mapping node
 */
function cloneTree(tree: Readonly<ConfigTree>): ConfigTree {
  const clone: ConfigTree = {};
  for (const [key, value] of Object.entries(tree)) {
    clone[key] = cloneValue(value);
  }
  return clone;
}

// =============================================================================
// Merging
// =============================================================================

/**
 * Shallow-merge trees left to right; later trees win per top-level key
 */
export function shallowMerge(...trees: Readonly<ConfigTree>[]): ConfigTree {
  const result: ConfigTree = {};
  for (const tree of trees) {
    for (const [key, value] of Object.entries(tree)) {
      result[key] = cloneValue(value);
    }
  }
  return result;
}

/**
 * Deep key-path merge of an overlay onto a base
 *
 * Keys absent from the base are added. When both sides hold a mapping the
 * merge recurses; otherwise the overlay value replaces the base value.
 */
export function deepMerge(
  base: Readonly<ConfigTree>,
  overlay: Readonly<ConfigTree>
): ConfigTree {
  const result = cloneTree(base);

  for (const [key, overlayValue] of Object.entries(overlay)) {
    const baseValue = result[key];
    if (isConfigTree(baseValue) && isConfigTree(overlayValue)) {
      result[key] = deepMerge(baseValue, overlayValue);
    } else {
      result[key] = cloneValue(overlayValue);
    }
  }

  return result;
}

/**
 * Deep-freeze a tree so accidental writes to a loaded config throw
 */
export function freezeTree<T extends ConfigTree>(tree: T): Readonly<T> {
  for (const value of Object.values(tree)) {
    freezeValue(value);
  }
  return Object.freeze(tree);
}

function freezeValue(value: ConfigValue): void {
  if (Array.isArray(value)) {
    value.forEach(freezeValue);
    Object.freeze(value);
  } else if (isConfigTree(value)) {
    freezeTree(value);
  }
}
