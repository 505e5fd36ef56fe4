/**
 * Named overlays (amendments and subprojects)
 *
 * An overlay is a partial descriptor declared under `amendments` or
 * `subprojects`. Activation always deep-merges onto the untouched base, so
 * switching overlays never stacks one on another.
 */

import {
  type ConfigTree,
  type ProjectConfig,
  AMENDMENTS_KEY,
  SUBPROJECTS_KEY,
  isConfigTree,
} from './types.js';
import { deepMerge, freezeTree } from './merge.js';
import { UnknownAmendmentError } from '../errors.js';

/**
 * Declared overlays by name, in declaration order
 *
 * `subprojects` entries come first; an `amendments` entry of the same name
 * replaces it.
 */
function declaredOverlays(base: Readonly<ConfigTree>): Map<string, Readonly<ConfigTree>> {
  const overlays = new Map<string, Readonly<ConfigTree>>();

  for (const section of [SUBPROJECTS_KEY, AMENDMENTS_KEY]) {
    const entries = base[section];
    if (!isConfigTree(entries)) continue;
    for (const [name, body] of Object.entries(entries)) {
      if (isConfigTree(body)) overlays.set(name, body);
    }
  }

  return overlays;
}

/**
 * Names of the overlays a config declares
 */
export function listAmendments(config: ProjectConfig): string[] {
  return [...declaredOverlays(config.base).keys()];
}

/**
 * Activate a named overlay
 *
 * @returns A new config; the input is left unchanged
 * @throws UnknownAmendmentError if the name is not declared
 */
export function activateAmendment(config: ProjectConfig, name: string): ProjectConfig {
  const overlays = declaredOverlays(config.base);
  const body = overlays.get(name);
  if (!body) {
    throw new UnknownAmendmentError(name, [...overlays.keys()]);
  }

  return Object.freeze({
    filePath: config.filePath,
    sources: config.sources,
    base: config.base,
    tree: freezeTree(deepMerge(config.base, body)),
    activeAmendment: name,
  });
}

/**
 * Return to the base config with no overlay active
 */
export function deactivateAmendment(config: ProjectConfig): ProjectConfig {
  if (config.activeAmendment === null) {
    return config;
  }
  return Object.freeze({
    filePath: config.filePath,
    sources: config.sources,
    base: config.base,
    tree: config.base,
    activeAmendment: null,
  });
}
