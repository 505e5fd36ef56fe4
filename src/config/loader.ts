/**
 * Project descriptor loading
 *
 * Reads a YAML descriptor, resolves its `imports` recursively, makes every
 * metadata path absolute relative to the file that declares it, validates
 * the merged result and returns a frozen ProjectConfig.
 */

import { existsSync, readFileSync } from 'node:fs';
import { basename, dirname, isAbsolute, resolve } from 'node:path';
import { parseDocument } from 'yaml';
import {
  type ConfigTree,
  type ConfigValue,
  type ProjectConfig,
  AMENDMENTS_KEY,
  DESCRIPTION_KEY,
  IMPORTS_KEY,
  METADATA_KEY,
  METADATA_PATH_KEYS,
  NAME_KEY,
  SUBPROJECTS_KEY,
  isConfigTree,
  isScalar,
} from './types.js';
import { freezeTree, shallowMerge } from './merge.js';
import { validateConfig } from './validator.js';
import { formatIssues } from './issues.js';
import { activateAmendment } from './overlay.js';
import { ConfigLoadError, errorMessage } from '../errors.js';
import { type Environment, expandPathVariables } from '../substitution/expand.js';
import { type Logger, logger as defaultLogger } from '../logging/logger.js';

/**
 * Options for loading a descriptor
 */
export interface LoadConfigOptions {
  /** Overlay to activate right after loading */
  amendment?: string | null;
  /** Environment for `~` and `$VAR` path expansion (default: process.env) */
  env?: Environment;
  logger?: Logger;
}

interface LoadState {
  env: Environment;
  /** Files currently being loaded, outermost first */
  stack: string[];
  /** Every file merged so far, in completion order, each once */
  sources: string[];
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Load a project descriptor
 *
 * @param configPath - Path to the YAML descriptor
 * @throws ConfigLoadError if a file is missing or malformed, imports form a
 * cycle, or the merged tree fails validation
 * @throws UnknownAmendmentError if `options.amendment` is not declared
 */
export function loadConfig(configPath: string, options: LoadConfigOptions = {}): ProjectConfig {
  const env = options.env ?? process.env;
  const log = options.logger ?? defaultLogger;
  const filePath = resolve(configPath);

  if (!existsSync(filePath)) {
    throw new ConfigLoadError(`Config file not found: ${filePath}`, 'CONFIG_NOT_FOUND', {
      path: filePath,
    });
  }

  const state: LoadState = { env, stack: [], sources: [] };
  const base = loadTree(filePath, state);

  const validation = validateConfig(base);
  if (!validation.valid) {
    throw new ConfigLoadError(
      `Invalid project config ${filePath}:\n${formatIssues(validation.errors)}`,
      'CONFIG_INVALID',
      { path: filePath, issues: validation.errors }
    );
  }

  const frozen = freezeTree(base);
  const config: ProjectConfig = Object.freeze({
    filePath,
    sources: Object.freeze([...state.sources]),
    base: frozen,
    tree: frozen,
    activeAmendment: null,
  });

  // Fail early on a malformed name
  projectName(config);

  log.debug('Loaded project config', { path: filePath, sources: state.sources.length });

  if (options.amendment) {
    return activateAmendment(config, options.amendment);
  }
  return config;
}

// =============================================================================
// Project Identity
// =============================================================================

/**
 * Project name: the `name` key, else the descriptor's directory name (or its
 * parent's when that directory is called `metadata`)
 *
 * @throws ConfigLoadError if the name contains whitespace
 */
export function projectName(config: ProjectConfig): string {
  const declared = config.tree[NAME_KEY];
  let name: string;

  if (isScalar(declared)) {
    name = String(declared);
  } else {
    const dir = dirname(config.filePath);
    name = basename(dir) === METADATA_KEY ? basename(dirname(dir)) : basename(dir);
  }

  if (/\s/.test(name)) {
    throw new ConfigLoadError(`Project name must not contain whitespace: "${name}"`, 'CONFIG_INVALID', {
      path: config.filePath,
      name,
    });
  }
  return name;
}

/**
 * Project description, if declared
 */
export function projectDescription(config: ProjectConfig): string | undefined {
  const description = config.tree[DESCRIPTION_KEY];
  return isScalar(description) ? String(description) : undefined;
}

// =============================================================================
// Recursive Loading
// =============================================================================

function loadTree(filePath: string, state: LoadState): ConfigTree {
  if (state.stack.includes(filePath)) {
    const chain = [...state.stack.slice(state.stack.indexOf(filePath)), filePath];
    throw new ConfigLoadError(`Import cycle detected: ${chain.join(' -> ')}`, 'IMPORT_CYCLE', {
      chain,
    });
  }

  state.stack.push(filePath);
  try {
    const own = readDocument(filePath);
    const dir = dirname(filePath);
    absolutizePaths(own, dir, state.env);

    const imported: ConfigTree[] = [];
    for (const target of readImports(own, filePath)) {
      const importPath = resolve(dir, expandPathVariables(target, state.env));
      if (!existsSync(importPath)) {
        throw new ConfigLoadError(`Imported config not found: ${importPath}`, 'IMPORT_NOT_FOUND', {
          path: importPath,
          importedFrom: filePath,
        });
      }
      imported.push(loadTree(importPath, state));
    }

    delete own[IMPORTS_KEY];
    if (!state.sources.includes(filePath)) {
      state.sources.push(filePath);
    }
    return shallowMerge(...imported, own);
  } finally {
    state.stack.pop();
  }
}

function readImports(tree: ConfigTree, filePath: string): string[] {
  const imports = tree[IMPORTS_KEY];
  if (imports === undefined || imports === null) return [];
  if (typeof imports === 'string') return [imports];
  if (Array.isArray(imports)) {
    const paths = imports.filter((item): item is string => typeof item === 'string');
    if (paths.length === imports.length) return paths;
  }
  throw new ConfigLoadError(`"${IMPORTS_KEY}" must be a path or list of paths: ${filePath}`, 'CONFIG_INVALID', {
    path: filePath,
  });
}

/**
 * Read one YAML file into a mapping
 */
function readDocument(filePath: string): ConfigTree {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`Failed to read config file: ${errorMessage(err)}`, 'CONFIG_NOT_FOUND', {
      path: filePath,
      originalError: err,
    });
  }

  const doc = parseDocument(content);
  if (doc.errors.length > 0) {
    throw new ConfigLoadError(
      `Failed to parse config YAML ${filePath}: ${doc.errors[0].message}`,
      'CONFIG_PARSE_ERROR',
      { path: filePath, errors: doc.errors.map(e => e.message) }
    );
  }

  const value = toConfigValue(doc.toJS());
  if (value === null) return {};
  if (!isConfigTree(value)) {
    throw new ConfigLoadError(`Config must be a YAML mapping: ${filePath}`, 'CONFIG_INVALID', {
      path: filePath,
    });
  }
  return value;
}

/**
 * Narrow a parsed YAML value to the descriptor value types
 */
function toConfigValue(value: unknown): ConfigValue {
  if (value === null || value === undefined) return null;
  if (isScalar(value)) return value;
  if (Array.isArray(value)) return value.map(toConfigValue);
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') {
    const tree: ConfigTree = {};
    for (const [key, item] of Object.entries(value)) {
      tree[key] = toConfigValue(item);
    }
    return tree;
  }
  return String(value);
}

// =============================================================================
// Path Handling
// =============================================================================

/**
 * Expand and absolutize metadata path keys in place, including those inside
 * overlay bodies
 */
function absolutizePaths(tree: ConfigTree, dir: string, env: Environment): void {
  absolutizeMetadata(tree[METADATA_KEY], dir, env);

  for (const section of [AMENDMENTS_KEY, SUBPROJECTS_KEY]) {
    const overlays = tree[section];
    if (!isConfigTree(overlays)) continue;
    for (const body of Object.values(overlays)) {
      if (isConfigTree(body)) absolutizeMetadata(body[METADATA_KEY], dir, env);
    }
  }
}

function absolutizeMetadata(metadata: ConfigValue | undefined, dir: string, env: Environment): void {
  if (!isConfigTree(metadata)) return;

  for (const key of METADATA_PATH_KEYS) {
    const value = metadata[key];
    if (typeof value === 'string' && value.length > 0) {
      metadata[key] = absolutePath(value, dir, env);
    } else if (Array.isArray(value)) {
      metadata[key] = value.map(item =>
        typeof item === 'string' && item.length > 0 ? absolutePath(item, dir, env) : item
      );
    }
  }
}

function absolutePath(value: string, dir: string, env: Environment): string {
  const expanded = expandPathVariables(value, env);
  return isAbsolute(expanded) ? expanded : resolve(dir, expanded);
}
