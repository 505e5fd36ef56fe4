/**
 * Template variable substitution
 *
 * `{name}` placeholders resolve against an ordered list of scopes; the first
 * scope holding a string value for the name wins. `{{` and `}}` yield
 * literal braces.
 */

import { homedir } from 'node:os';
import { UnresolvedVariableError } from '../errors.js';
import { type ConfigTree, METADATA_KEY, isConfigTree, isScalar } from '../config/types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Name → value lookup table for one tier of the substitution namespace
 */
export type VariableScope = Readonly<Record<string, string | undefined>>;

/**
 * Environment variables, injectable for tests
 */
export type Environment = VariableScope;

type TemplatePart =
  | { kind: 'text'; text: string }
  | { kind: 'variable'; name: string };

// =============================================================================
// Scopes
// =============================================================================

/**
 * Project tier: top-level scalars, then scalars under `metadata`
 */
export function projectScope(tree: Readonly<ConfigTree>): VariableScope {
  const scope: Record<string, string> = {};

  const metadata = tree[METADATA_KEY];
  if (isConfigTree(metadata)) {
    for (const [key, value] of Object.entries(metadata)) {
      if (isScalar(value)) scope[key] = String(value);
    }
  }

  for (const [key, value] of Object.entries(tree)) {
    if (isScalar(value)) scope[key] = String(value);
  }

  return scope;
}

function lookup(scopes: readonly VariableScope[], name: string): string | undefined {
  for (const scope of scopes) {
    if (Object.hasOwn(scope, name)) {
      const value = scope[name];
      if (typeof value === 'string') return value;
    }
  }
  return undefined;
}

// =============================================================================
// Expansion
// =============================================================================

/**
 * Split a template into literal text and `{name}` placeholders
 *
 * An opening brace with no closing brace is kept as text.
 */
function parseTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let text = '';
  let i = 0;

  while (i < template.length) {
    const ch = template[i];
    const next = template[i + 1];

    if ((ch === '{' && next === '{') || (ch === '}' && next === '}')) {
      text += ch;
      i += 2;
      continue;
    }

    if (ch === '{') {
      const close = template.indexOf('}', i + 1);
      const inner = close === -1 ? '' : template.slice(i + 1, close);
      if (inner.length > 0 && !inner.includes('{')) {
        if (text) parts.push({ kind: 'text', text });
        text = '';
        parts.push({ kind: 'variable', name: inner });
        i = close + 1;
        continue;
      }
    }

    text += ch;
    i++;
  }

  if (text) parts.push({ kind: 'text', text });
  return parts;
}

/**
 * Names of the placeholders in a template, in order of first appearance
 */
export function templateVariables(template: string): string[] {
  const names = parseTemplate(template)
    .filter((part): part is { kind: 'variable'; name: string } => part.kind === 'variable')
    .map(part => part.name);
  return [...new Set(names)];
}

/**
 * Expand every placeholder in a template
 *
 * @param scopes - Lookup tiers, highest priority first
 * @throws UnresolvedVariableError listing every name no scope provides
 */
export function expandTemplate(template: string, scopes: readonly VariableScope[]): string {
  const missing: string[] = [];
  let result = '';

  for (const part of parseTemplate(template)) {
    if (part.kind === 'text') {
      result += part.text;
      continue;
    }
    const value = lookup(scopes, part.name);
    if (value === undefined) {
      if (!missing.includes(part.name)) missing.push(part.name);
      continue;
    }
    result += value;
  }

  if (missing.length > 0) {
    throw new UnresolvedVariableError(template, missing);
  }
  return result;
}

// =============================================================================
// Path Variables
// =============================================================================

const ENV_VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

/**
 * Expand a leading `~` and `$VAR` / `${VAR}` references in a path
 *
 * Unset variables are left as written.
 */
export function expandPathVariables(value: string, env: Environment): string {
  let expanded = value;

  if (expanded === '~' || expanded.startsWith('~/')) {
    const home = env.HOME ?? homedir();
    expanded = home + expanded.slice(1);
  }

  return expanded.replace(ENV_VAR_PATTERN, (match: string, braced?: string, bare?: string) => {
    const name = braced ?? bare;
    if (name === undefined) return match;
    const replacement = env[name];
    return replacement === undefined ? match : replacement;
  });
}
