/**
 * Filesystem wildcard expansion for resolved paths
 *
 * Directories are walked one path segment at a time; each wildcard segment
 * is matched with picomatch (`*`, `?`, `[...]`, `[!...]`). Hidden entries
 * only match a segment pattern that itself starts with a dot.
 */

import { existsSync, readdirSync, statSync } from 'node:fs';
import picomatch from 'picomatch';

const WILDCARD_CHARS = /[*?[]/;

/**
 * Check whether a path contains wildcard characters
 */
export function hasWildcard(path: string): boolean {
  return WILDCARD_CHARS.test(path);
}

/**
 * Expand a wildcard path against the filesystem
 *
 * @returns Matching paths, lexically sorted; empty when nothing matches
 */
export function expandWildcard(pattern: string): string[] {
  if (!hasWildcard(pattern)) {
    return existsSync(pattern) ? [pattern] : [];
  }

  const absolute = pattern.startsWith('/');
  const segments = pattern.split('/').filter(segment => segment.length > 0);
  let candidates = [absolute ? '/' : ''];

  segments.forEach((segment, index) => {
    const last = index === segments.length - 1;
    const next: string[] = [];

    for (const prefix of candidates) {
      if (!hasWildcard(segment)) {
        const path = joinSegment(prefix, segment);
        if (last ? existsSync(path) : isDirectory(path)) next.push(path);
        continue;
      }

      const isMatch = picomatch(segment, { dot: segment.startsWith('.') });
      for (const entry of listDirectory(prefix === '' ? '.' : prefix)) {
        if (entry.startsWith('.') && !segment.startsWith('.')) continue;
        if (!isMatch(entry)) continue;
        const path = joinSegment(prefix, entry);
        if (last || isDirectory(path)) next.push(path);
      }
    }

    candidates = next;
  });

  return candidates.filter(candidate => candidate !== '' && candidate !== '/').sort();
}

// =============================================================================
// Helpers
// =============================================================================

function joinSegment(prefix: string, segment: string): string {
  if (prefix === '') return segment;
  return prefix.endsWith('/') ? prefix + segment : `${prefix}/${segment}`;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function listDirectory(path: string): string[] {
  try {
    return readdirSync(path);
  } catch {
    return [];
  }
}
