/**
 * Unit Tests: Wildcard Expansion
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { expandWildcard, hasWildcard } from '../../src/substitution/wildcard.js';
import { createFixture, type FixtureDir } from '../fixtures.js';

describe('hasWildcard', () => {
  it('should detect star, question mark and character classes', () => {
    expect(hasWildcard('/x/*.fq')).toBe(true);
    expect(hasWildcard('/x/?.fq')).toBe(true);
    expect(hasWildcard('/x/[ab].fq')).toBe(true);
    expect(hasWildcard('/x/a.fq')).toBe(false);
  });
});

describe('expandWildcard', () => {
  let fixture: FixtureDir;

  beforeEach(() => {
    fixture = createFixture({
      'b.fastq': '',
      'a.fastq': '',
      'c.txt': '',
      'fileatxt': '',
      '.hidden.fastq': '',
      'sub/x.fastq': '',
    });
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it('should return sorted matches', () => {
    expect(expandWildcard(fixture.path('*.fastq'))).toEqual([fixture.path('a.fastq'), fixture.path('b.fastq')]);
  });

  it('should return nothing when no file matches', () => {
    expect(expandWildcard(fixture.path('*.bam'))).toEqual([]);
  });

  it('should match single characters and classes', () => {
    expect(expandWildcard(fixture.path('?.txt'))).toEqual([fixture.path('c.txt')]);
    expect(expandWildcard(fixture.path('[ab].fastq'))).toEqual([fixture.path('a.fastq'), fixture.path('b.fastq')]);
    expect(expandWildcard(fixture.path('[!a].fastq'))).toEqual([fixture.path('b.fastq')]);
  });

  it('should treat dots in patterns literally', () => {
    expect(expandWildcard(fixture.path('file.*'))).toEqual([]);
    expect(expandWildcard(fixture.path('c.t?t'))).toEqual([fixture.path('c.txt')]);
  });

  it('should match hidden files only with a leading dot in the pattern', () => {
    expect(expandWildcard(fixture.path('.*.fastq'))).toEqual([fixture.path('.hidden.fastq')]);
  });

  it('should expand wildcards in directory segments', () => {
    expect(expandWildcard(fixture.path('s*', 'x.fastq'))).toEqual([fixture.path('sub', 'x.fastq')]);
  });

  it('should pass through an existing path without wildcards', () => {
    expect(expandWildcard(fixture.path('c.txt'))).toEqual([fixture.path('c.txt')]);
    expect(expandWildcard(fixture.path('nope.txt'))).toEqual([]);
  });
});
