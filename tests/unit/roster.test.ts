/**
 * Unit Tests: Sample Roster and Sample Records
 */

import { describe, it, expect } from 'vitest';
import { parse as parseYaml } from 'yaml';
import { Roster } from '../../src/samples/roster.js';
import { Sample } from '../../src/samples/sample.js';
import { SampleNotFoundError, SampleSelectionError } from '../../src/errors.js';
import { captureError } from '../fixtures.js';

function sample(values: Record<string, string | string[]>): Sample {
  return new Sample(Object.entries(values));
}

function createRoster(): Roster {
  return new Roster([
    sample({ sample_name: 'pig_0h', organism: 'pig', protocol: 'RRBS' }),
    sample({ sample_name: 'frog_0h', organism: 'frog', protocol: 'RNA-seq' }),
    sample({ sample_name: 'cow_0h', protocol: 'RRBS' }),
  ]);
}

describe('Roster', () => {
  it('should look samples up by name', () => {
    const roster = createRoster();

    expect(roster.get('frog_0h').get('organism')).toBe('frog');
    expect(roster.has('frog_0h')).toBe(true);
    expect(roster.has('horse')).toBe(false);
  });

  it('should throw SampleNotFoundError for unknown names', () => {
    const err = captureError(() => createRoster().get('horse'));

    expect(err).toBeInstanceOf(SampleNotFoundError);
    expect(err).toMatchObject({ code: 'SAMPLE_NOT_FOUND', message: 'Sample not found: horse' });
  });

  it('should iterate in annotation order, repeatably', () => {
    const roster = createRoster();

    const first = [...roster].map(s => s.name);
    const second = [...roster].map(s => s.name);

    expect(first).toEqual(['pig_0h', 'frog_0h', 'cow_0h']);
    expect(second).toEqual(first);
    expect(roster.names).toEqual(first);
    expect(roster.size).toBe(3);
  });

  it('should select by included values', () => {
    const selected = createRoster().select({ attribute: 'protocol', include: ['RRBS'] });

    expect(selected.names).toEqual(['pig_0h', 'cow_0h']);
  });

  it('should keep samples lacking the attribute when excluding', () => {
    const selected = createRoster().select({ attribute: 'organism', exclude: ['frog'] });

    expect(selected.names).toEqual(['pig_0h', 'cow_0h']);
  });

  it('should reject include and exclude together, or neither', () => {
    const roster = createRoster();

    expect(() => roster.select({ attribute: 'organism', include: ['pig'], exclude: ['frog'] })).toThrow(
      SampleSelectionError
    );
    expect(() => roster.select({ attribute: 'organism' })).toThrow(SampleSelectionError);
  });

  it('should tabulate with columns in first-seen order', () => {
    const roster = new Roster([
      sample({ sample_name: 'a', x: '1' }),
      sample({ sample_name: 'b', y: '2', file: ['f1', 'f2'] }),
    ]);

    expect(roster.toTable()).toEqual({
      columns: ['sample_name', 'x', 'y', 'file'],
      rows: [
        ['a', '1', '', ''],
        ['b', '', '2', 'f1 f2'],
      ],
    });
  });

  it('should quote delimited cells that need it', () => {
    const roster = new Roster([sample({ sample_name: 'a', note: 'x,y', quote: 'say "hi"' })]);

    expect(roster.toDelimited()).toBe('sample_name,note,quote\na,"x,y","say ""hi"""');
    expect(roster.toDelimited('\t')).toBe('sample_name\tnote\tquote\na\tx,y\t"say ""hi"""');
  });

  it('should carry diagnostics into selections', () => {
    const diagnostics = [{ code: 'ORPHAN_SUBSAMPLE' as const, severity: 'warning' as const, message: 'm' }];
    const roster = new Roster([sample({ sample_name: 'a', k: 'v' })], diagnostics);

    expect(roster.select({ attribute: 'k', include: ['v'] }).diagnostics).toEqual(diagnostics);
  });
});

describe('Sample', () => {
  it('should join multi-values only when read as a string', () => {
    const s = sample({ sample_name: 'frog_1', file: ['a', 'b', 'c'] });

    expect(s.get('file')).toBe('a b c');
    expect(s.getValues('file')).toEqual(['a', 'b', 'c']);
    expect(s.toRecord()).toEqual({ sample_name: 'frog_1', file: 'a b c' });
  });

  it('should serialize to YAML with lists for multi-values', () => {
    const s = sample({ sample_name: 'frog_1', file: ['a', 'b'] });

    expect(parseYaml(s.toYaml())).toEqual({ sample_name: 'frog_1', file: ['a', 'b'] });
  });

  it('should forget merge and derivation records on delete', () => {
    const s = sample({ sample_name: 's', file: 'x' });
    s.markMerged('file', [0]);
    s.recordDerivation('file', ['src']);

    expect(s.delete('file')).toBe(true);
    expect(s.isMerged('file')).toBe(false);
    expect(s.derivedFrom('file')).toBeUndefined();
    expect(s.delete('file')).toBe(false);
  });

  it('should forget merge and derivation records when a value is replaced', () => {
    const s = sample({ sample_name: 's', file: ['a', 'b'] });
    s.markMerged('file', [0, 1]);
    s.recordDerivation('file', ['src']);

    s.set('file', 'c');

    expect(s.isMerged('file')).toBe(false);
    expect(s.derivedFrom('file')).toBeUndefined();
  });

  it('should not share value arrays with callers', () => {
    const files = ['a'];
    const s = sample({ sample_name: 's' });
    s.set('file', files);
    files.push('b');
    s.getValues('file').push('c');

    expect(s.getValues('file')).toEqual(['a']);
  });
});
