/**
 * Unit Tests: Delimited Table Reader
 *
 * Covers delimiter inference, RFC 4180 quoting, empty cells and the
 * malformed-table errors.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { inferDelimiter, parseTable, readTable } from '../../src/tables/delimited.js';
import { ConfigLoadError } from '../../src/errors.js';
import { captureError, createFixture, type FixtureDir } from '../fixtures.js';

describe('inferDelimiter', () => {
  it('should use tabs for .tsv and .txt files', () => {
    expect(inferDelimiter('/data/samples.tsv')).toBe('\t');
    expect(inferDelimiter('/data/samples.TXT')).toBe('\t');
  });

  it('should use commas for .csv and anything else', () => {
    expect(inferDelimiter('/data/samples.csv')).toBe(',');
    expect(inferDelimiter('/data/samples.dat')).toBe(',');
    expect(inferDelimiter('/data/samples')).toBe(',');
  });
});

describe('parseTable', () => {
  it('should read the header and rows in file order', () => {
    const table = parseTable('sample_name,organism\npig_0h,pig\nfrog_0h,frog\n', ',');

    expect(table.columns).toEqual(['sample_name', 'organism']);
    expect(table.rows).toHaveLength(2);
    expect(table.rows[0].line).toBe(2);
    expect(Object.fromEntries(table.rows[0].values)).toEqual({ sample_name: 'pig_0h', organism: 'pig' });
    expect(table.rows[1].values.get('organism')).toBe('frog');
  });

  it('should leave empty cells out of the row', () => {
    const table = parseTable('a,b,c\n1,,3', ',');

    expect(table.rows[0].values.has('b')).toBe(false);
    expect([...table.rows[0].values.keys()]).toEqual(['a', 'c']);
  });

  it('should accept rows shorter than the header', () => {
    const table = parseTable('a,b\n1', ',');

    expect(Object.fromEntries(table.rows[0].values)).toEqual({ a: '1' });
  });

  it('should unquote fields with delimiters and escaped quotes', () => {
    const table = parseTable('name,desc\nx,"hello, ""world"""', ',');

    expect(table.rows[0].values.get('desc')).toBe('hello, "world"');
  });

  it('should keep newlines inside quoted fields and track line numbers', () => {
    const table = parseTable('a,b\n"line1\nline2",z\nq,r', ',');

    expect(table.rows).toHaveLength(2);
    expect(table.rows[0].values.get('a')).toBe('line1\nline2');
    expect(table.rows[0].line).toBe(2);
    expect(table.rows[1].line).toBe(4);
  });

  it('should handle CRLF line endings', () => {
    const table = parseTable('a,b\r\n1,2\r\n', ',');

    expect(table.rows).toHaveLength(1);
    expect(table.rows[0].values.get('b')).toBe('2');
  });

  it('should skip blank lines', () => {
    const table = parseTable('a\n1\n\n2\n', ',');

    expect(table.rows.map(row => row.values.get('a'))).toEqual(['1', '2']);
  });

  it('should strip a byte order mark', () => {
    const table = parseTable('\uFEFFsample_name\nx', ',');

    expect(table.columns).toEqual(['sample_name']);
  });

  it('should split on tabs when told to', () => {
    const table = parseTable('a\tb\n1,5\t2', '\t');

    expect(Object.fromEntries(table.rows[0].values)).toEqual({ a: '1,5', b: '2' });
  });

  it('should reject rows with more cells than the header', () => {
    const err = captureError(() => parseTable('a,b\n1,2,3', ',', 'samples.csv'));

    expect(err).toBeInstanceOf(ConfigLoadError);
    expect(err).toMatchObject({ code: 'TABLE_PARSE_ERROR', details: { path: 'samples.csv', line: 2 } });
  });

  it('should ignore empty trailing cells past the header', () => {
    const table = parseTable('sample_name,file\nfrog_1,a,\nfrog_2,b,,\n', ',');

    expect(table.rows.map(row => Object.fromEntries(row.values))).toEqual([
      { sample_name: 'frog_1', file: 'a' },
      { sample_name: 'frog_2', file: 'b' },
    ]);
  });

  it('should reject repeated column names', () => {
    expect(() => parseTable('a,a\n1,2', ',')).toThrow('repeats column "a"');
  });

  it('should reject an unterminated quoted field', () => {
    expect(() => parseTable('a\n"open', ',')).toThrow('Unterminated quoted field starting at line 2');
  });

  it('should reject an empty table', () => {
    expect(() => parseTable('', ',')).toThrow('Table has no header row');
  });
});

describe('readTable', () => {
  let fixture: FixtureDir;

  beforeEach(() => {
    fixture = createFixture({
      'samples.tsv': 'sample_name\tfile\nfrog_1\ta.fq\n',
      'samples.csv': 'sample_name,file\nfrog_1,a.fq\n',
    });
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it('should infer the delimiter from the extension', () => {
    const tsv = readTable(fixture.path('samples.tsv'));
    const csv = readTable(fixture.path('samples.csv'));

    expect(tsv.columns).toEqual(['sample_name', 'file']);
    expect(tsv.rows[0].values.get('file')).toBe('a.fq');
    expect(csv.rows[0].values.get('file')).toBe('a.fq');
    expect(csv.path).toBe(fixture.path('samples.csv'));
  });

  it('should fail with TABLE_NOT_FOUND for a missing file', () => {
    expect(captureError(() => readTable(fixture.path('missing.csv')))).toMatchObject({
      code: 'TABLE_NOT_FOUND',
    });
  });
});
