/**
 * Unit Tests: Project Resolution
 *
 * Builds fixture projects on disk and resolves them end to end: tables,
 * subsample merging, modifiers, amendments and the fatal error cases.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { loadProject } from '../../src/project.js';
import { loadConfig } from '../../src/config/loader.js';
import { buildRoster } from '../../src/samples/build.js';
import { DuplicateSampleNameError, UnknownAmendmentError } from '../../src/errors.js';
import { captureError, createFixture, SAMPLE_TABLE, type FixtureDir } from '../fixtures.js';

const CONFIG = `
name: demo
description: Demo project
metadata:
  sample_annotation: samples.csv
  output_dir: out
data_sources:
  source1: /x/{organism}_{time}h.fastq
sample_modifiers:
  append:
    read_type: SINGLE
  derive:
    - file
  imply:
    - if:
        organism: pig
      then:
        genome: susScr11
amendments:
  frogs_only:
    metadata:
      sample_annotation: frogs.csv
`;

describe('loadProject', () => {
  let fixture: FixtureDir;

  beforeEach(() => {
    fixture = createFixture({
      'config.yaml': CONFIG,
      'samples.csv': SAMPLE_TABLE,
      'frogs.csv': 'sample_name,organism,time,file\nfrog_a,frog,2,source1\n',
    });
  });

  afterEach(() => {
    fixture.cleanup();
  });

  it('should resolve samples in annotation order', () => {
    const project = loadProject(fixture.path('config.yaml'));

    expect(project.name).toBe('demo');
    expect(project.description).toBe('Demo project');
    expect(project.samples.names).toEqual(['pig_0h', 'pig_1h', 'frog_0h', 'frog_1h']);
  });

  it('should run the modifier stages', () => {
    const project = loadProject(fixture.path('config.yaml'));
    const pig = project.getSample('pig_1h');
    const frog = project.getSample('frog_0h');

    expect(pig.get('file')).toBe('/x/pig_1h.fastq');
    expect(pig.derivedFrom('file')).toEqual(['source1']);
    expect(pig.get('read_type')).toBe('SINGLE');
    expect(pig.get('genome')).toBe('susScr11');
    expect(frog.has('genome')).toBe(false);
    expect(project.samples.diagnostics).toEqual([]);
  });

  it('should resolve identically twice', () => {
    const first = loadProject(fixture.path('config.yaml'));
    const second = loadProject(fixture.path('config.yaml'));

    expect(second.samples.toTable()).toEqual(first.samples.toTable());
  });

  it('should start with an amendment when asked', () => {
    const project = loadProject(fixture.path('config.yaml'), { amendment: 'frogs_only' });

    expect(project.activeAmendment).toBe('frogs_only');
    expect(project.samples.names).toEqual(['frog_a']);
    expect(project.getSample('frog_a').get('file')).toBe('/x/frog_2h.fastq');
  });

  it('should activate and deactivate without touching the original', () => {
    const project = loadProject(fixture.path('config.yaml'));

    const frogs = project.activate('frogs_only');
    const back = frogs.deactivate();

    expect(project.activeAmendment).toBeNull();
    expect(project.samples.size).toBe(4);
    expect(frogs.samples.names).toEqual(['frog_a']);
    expect(frogs.listAmendments()).toEqual(['frogs_only']);
    expect(back.activeAmendment).toBeNull();
    expect(back.samples.toTable()).toEqual(project.samples.toTable());
  });

  it('should keep the current project when activation fails', () => {
    const project = loadProject(fixture.path('config.yaml'));

    expect(() => project.activate('missing')).toThrow(UnknownAmendmentError);
    expect(project.samples.size).toBe(4);
  });
});

describe('buildRoster', () => {
  let fixture: FixtureDir;

  beforeEach(() => {
    fixture = createFixture();
  });

  afterEach(() => {
    fixture.cleanup();
  });

  function build(config: string, files: Record<string, string>) {
    for (const [name, content] of Object.entries(files)) {
      fixture.write(name, content);
    }
    return buildRoster(loadConfig(fixture.write('config.yaml', config)), { env: {} });
  }

  it('should merge subsample rows into multi-values', () => {
    const roster = build(
      'metadata:\n  sample_annotation: samples.csv\n  sample_subannotation: subsamples.csv\n',
      {
        'samples.csv': 'sample_name,organism,file\nfrog_1,frog,placeholder\nfrog_2,frog,single.fq\n',
        'subsamples.csv': 'sample_name,subsample_name,file\nfrog_1,s1,a\nfrog_1,s2,b\nfrog_1,s3,c\n',
      }
    );

    expect(roster.get('frog_1').get('file')).toBe('a b c');
    expect(roster.get('frog_1').subsamples.map(row => row.name)).toEqual(['s1', 's2', 's3']);
    expect(roster.get('frog_2').get('file')).toBe('single.fq');
  });

  it('should apply several subsample tables in order', () => {
    const roster = build(
      'metadata:\n  sample_annotation: samples.csv\n  sample_subannotation: [first.csv, second.csv]\n',
      {
        'samples.csv': 'sample_name\nfrog_1\n',
        'first.csv': 'sample_name,file,lane\nfrog_1,a,1\nfrog_1,b,2\n',
        'second.csv': 'sample_name,file\nfrog_1,z\n',
      }
    );

    const frog = roster.get('frog_1');
    expect(frog.get('file')).toBe('z');
    expect(frog.get('lane')).toBe('1 2');
    expect(frog.subsamples.map(row => row.name)).toEqual(['0', '1', '2']);
  });

  it('should derive merged values per subsample row', () => {
    const roster = build(
      [
        'metadata:',
        '  sample_annotation: samples.csv',
        '  sample_subannotation: subsamples.csv',
        'data_sources:',
        '  reads: /data/{sample_name}/{run}.fq',
        'sample_modifiers:',
        '  derive: [file]',
      ].join('\n'),
      {
        'samples.csv': 'sample_name,file\nfrog_1,reads\n',
        'subsamples.csv': 'sample_name,file,run\nfrog_1,reads,r1\nfrog_1,reads,r2\n',
      }
    );

    expect(roster.get('frog_1').getValues('file')).toEqual(['/data/frog_1/r1.fq', '/data/frog_1/r2.fq']);
  });

  it('should record orphan subsample rows and unknown modifiers', () => {
    const roster = build(
      'metadata:\n  sample_annotation: samples.csv\n  sample_subannotation: sub.csv\nsample_modifiers:\n  rename:\n    a: b\n',
      {
        'samples.csv': 'sample_name\nfrog_1\n',
        'sub.csv': 'sample_name,file\nghost,a\n',
      }
    );

    expect(roster.diagnostics.map(d => d.code)).toEqual(['UNKNOWN_MODIFIER', 'ORPHAN_SUBSAMPLE']);
  });

  it('should expand project variables from the config', () => {
    const roster = build(
      [
        'root: /proj',
        'metadata:',
        '  sample_annotation: samples.csv',
        'sample_modifiers:',
        '  append:',
        '    file: src',
        '  derive:',
        '    attributes: [file]',
        '    sources:',
        '      src: "{root}/{sample_name}.bam"',
      ].join('\n'),
      { 'samples.csv': 'sample_name\ns1\n' }
    );

    expect(roster.get('s1').get('file')).toBe('/proj/s1.bam');
  });

  it('should reject duplicate sample names', () => {
    const err = captureError(() =>
      build('metadata:\n  sample_annotation: samples.csv\n', {
        'samples.csv': 'sample_name,x\ndup,1\nother,2\ndup,3\n',
      })
    );

    expect(err).toBeInstanceOf(DuplicateSampleNameError);
    expect(err).toMatchObject({ duplicates: ['dup'], message: 'Duplicate sample name: dup' });
  });

  it('should reject imply rules that collide sample names', () => {
    const err = captureError(() =>
      build(
        [
          'metadata:',
          '  sample_annotation: samples.csv',
          'sample_modifiers:',
          '  imply:',
          '    - if: {sample_name: b}',
          '      then: {sample_name: a}',
        ].join('\n'),
        { 'samples.csv': 'sample_name\na\nb\n' }
      )
    );

    expect(err).toBeInstanceOf(DuplicateSampleNameError);
  });

  it('should require a sample_name column', () => {
    const err = captureError(() =>
      build('metadata:\n  sample_annotation: samples.csv\n', { 'samples.csv': 'name\nx\n' })
    );

    expect(err).toMatchObject({ code: 'MISSING_SAMPLE_NAME' });
  });

  it('should require a sample_name value on every row', () => {
    const err = captureError(() =>
      build('metadata:\n  sample_annotation: samples.csv\n', { 'samples.csv': 'sample_name,x\na,1\n,2\n' })
    );

    expect(err).toMatchObject({ code: 'MISSING_SAMPLE_NAME', details: { line: 3 } });
  });

  it('should reject configs whose modifier settings are malformed', () => {
    const tree = {
      metadata: { sample_annotation: fixture.write('samples.csv', 'sample_name\ns1\n') },
      sample_modifiers: { append: 'SINGLE' },
    };

    const err = captureError(() =>
      buildRoster({ filePath: fixture.path('config.yaml'), sources: [], base: tree, tree, activeAmendment: null }, { env: {} })
    );

    expect(err).toMatchObject({
      code: 'CONFIG_INVALID',
      details: { issues: [expect.objectContaining({ code: 'INVALID_FIELD_TYPE', path: 'sample_modifiers.append' })] },
    });
  });

  it('should fail with TABLE_NOT_FOUND when the annotation is missing', () => {
    const err = captureError(() => build('metadata:\n  sample_annotation: samples.csv\n', {}));

    expect(err).toMatchObject({ code: 'TABLE_NOT_FOUND' });
  });
});
