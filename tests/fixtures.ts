/**
 * Fixture projects written to temporary directories
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { tmpdir } from 'node:os';

export interface FixtureDir {
  root: string;
  /** Absolute path of a file inside the fixture */
  path: (...segments: string[]) => string;
  /** Write (or overwrite) a file inside the fixture */
  write: (relativePath: string, content: string) => string;
  cleanup: () => void;
}

/**
 * Create a temporary directory populated with the given files
 */
export function createFixture(files: Record<string, string> = {}): FixtureDir {
  const root = mkdtempSync(join(tmpdir(), 'pep-resolve-test-'));

  const write = (relativePath: string, content: string): string => {
    const target = join(root, relativePath);
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, content);
    return target;
  };

  for (const [relativePath, content] of Object.entries(files)) {
    write(relativePath, content);
  }

  return {
    root,
    path: (...segments) => join(root, ...segments),
    write,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

/** Annotation table shared by most project fixtures */
export const SAMPLE_TABLE = [
  'sample_name,protocol,organism,time,file',
  'pig_0h,RRBS,pig,0,source1',
  'pig_1h,RRBS,pig,1,source1',
  'frog_0h,RNA-seq,frog,0,source1',
  'frog_1h,RNA-seq,frog,1,source1',
].join('\n');

/**
 * Run a function that is expected to throw and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
