/**
 * Subsample merging
 *
 * A subannotation table holds several rows per sample. Each column's
 * non-empty values are collected in row order into a multi-value that
 * replaces the sample's own value for that column.
 */

import type { Table, TableRow } from '../tables/delimited.js';
import type { Diagnostics } from '../diagnostics.js';
import type { Sample } from './sample.js';
import { ConfigLoadError } from '../errors.js';
import { SAMPLE_NAME_ATTR, SUBSAMPLE_NAME_ATTR } from '../config/types.js';

/**
 * Fold one sample's subsample rows into its attributes
 *
 * Mutates and returns `sample`. Rows are also kept on `sample.subsamples`.
 */
export function mergeSubsamples(sample: Sample, rows: readonly TableRow[]): Sample {
  const collected = new Map<string, { values: string[]; rows: number[] }>();

  for (const row of rows) {
    const record = Object.fromEntries(row.values);
    const index = sample.addSubsample(record, row.values.get(SUBSAMPLE_NAME_ATTR));

    for (const [column, value] of row.values) {
      if (column === SAMPLE_NAME_ATTR) continue;
      let entry = collected.get(column);
      if (!entry) {
        entry = { values: [], rows: [] };
        collected.set(column, entry);
      }
      entry.values.push(value);
      entry.rows.push(index);
    }
  }

  for (const [column, entry] of collected) {
    sample.set(column, entry.values);
    sample.markMerged(column, entry.rows);
  }

  return sample;
}

/**
 * Group table rows by `sample_name`, keeping file order within each group
 *
 * @throws ConfigLoadError if the table has no `sample_name` column
 */
export function groupBySample(table: Table): Map<string, TableRow[]> {
  if (!table.columns.includes(SAMPLE_NAME_ATTR)) {
    throw new ConfigLoadError(
      `Subsample table has no "${SAMPLE_NAME_ATTR}" column: ${table.path}`,
      'MISSING_SAMPLE_NAME',
      { path: table.path, columns: table.columns }
    );
  }

  const groups = new Map<string, TableRow[]>();
  for (const row of table.rows) {
    const name = row.values.get(SAMPLE_NAME_ATTR);
    if (name === undefined) {
      throw new ConfigLoadError(
        `Subsample row at line ${row.line} has no ${SAMPLE_NAME_ATTR}: ${table.path}`,
        'MISSING_SAMPLE_NAME',
        { path: table.path, line: row.line }
      );
    }
    const group = groups.get(name);
    if (group) {
      group.push(row);
    } else {
      groups.set(name, [row]);
    }
  }
  return groups;
}

/**
 * Merge a whole subannotation table into a set of samples
 *
 * Rows naming no known sample are reported as ORPHAN_SUBSAMPLE.
 */
export function applySubannotation(
  samples: ReadonlyMap<string, Sample>,
  table: Table,
  diagnostics: Diagnostics
): void {
  for (const [name, rows] of groupBySample(table)) {
    const sample = samples.get(name);
    if (!sample) {
      diagnostics.warn(
        'ORPHAN_SUBSAMPLE',
        `${rows.length} subsample row(s) reference unknown sample "${name}"`,
        { sample: name, context: { path: table.path, lines: rows.map(row => row.line) } }
      );
      continue;
    }
    mergeSubsamples(sample, rows);
  }
}
