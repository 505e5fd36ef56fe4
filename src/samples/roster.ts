/**
 * Resolved sample roster and its query surface
 */

import type { Diagnostic } from '../diagnostics.js';
import { SampleNotFoundError, SampleSelectionError } from '../errors.js';
import type { Sample } from './sample.js';

/**
 * Filter for {@link Roster.select}; exactly one of include or exclude
 */
export interface SampleSelection {
  attribute: string;
  /** Keep samples whose value is listed */
  include?: readonly string[];
  /** Keep samples lacking the attribute or whose value is not listed */
  exclude?: readonly string[];
}

/**
 * Samples as rows of strings under a shared header
 */
export interface SampleTable {
  columns: string[];
  rows: string[][];
}

export class Roster implements Iterable<Sample> {
  private readonly samples: readonly Sample[];
  private readonly byName: ReadonlyMap<string, Sample>;

  constructor(
    samples: readonly Sample[],
    public readonly diagnostics: readonly Diagnostic[] = []
  ) {
    this.samples = [...samples];
    this.byName = new Map(samples.map(sample => [sample.name, sample]));
  }

  /**
   * @throws SampleNotFoundError if no sample has this name
   */
  get(name: string): Sample {
    const sample = this.byName.get(name);
    if (!sample) {
      throw new SampleNotFoundError(name);
    }
    return sample;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  [Symbol.iterator](): Iterator<Sample> {
    return this.samples[Symbol.iterator]();
  }

  /** Sample names in annotation order */
  get names(): string[] {
    return this.samples.map(sample => sample.name);
  }

  get size(): number {
    return this.samples.length;
  }

  /**
   * Subset of the roster by one attribute's value
   *
   * @throws SampleSelectionError unless exactly one of include/exclude is given
   */
  select(selection: SampleSelection): Roster {
    const { attribute, include, exclude } = selection;

    if (include && exclude) {
      throw new SampleSelectionError('Pass either include or exclude, not both', { attribute });
    }
    if (!include && !exclude) {
      throw new SampleSelectionError('Pass include or exclude values to select by', { attribute });
    }

    const selected = this.samples.filter(sample => {
      const value = sample.get(attribute);
      if (include) {
        return value !== undefined && include.includes(value);
      }
      return value === undefined || !(exclude ?? []).includes(value);
    });

    return new Roster(selected, this.diagnostics);
  }

  /**
   * Tabular view; columns in first-seen order, absent values empty
   */
  toTable(): SampleTable {
    const columns: string[] = [];
    const seen = new Set<string>();
    for (const sample of this.samples) {
      for (const attribute of sample.attributes()) {
        if (!seen.has(attribute)) {
          seen.add(attribute);
          columns.push(attribute);
        }
      }
    }

    const rows = this.samples.map(sample => columns.map(column => sample.get(column) ?? ''));
    return { columns, rows };
  }

  /**
   * Delimited text of {@link toTable}, header first
   */
  toDelimited(delimiter = ','): string {
    const { columns, rows } = this.toTable();
    return [columns, ...rows]
      .map(cells => cells.map(cell => quoteCell(cell, delimiter)).join(delimiter))
      .join('\n');
  }
}

function quoteCell(cell: string, delimiter: string): string {
  if (cell.includes(delimiter) || cell.includes('"') || cell.includes('\n') || cell.includes('\r')) {
    return `"${cell.replace(/"/g, '""')}"`;
  }
  return cell;
}
