/**
 * Sample record
 *
 * An ordered attribute map. Multi-valued attributes are kept as ordered
 * lists internally and joined with single spaces only when read as a string.
 */

import { stringify as stringifyYaml } from 'yaml';
import { SAMPLE_NAME_ATTR } from '../config/types.js';

/**
 * Stored attribute value: a scalar or an ordered multi-value
 */
export type AttributeValue = string | readonly string[];

/**
 * One subsample row kept on its sample
 */
export interface Subsample {
  /** `subsample_name`, or the row's 0-based position within the sample */
  readonly name: string;
  /** Non-empty cells of the row */
  readonly values: Readonly<Record<string, string>>;
}

export class Sample {
  private readonly values = new Map<string, string | string[]>();
  /** Attribute → subsample row index per value, for merged attributes */
  private readonly mergedRows = new Map<string, number[]>();
  /** Attribute → data source keys it was derived from */
  private readonly derivations = new Map<string, string[]>();
  private readonly rows: Subsample[] = [];

  constructor(initial: Iterable<readonly [string, AttributeValue]> = []) {
    for (const [attribute, value] of initial) {
      this.set(attribute, value);
    }
  }

  /** Value of `sample_name` */
  get name(): string {
    return this.get(SAMPLE_NAME_ATTR) ?? '';
  }

  // ===========================================================================
  // Attribute Access
  // ===========================================================================

  /**
   * Attribute value as a string; multi-values are space-joined
   */
  get(attribute: string): string | undefined {
    const value = this.values.get(attribute);
    if (value === undefined) return undefined;
    return typeof value === 'string' ? value : value.join(' ');
  }

  /**
   * Attribute value as an ordered list (empty when absent)
   */
  getValues(attribute: string): string[] {
    const value = this.values.get(attribute);
    if (value === undefined) return [];
    return typeof value === 'string' ? [value] : [...value];
  }

  /**
   * Whether the attribute holds a multi-value list
   */
  isMultiValued(attribute: string): boolean {
    return Array.isArray(this.values.get(attribute));
  }

  has(attribute: string): boolean {
    return this.values.has(attribute);
  }

  /**
   * Replace an attribute's value; its merge and derivation records are dropped
   */
  set(attribute: string, value: AttributeValue): void {
    this.forget(attribute);
    this.values.set(attribute, typeof value === 'string' ? value : [...value]);
  }

  /**
   * Remove an attribute along with its merge and derivation records
   */
  delete(attribute: string): boolean {
    this.forget(attribute);
    return this.values.delete(attribute);
  }

  private forget(attribute: string): void {
    this.mergedRows.delete(attribute);
    this.derivations.delete(attribute);
  }

  /** Attribute names in insertion order */
  attributes(): string[] {
    return [...this.values.keys()];
  }

  /**
   * Attribute map with multi-values space-joined
   */
  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const attribute of this.values.keys()) {
      record[attribute] = this.get(attribute) ?? '';
    }
    return record;
  }

  /**
   * YAML document of the sample; multi-values become sequences
   */
  toYaml(): string {
    const doc: Record<string, string | string[]> = {};
    for (const [attribute, value] of this.values) {
      doc[attribute] = typeof value === 'string' ? value : [...value];
    }
    return stringifyYaml(doc);
  }

  // ===========================================================================
  // Subsamples
  // ===========================================================================

  get subsamples(): readonly Subsample[] {
    return this.rows;
  }

  getSubsample(name: string): Subsample | undefined {
    return this.rows.find(row => row.name === name);
  }

  /**
   * Keep a subsample row on the sample
   *
   * @returns Index of the row in `subsamples`
   */
  addSubsample(values: Readonly<Record<string, string>>, name?: string): number {
    const index = this.rows.length;
    this.rows.push({ name: name ?? String(index), values: { ...values } });
    return index;
  }

  /**
   * Whether the attribute's value came from subsample rows
   */
  isMerged(attribute: string): boolean {
    return this.mergedRows.has(attribute);
  }

  /**
   * Subsample row index behind each value of a merged attribute
   */
  mergedRowsOf(attribute: string): readonly number[] {
    return this.mergedRows.get(attribute) ?? [];
  }

  markMerged(attribute: string, rowIndexes: readonly number[]): void {
    this.mergedRows.set(attribute, [...rowIndexes]);
  }

  // ===========================================================================
  // Derivation
  // ===========================================================================

  /**
   * Data source keys the attribute was derived from
   */
  derivedFrom(attribute: string): readonly string[] | undefined {
    return this.derivations.get(attribute);
  }

  recordDerivation(attribute: string, sourceKeys: readonly string[]): void {
    this.derivations.set(attribute, [...sourceKeys]);
  }
}
