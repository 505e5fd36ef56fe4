/**
 * Delimited table reading for sample annotation and subannotation files
 *
 * The delimiter is inferred from the file extension (`.tsv`/`.txt` tab,
 * anything else comma). Fields follow RFC 4180 quoting: a field wrapped in
 * double quotes may contain delimiters, newlines and `""` escapes.
 */

import { existsSync, readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { ConfigLoadError, errorMessage } from '../errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * One data row; empty cells are absent from `values`
 */
export interface TableRow {
  /** 1-based line number of the row in the source file */
  line: number;
  values: Map<string, string>;
}

/**
 * A parsed table
 */
export interface Table {
  /** Source file path */
  path: string;
  /** Header cells in file order */
  columns: string[];
  /** Data rows in file order */
  rows: TableRow[];
}

const TAB_EXTENSIONS = new Set(['.tsv', '.txt']);

// =============================================================================
// Reading
// =============================================================================

/**
 * Infer the delimiter of a table file from its extension
 */
export function inferDelimiter(filePath: string): string {
  return TAB_EXTENSIONS.has(extname(filePath).toLowerCase()) ? '\t' : ',';
}

/**
 * Read and parse a delimited table file
 *
 * @throws ConfigLoadError if the file is missing, has no header, repeats a
 * column name, or a row has more cells than the header
 */
export function readTable(filePath: string): Table {
  if (!existsSync(filePath)) {
    throw new ConfigLoadError(`Table file not found: ${filePath}`, 'TABLE_NOT_FOUND', {
      path: filePath,
    });
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`Failed to read table file: ${errorMessage(err)}`, 'TABLE_NOT_FOUND', {
      path: filePath,
      originalError: err,
    });
  }

  return parseTable(content, inferDelimiter(filePath), filePath);
}

/**
 * Parse delimited text into a table
 */
export function parseTable(content: string, delimiter: string, source = '<inline>'): Table {
  const records = splitRecords(stripBom(content), delimiter, source);
  const header = records.shift();

  if (!header || header.cells.every(cell => cell.trim() === '')) {
    throw new ConfigLoadError(`Table has no header row: ${source}`, 'TABLE_PARSE_ERROR', {
      path: source,
    });
  }

  const columns = header.cells.map(cell => cell.trim());
  const seen = new Set<string>();
  for (const column of columns) {
    if (column === '') {
      throw new ConfigLoadError(`Table header has an empty column name: ${source}`, 'TABLE_PARSE_ERROR', {
        path: source,
        line: header.line,
      });
    }
    if (seen.has(column)) {
      throw new ConfigLoadError(`Table header repeats column "${column}": ${source}`, 'TABLE_PARSE_ERROR', {
        path: source,
        column,
      });
    }
    seen.add(column);
  }

  const rows: TableRow[] = [];
  for (const record of records) {
    if (record.cells.every(cell => cell === '')) {
      continue;
    }
    if (record.cells.slice(columns.length).some(cell => cell !== '')) {
      throw new ConfigLoadError(
        `Row at line ${record.line} has ${record.cells.length} cells but the header has ${columns.length}: ${source}`,
        'TABLE_PARSE_ERROR',
        { path: source, line: record.line }
      );
    }
    const values = new Map<string, string>();
    record.cells.forEach((cell, index) => {
      if (cell !== '') {
        values.set(columns[index], cell);
      }
    });
    rows.push({ line: record.line, values });
  }

  return { path: source, columns, rows };
}

// =============================================================================
// Tokenizing
// =============================================================================

interface RawRecord {
  line: number;
  cells: string[];
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Split text into records of cells, honoring quoted fields
 */
function splitRecords(content: string, delimiter: string, source: string): RawRecord[] {
  const records: RawRecord[] = [];
  let cells: string[] = [];
  let cell = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  for (let i = 0; i < content.length; i++) {
    const ch = content[i];

    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          cell += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        cell += ch;
      }
      continue;
    }

    if (ch === '"' && cell === '') {
      inQuotes = true;
    } else if (ch === delimiter) {
      cells.push(cell);
      cell = '';
    } else if (ch === '\n' || ch === '\r') {
      if (ch === '\r' && content[i + 1] === '\n') i++;
      cells.push(cell);
      records.push({ line: recordLine, cells });
      cells = [];
      cell = '';
      line++;
      recordLine = line;
    } else {
      cell += ch;
    }
  }

  if (inQuotes) {
    throw new ConfigLoadError(`Unterminated quoted field starting at line ${recordLine}: ${source}`, 'TABLE_PARSE_ERROR', {
      path: source,
      line: recordLine,
    });
  }

  if (cell !== '' || cells.length > 0) {
    cells.push(cell);
    records.push({ line: recordLine, cells });
  }

  return records;
}
