/**
 * Output formatting utilities for consistent CLI output
 */

import chalk from 'chalk';
import type { CommandResult, OutputFormat, ProjectSummary } from '../types.js';
import type { Diagnostic } from '../diagnostics.js';
import type { SampleTable } from '../samples/roster.js';

/**
 * Format and print command result based on output format
 */
export function printResult<T>(
  result: CommandResult<T>,
  format: OutputFormat
): void {
  if (format === 'json') {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  // Human-readable format
  if (result.success) {
    console.log(chalk.green('✓'), result.message);
  } else {
    console.log(chalk.red('✗'), result.message);
  }

  if (result.errors && result.errors.length > 0) {
    console.log(chalk.red('\nErrors:'));
    result.errors.forEach((err) => {
      console.log(chalk.red('  •'), err);
    });
  }
}

/**
 * Print the project overview
 */
export function printSummary(summary: ProjectSummary): void {
  console.log(`  ${chalk.gray('Name:')} ${summary.name}`);
  if (summary.description) {
    console.log(`  ${chalk.gray('Description:')} ${summary.description}`);
  }
  console.log(`  ${chalk.gray('Config:')} ${summary.configPath}`);
  if (summary.sources.length > 1) {
    console.log(`  ${chalk.gray('Imports:')} ${summary.sources.slice(0, -1).join(', ')}`);
  }
  console.log(`  ${chalk.gray('Samples:')} ${summary.sampleCount}`);
  console.log(
    `  ${chalk.gray('Amendments:')} ${summary.amendments.length > 0 ? summary.amendments.join(', ') : chalk.gray('(none)')}`
  );
  if (summary.activeAmendment) {
    console.log(`  ${chalk.gray('Active:')} ${chalk.cyan(summary.activeAmendment)}`);
  }
}

/**
 * Print a sample table with padded columns
 */
export function printTable(table: SampleTable): void {
  if (table.rows.length === 0) {
    console.log(chalk.gray('No samples'));
    return;
  }

  const widths = table.columns.map((column, index) =>
    Math.max(column.length, ...table.rows.map(row => (row[index] ?? '').length))
  );
  const pad = (cells: string[]): string =>
    cells.map((cell, index) => cell.padEnd(widths[index])).join('  ').trimEnd();

  console.log(chalk.bold(pad(table.columns)));
  for (const row of table.rows) {
    console.log(pad(row));
  }
}

/**
 * Print recorded diagnostics
 */
export function printDiagnostics(diagnostics: readonly Diagnostic[]): void {
  if (diagnostics.length === 0) {
    console.log(chalk.gray('No diagnostics'));
    return;
  }

  console.log(chalk.bold(`\n${diagnostics.length} diagnostic(s):\n`));
  for (const d of diagnostics) {
    const color = d.severity === 'warning' ? chalk.yellow : chalk.blue;
    const where = [d.sample, d.attribute].filter(Boolean).join('.');
    console.log(color(`  [${d.code}]`), where ? `${chalk.cyan(where)} ${d.message}` : d.message);
  }
}

/**
 * Print informational message
 */
export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message);
}

/**
 * Print error message
 */
export function error(message: string): void {
  console.log(chalk.red('✗'), message);
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(chalk.green('✓'), message);
}

/**
 * Print verbose/debug message (only if verbose mode is enabled)
 */
export function verbose(message: string, isVerbose: boolean): void {
  if (isVerbose) {
    // Keep JSON output clean: verbose/debug output should never go to stdout.
    console.error(chalk.gray('[verbose]'), message);
  }
}

/**
 * Print a section header
 */
export function header(title: string): void {
  console.log(chalk.bold.underline(`\n${title}\n`));
}
