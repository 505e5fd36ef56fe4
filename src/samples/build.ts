/**
 * Roster construction
 *
 * Reads the annotation table of an effective config, seeds one sample per
 * row, folds in subannotation tables and runs the modifier pipeline. Every
 * call starts from the files; nothing is cached between builds.
 */

import type { ProjectConfig } from '../config/types.js';
import { SAMPLE_NAME_ATTR } from '../config/types.js';
import { readSettings } from '../config/settings.js';
import { formatIssues, validationResult } from '../config/issues.js';
import { Diagnostics } from '../diagnostics.js';
import { ConfigLoadError, DuplicateSampleNameError } from '../errors.js';
import { type Logger, logger as defaultLogger } from '../logging/logger.js';
import { type Environment, projectScope } from '../substitution/expand.js';
import { readTable } from '../tables/delimited.js';
import { applyModifiers } from './modifiers.js';
import { Roster } from './roster.js';
import { Sample } from './sample.js';
import { applySubannotation } from './subsample.js';

export interface BuildOptions {
  /** Environment tier for template expansion (default: process.env) */
  env?: Environment;
  logger?: Logger;
}

/**
 * Resolve the sample roster of a config's effective tree
 *
 * @throws ConfigLoadError if the settings or a table are malformed
 * @throws DuplicateSampleNameError if two samples end up with the same name
 */
export function buildRoster(config: ProjectConfig, options: BuildOptions = {}): Roster {
  const env = options.env ?? process.env;
  const log = (options.logger ?? defaultLogger).child({
    config: config.filePath,
    ...(config.activeAmendment ? { amendment: config.activeAmendment } : {}),
  });

  const { settings, issues } = readSettings(config.tree);
  if (!settings || !validationResult(issues).valid) {
    throw new ConfigLoadError(
      `Invalid project config ${config.filePath}:\n${formatIssues(issues)}`,
      'CONFIG_INVALID',
      { path: config.filePath, issues }
    );
  }

  const diagnostics = new Diagnostics(log);
  for (const key of settings.unknownModifiers) {
    diagnostics.warn('UNKNOWN_MODIFIER', `Unknown sample modifier "${key}" ignored`, {
      context: { modifier: key },
    });
  }

  const table = readTable(settings.sampleAnnotation);
  if (!table.columns.includes(SAMPLE_NAME_ATTR)) {
    throw new ConfigLoadError(
      `Sample table has no "${SAMPLE_NAME_ATTR}" column: ${table.path}`,
      'MISSING_SAMPLE_NAME',
      { path: table.path, columns: table.columns }
    );
  }

  const samples = table.rows.map(row => {
    if (!row.values.has(SAMPLE_NAME_ATTR)) {
      throw new ConfigLoadError(
        `Sample row at line ${row.line} has no ${SAMPLE_NAME_ATTR}: ${table.path}`,
        'MISSING_SAMPLE_NAME',
        { path: table.path, line: row.line }
      );
    }
    return new Sample(row.values);
  });
  log.debug('Read sample table', { path: table.path, samples: samples.length });

  assertUniqueNames(samples, table.path);

  const byName = new Map(samples.map(sample => [sample.name, sample]));
  for (const path of settings.sampleSubannotations) {
    const subtable = readTable(path);
    applySubannotation(byName, subtable, diagnostics);
    log.debug('Merged subsample table', { path, rows: subtable.rows.length });
  }

  applyModifiers(samples, settings.modifiers, {
    project: projectScope(config.tree),
    env,
    diagnostics,
  });

  assertUniqueNames(samples);

  log.debug('Resolved roster', { samples: samples.length, diagnostics: diagnostics.size });
  return new Roster(samples, diagnostics.list());
}

function assertUniqueNames(samples: readonly Sample[], source?: string): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const sample of samples) {
    if (seen.has(sample.name) && !duplicates.includes(sample.name)) {
      duplicates.push(sample.name);
    }
    seen.add(sample.name);
  }
  if (duplicates.length > 0) {
    throw new DuplicateSampleNameError(duplicates, source);
  }
}
