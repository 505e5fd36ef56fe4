/**
 * inspect command - Show a project summary and its resolved sample table
 */

import type { CommandContext, CommandResult, InspectData, ProjectSummary } from '../types.js';
import { header, printDiagnostics, printSummary, printTable, verbose } from '../utils/output.js';
import { type Project, loadProject } from '../project.js';

export interface InspectOptions {
  /** Path to the project descriptor */
  configPath: string;
}

/**
 * Load a project for a command using the global options
 */
export function openProject(ctx: CommandContext, configPath: string): Project {
  const { options } = ctx;
  verbose(`Loading ${configPath}`, options.verbose);
  if (options.amendment) {
    verbose(`Activating amendment: ${options.amendment}`, options.verbose);
  }
  return loadProject(configPath, {
    amendment: options.amendment,
    env: ctx.env,
    logger: ctx.logger,
  });
}

/**
 * Overview of a loaded project
 */
export function summarizeProject(project: Project): ProjectSummary {
  return {
    name: project.name,
    description: project.description,
    configPath: project.filePath,
    sources: [...project.config.sources],
    activeAmendment: project.activeAmendment,
    amendments: project.listAmendments(),
    sampleCount: project.samples.size,
  };
}

/**
 * Execute the inspect command
 */
export function inspectCommand(
  ctx: CommandContext,
  options: InspectOptions
): CommandResult<InspectData> {
  const project = openProject(ctx, options.configPath);
  const summary = summarizeProject(project);
  const table = project.samples.toTable();
  const diagnostics = [...project.samples.diagnostics];

  if (ctx.outputFormat === 'human') {
    header(`Project ${summary.name}`);
    printSummary(summary);
    header('Samples');
    printTable(table);
    if (diagnostics.length > 0) {
      printDiagnostics(diagnostics);
    }
  }

  return {
    success: true,
    message: `Resolved ${summary.sampleCount} sample(s) for ${summary.name}`,
    data: { project: summary, table, diagnostics },
  };
}
