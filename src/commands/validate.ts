/**
 * validate command - Load and resolve a project, reporting every problem
 */

import type { CommandContext, CommandResult, ValidateData } from '../types.js';
import { error as printError, printDiagnostics, success, verbose } from '../utils/output.js';
import { PepError, errorMessage } from '../errors.js';
import { openProject, summarizeProject } from './inspect.js';

export interface ValidateOptions {
  configPath: string;
}

/**
 * Execute the validate command
 *
 * Fatal resolution errors make the result unsuccessful; diagnostics do not.
 */
export function validateCommand(
  ctx: CommandContext,
  options: ValidateOptions
): CommandResult<ValidateData> {
  const human = ctx.outputFormat === 'human';

  try {
    const project = openProject(ctx, options.configPath);
    const summary = summarizeProject(project);
    const diagnostics = [...project.samples.diagnostics];

    if (human) {
      success(`${summary.name}: ${summary.sampleCount} sample(s) resolved`);
      printDiagnostics(diagnostics);
    }

    return {
      success: true,
      message: `Project ${summary.name} is valid with ${diagnostics.length} diagnostic(s)`,
      data: { project: summary, diagnostics },
    };
  } catch (err) {
    if (!(err instanceof PepError)) throw err;

    verbose(`${err.name} (${err.code})`, ctx.options.verbose);
    if (human) {
      printError(err.message);
    }
    return {
      success: false,
      message: `Project ${options.configPath} is invalid`,
      data: { diagnostics: [] },
      errors: [errorMessage(err)],
    };
  }
}
