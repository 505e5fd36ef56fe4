/**
 * amendments command - List the overlays a project declares
 */

import chalk from 'chalk';
import type { AmendmentsData, CommandContext, CommandResult } from '../types.js';
import { header, info } from '../utils/output.js';
import { loadConfig } from '../config/loader.js';
import { listAmendments } from '../config/overlay.js';

export interface AmendmentsOptions {
  configPath: string;
}

/**
 * Execute the amendments command
 *
 * Only the descriptor is loaded; no sample table is read.
 */
export function amendmentsCommand(
  ctx: CommandContext,
  options: AmendmentsOptions
): CommandResult<AmendmentsData> {
  const config = loadConfig(options.configPath, {
    amendment: ctx.options.amendment,
    env: ctx.env,
    logger: ctx.logger,
  });
  const amendments = listAmendments(config);
  const active = config.activeAmendment;

  if (ctx.outputFormat === 'human') {
    header('Amendments');
    if (amendments.length === 0) {
      info('No amendments declared');
    }
    for (const name of amendments) {
      console.log(name === active ? chalk.cyan(`  * ${name}`) : `    ${name}`);
    }
  }

  return {
    success: true,
    message: `${amendments.length} amendment(s) declared`,
    data: { amendments, active },
  };
}
