#!/usr/bin/env node
/**
 * pep-resolve CLI - Inspect resolved sample rosters of PEP projects
 *
 * Commands:
 * - inspect: Show a project summary and its sample table
 * - sample: Print one resolved sample
 * - amendments: List declared amendments
 * - validate: Resolve a project and report diagnostics
 */

import { Command, Option } from 'commander';
import type { CommandContext, CommandResult, GlobalOptions } from './types.js';
import { amendmentsCommand, inspectCommand, sampleCommand, validateCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { errorMessage } from './errors.js';
import { logger } from './logging/logger.js';

const VERSION = '0.1.0';

/**
 * Create the command context from parsed options
 */
function createContext(options: GlobalOptions): CommandContext {
  if (options.verbose) {
    logger.setConfig({ level: 'debug' });
  }

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
    env: process.env,
    logger,
  };
}

/**
 * Run a command handler and exit with its status
 */
function run<T>(label: string, handler: (ctx: CommandContext) => CommandResult<T>): void {
  const ctx = createContext(program.opts<GlobalOptions>());

  try {
    const result = handler(ctx);
    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }
    process.exit(result.success ? 0 : 1);
  } catch (err) {
    if (ctx.outputFormat === 'json') {
      printResult({ success: false, message: `${label} failed`, errors: [errorMessage(err)] }, ctx.outputFormat);
    } else {
      error(`${label} failed: ${errorMessage(err)}`);
    }
    process.exit(1);
  }
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('pep-resolve')
  .description('Resolve PEP project configs into sample rosters')
  .version(VERSION)
  // Global options available to all commands
  .addOption(
    new Option('--amendment <name>', 'Activate a declared amendment')
      .env('PEP_AMENDMENT')
  )
  .addOption(
    new Option('--json', 'Output JSON for scripting')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * inspect command - Project summary and sample table
 */
program
  .command('inspect')
  .description('Show a project summary and its resolved sample table')
  .argument('<config>', 'Path to the project config')
  .action((configPath: string) => {
    run('Inspect', ctx => inspectCommand(ctx, { configPath }));
  });

/**
 * sample command - One resolved sample
 */
program
  .command('sample')
  .description('Print one resolved sample')
  .argument('<config>', 'Path to the project config')
  .argument('<name>', 'Sample name')
  .action((configPath: string, sampleName: string) => {
    run('Sample', ctx => sampleCommand(ctx, { configPath, sampleName }));
  });

/**
 * amendments command - Declared overlays
 */
program
  .command('amendments')
  .description('List the amendments a project declares')
  .argument('<config>', 'Path to the project config')
  .action((configPath: string) => {
    run('Amendments', ctx => amendmentsCommand(ctx, { configPath }));
  });

/**
 * validate command - Resolve and report
 */
program
  .command('validate')
  .description('Resolve a project and report diagnostics')
  .argument('<config>', 'Path to the project config')
  .action((configPath: string) => {
    run('Validate', ctx => validateCommand(ctx, { configPath }));
  });

program.parse();
