#!/usr/bin/env node
/**
 * Policy Navigator CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createHistoryCommand } from './commands/history.js';
import { createIngestCommand } from './commands/ingest.js';
import { createResetCommand } from './commands/reset.js';
import { createSeedCommand } from './commands/seed.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';
import {
  loadConfig,
  loadEnv,
  resolveRuntimeConfig,
  validateStartupConfig,
  printStartupValidation,
  COMMANDS_REQUIRING_PLATFORM,
} from '../config/index.js';

const VERSION = process.env.CLI_VERSION ?? '0.0.0';

const program = new Command();

program
  .name('pnav')
  .description('Answer questions about executive orders and policy documents, with public sources')
  .version(VERSION, '-v, --version', 'Display version number')
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('pnav seed')}                                   Index the seed site
  ${chalk.cyan('pnav ingest https://www.federalregister.gov/d/2022-05471')}
  ${chalk.cyan('pnav ask "Is EO 14067 still in effect?"')}     Ask a question
  ${chalk.cyan('pnav history --session dm:42')}                Show a conversation
  ${chalk.cyan('pnav config set backfill.web_enabled true')}  Change a setting
`);

/**
 * Build the logging context handed to every command
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = (): CommandContext => createContext(getGlobalOptions());

program.addCommand(createAskCommand(getContext));
program.addCommand(createIngestCommand(getContext));
program.addCommand(createSeedCommand(getContext));
program.addCommand(createHistoryCommand(getContext));
program.addCommand(createResetCommand(getContext));
program.addCommand(createConfigCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0] ?? ''}`, 'Run: pnav --help  to see available commands');
});

// Platform credentials are checked only for commands that reach the platform
program.hook('preAction', (_thisCommand, actionCommand) => {
  const commandName = actionCommand.name();
  if (!COMMANDS_REQUIRING_PLATFORM.includes(commandName)) {
    return;
  }

  const opts = getGlobalOptions();
  const config = resolveRuntimeConfig(loadConfig(), loadEnv());
  const result = validateStartupConfig(config, commandName);

  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError('Configuration validation failed', 'Fix the issues above and try again');
    }
  }
});

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
