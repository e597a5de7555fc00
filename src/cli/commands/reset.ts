/**
 * Reset Command
 *
 * Forget a session's conversation and its most recent document.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openNavigator, sessionOption, type NavigatorFactory, type SessionOptions } from '../shared.js';

export function createResetCommand(
  getContext: () => CommandContext,
  getNavigator: NavigatorFactory = openNavigator
): Command {
  return new Command('reset')
    .description('Clear the stored conversation for a session')
    .addOption(sessionOption())
    .action(async (options: SessionOptions) => {
      const ctx = getContext();
      const navigator = getNavigator(ctx);

      await navigator.clearSession(options.session);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, session: options.session }));
      } else {
        ctx.log(`${chalk.green('✓')} Cleared ${chalk.cyan(options.session)}`);
      }
    });
}
