/**
 * History Command
 *
 * Print a session's stored conversation, oldest turn first.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { CommandContext } from '../types.js';
import { openNavigator, sessionOption, type NavigatorFactory, type SessionOptions } from '../shared.js';
import type { Turn, TurnRole } from '../../memory/types.js';

const ROLE_STYLES: Record<TurnRole, (text: string) => string> = {
  user: chalk.cyan,
  assistant: chalk.green,
  system: chalk.dim,
};

/**
 * One display line per turn: `HH:MM:SS role: content`.
 */
export function formatTurn(turn: Turn): string {
  const time = new Date(turn.t * 1000).toISOString().slice(11, 19);
  const style = ROLE_STYLES[turn.role];
  return `${chalk.dim(time)} ${style(`${turn.role}:`)} ${turn.content}`;
}

export function createHistoryCommand(
  getContext: () => CommandContext,
  getNavigator: NavigatorFactory = openNavigator
): Command {
  return new Command('history')
    .description('Show the stored conversation for a session')
    .addOption(sessionOption())
    .action(async (options: SessionOptions) => {
      const ctx = getContext();
      const navigator = getNavigator(ctx);
      const turns = await navigator.memory.load(options.session);

      if (ctx.options.json) {
        console.log(JSON.stringify({ session: options.session, turns }, null, 2));
        return;
      }

      if (turns.length === 0) {
        ctx.log(`No conversation stored for ${options.session}`);
        return;
      }

      for (const turn of turns) {
        ctx.log(formatTurn(turn));
      }
    });
}
