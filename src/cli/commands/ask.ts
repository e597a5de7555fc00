/**
 * Ask Command
 *
 * Answer a question from the indexed documents, continuing a conversation:
 *
 *   pnav ask "Is EO 14067 still in effect?"
 *   pnav ask "When was it signed?" --session dm:42
 *   pnav ask "Who revoked it?" --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { openNavigator, sessionOption, type NavigatorFactory, type SessionOptions } from '../shared.js';
import { splitSources } from '../../agent/citations.js';
import { ValidationError } from '../../errors/index.js';

/**
 * JSON output format for the ask command.
 */
interface AskOutputJSON {
  question: string;
  session: string;
  answer: string;
  sources: string[];
  totalMs: number;
}

export function createAskCommand(
  getContext: () => CommandContext,
  getNavigator: NavigatorFactory = openNavigator
): Command {
  return new Command('ask')
    .description('Ask a question about the indexed documents')
    .argument('<question>', 'Question to answer')
    .addOption(sessionOption())
    .action(async (question: string, options: SessionOptions) => {
      const ctx = getContext();
      const trimmed = question.trim();

      if (!trimmed) {
        throw new ValidationError('Question cannot be empty', [
          'Provide a question, e.g. pnav ask "Is EO 14067 still in effect?"',
        ]);
      }

      ctx.debug(`Session: ${options.session}`);
      const navigator = getNavigator(ctx);

      const startTime = performance.now();
      const spinner = ctx.options.json ? null : ora({ text: 'Thinking...', color: 'cyan' }).start();

      let answer: string;
      try {
        answer = await navigator.answer(trimmed, options.session);
      } catch (error) {
        spinner?.fail(chalk.dim('Could not answer'));
        throw error;
      }

      const totalMs = Math.round(performance.now() - startTime);
      spinner?.stop();

      if (ctx.options.json) {
        const { body, sources } = splitSources(answer);
        const output: AskOutputJSON = {
          question: trimmed,
          session: options.session,
          answer: body,
          sources,
          totalMs,
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      ctx.log(answer);
      ctx.debug(`Answered in ${totalMs}ms`);
    });
}
