/**
 * Ingest Command
 *
 * Add a web page or a local file to the index and make it the session's
 * most recent document:
 *
 *   pnav ingest https://www.federalregister.gov/d/2022-05471
 *   pnav ingest ./notes/eo-summary.md --session dm:42
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { CommandContext } from '../types.js';
import { openNavigator, sessionOption, type NavigatorFactory, type SessionOptions } from '../shared.js';
import { FileNotFoundError } from '../../errors/index.js';

function looksLikeUrl(target: string): boolean {
  return /^https?:\/\//i.test(target);
}

export function createIngestCommand(
  getContext: () => CommandContext,
  getNavigator: NavigatorFactory = openNavigator
): Command {
  return new Command('ingest')
    .description('Add a URL or a local file to the index')
    .argument('<target>', 'http(s) URL or path to a file')
    .addOption(sessionOption())
    .action(async (target: string, options: SessionOptions) => {
      const ctx = getContext();
      const isUrl = looksLikeUrl(target);

      if (!isUrl && !existsSync(target)) {
        throw new FileNotFoundError(target);
      }

      const navigator = getNavigator(ctx);
      const spinner = ctx.options.json
        ? null
        : ora({ text: isUrl ? `Fetching ${target}...` : `Reading ${target}...`, color: 'cyan' }).start();

      let status: string;
      try {
        if (isUrl) {
          status = await navigator.ingestUrl(target, options.session);
        } else {
          const bytes = await readFile(target);
          status = await navigator.ingestFileBytes(basename(target), bytes, options.session);
        }
      } catch (error) {
        spinner?.fail(chalk.dim('Ingestion failed'));
        throw error;
      }

      spinner?.stop();

      if (ctx.options.json) {
        console.log(JSON.stringify({ target, session: options.session, status }, null, 2));
        return;
      }

      ctx.log(status);
    });
}
