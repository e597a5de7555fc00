/**
 * Seed Command
 *
 * Create the data folders, crawl the seed site into an empty web folder,
 * and index everything that changed since the last run.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import { openNavigator, type NavigatorFactory } from '../shared.js';

interface SeedCommandOptions {
  pages?: number;
}

function parsePageCount(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function createSeedCommand(
  getContext: () => CommandContext,
  getNavigator: NavigatorFactory = openNavigator
): Command {
  return new Command('seed')
    .description('Prepare the data folders and index the seed site')
    .argument('[url]', 'Site to crawl (default: SEED_URL or backfill.seed_url)')
    .option('-p, --pages <n>', 'Pages to crawl', parsePageCount)
    .action(async (url: string | undefined, options: SeedCommandOptions) => {
      const ctx = getContext();
      const navigator = getNavigator(ctx);
      const seedUrl = url ?? navigator.config.backfill.seed_url;
      const pages = options.pages ?? navigator.config.backfill.max_pages;

      const spinner = ctx.options.json ? null : ora({ text: 'Indexing...', color: 'cyan' }).start();

      let indexed: number;
      try {
        indexed = await navigator.ingestion.bootstrap(seedUrl, pages);
      } catch (error) {
        spinner?.fail(chalk.dim('Seeding failed'));
        throw error;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ dataDir: navigator.paths.dataDir, seedUrl: seedUrl ?? null, indexed }, null, 2));
        return;
      }

      spinner?.succeed(`Indexed ${indexed} file${indexed === 1 ? '' : 's'} under ${navigator.paths.dataDir}`);
    });
}
