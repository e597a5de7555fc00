/**
 * Config Command
 *
 * Manages ~/.pnav/config.toml:
 *   pnav config get <key>          - Get a specific value
 *   pnav config set <key> <value>  - Set a value
 *   pnav config list               - Show all configuration
 *   pnav config path               - Show config file location
 *   pnav config reset --force      - Restore the template
 *
 * Secrets never live here; the API key comes from PLATFORM_API_KEY.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, unlinkSync } from 'node:fs';
import { loadConfig, getConfigValue, setConfigValue, listConfig } from '../../config/loader.js';
import { getConfigPath } from '../../config/paths.js';
import type { CommandContext } from '../types.js';

export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Manage configuration settings');

  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., pnav config get retrieval.top_k)')
    .action((key: string) => {
      const ctx = getContext();

      try {
        const value = getConfigValue(key);

        if (value === undefined) {
          ctx.error(`Unknown config key: ${key}`);
          ctx.log('');
          ctx.log(`Run ${chalk.cyan('pnav config list')} to see all available keys.`);
          process.exitCode = 1;
          return;
        }

        emit(ctx, { key, value }, formatValue(value));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value (e.g., pnav config set backfill.web_enabled true)')
    .action((key: string, value: string) => {
      const ctx = getContext();

      try {
        setConfigValue(key, value);
        const stored = getConfigValue(key);

        emit(
          ctx,
          { success: true, key, value: stored },
          `${chalk.green('✓')} Set ${chalk.cyan(key)} = ${chalk.yellow(formatValue(stored))}`
        );
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('list')
    .alias('ls')
    .description('List all configuration values')
    .action(() => {
      const ctx = getContext();

      try {
        const entries = listConfig();

        if (ctx.options.json) {
          console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
          return;
        }

        ctx.log(chalk.bold('Configuration:'));
        ctx.log('');

        // Blank line between sections
        let currentGroup = '';
        for (const [key, value] of entries) {
          const group = key.split('.')[0] ?? '';
          if (group !== currentGroup) {
            if (currentGroup !== '') ctx.log('');
            currentGroup = group;
          }
          ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
        }

        ctx.log('');
        ctx.log(chalk.dim(`Config file: ${getConfigPath()}`));
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const configPath = getConfigPath();
      emit(ctx, { path: configPath }, configPath);
    });

  configCmd
    .command('reset')
    .description('Reset configuration to defaults')
    .option('-f, --force', 'Skip confirmation prompt')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();

      if (!options.force) {
        ctx.log(chalk.yellow('This will reset all configuration to defaults.'));
        ctx.log(`Run with ${chalk.cyan('--force')} to confirm.`);
        process.exitCode = 1;
        return;
      }

      try {
        const configPath = getConfigPath();
        if (existsSync(configPath)) {
          unlinkSync(configPath);
        }
        loadConfig(true);

        emit(
          ctx,
          { success: true, message: 'Configuration reset to defaults' },
          `${chalk.green('✓')} Configuration reset to defaults`
        );
      } catch (error) {
        handleConfigError(ctx, error);
      }
    });

  return configCmd;
}

/**
 * JSON payload under --json, otherwise the text line.
 */
function emit(ctx: CommandContext, payload: Record<string, unknown>, text: string): void {
  if (ctx.options.json) {
    console.log(JSON.stringify(payload));
  } else {
    ctx.log(text);
  }
}

/**
 * Render a config value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  if (value === undefined) return '(unset)';
  return JSON.stringify(value);
}

function handleConfigError(ctx: CommandContext, error: unknown): void {
  const message = error instanceof Error ? error.message : 'Unknown error';

  if (ctx.options.json) {
    console.error(JSON.stringify({ error: message }));
  } else {
    ctx.error(message);
  }

  process.exitCode = 1;
}
