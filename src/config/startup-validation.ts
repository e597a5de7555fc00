/**
 * Startup Configuration Validation
 *
 * Checks platform credentials and identifiers at CLI startup.
 *
 * This is a WARNING system, not a hard block.
 * Commands that never reach the platform (history, reset, config)
 * still work without credentials.
 */

import chalk from 'chalk';
import type { Config } from './schema.js';
import { hasApiKey, SETUP_INSTRUCTIONS } from './env.js';

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether everything the command needs is present */
  valid: boolean;
  /** Non-fatal issues */
  warnings: string[];
  /** Missing pieces that prevent the command from working */
  errors: string[];
  /** Setup instructions for the errors */
  hints: string[];
}

/**
 * Validate the resolved configuration for a command.
 *
 * @param config - Config after environment overrides
 * @param command - CLI command name (e.g. 'ask')
 */
export function validateStartupConfig(config: Config, command: string): StartupValidationResult {
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  if (!COMMANDS_REQUIRING_PLATFORM.includes(command)) {
    return { valid: true, warnings, errors, hints };
  }

  if (!hasApiKey()) {
    errors.push('PLATFORM_API_KEY is not set');
  }
  if (!config.platform.agent_id && COMMANDS_REQUIRING_AGENT.includes(command)) {
    errors.push('No agent configured (AGENT_ID or platform.agent_id)');
  }
  if (!config.platform.index_id) {
    warnings.push('No index configured (INDEX_ID or platform.index_id); answers will have no retrieved context');
  }
  if (config.backfill.web_enabled && !config.backfill.seed_url) {
    warnings.push('Web backfill is enabled but no seed URL is set');
  }

  if (errors.length > 0) {
    hints.push(SETUP_INSTRUCTIONS);
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation warnings/errors to console.
 *
 * @param verbose - Whether to show warnings (default: only errors)
 */
export function printStartupValidation(result: StartupValidationResult, verbose = false): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(hint));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Commands that talk to the platform at all.
 */
export const COMMANDS_REQUIRING_PLATFORM = ['ask', 'ingest', 'seed'];

/**
 * Commands that need a deployed agent.
 */
export const COMMANDS_REQUIRING_AGENT = ['ask'];
