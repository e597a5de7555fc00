/**
 * Error handler for CLI error formatting and display
 *
 * Text output is coloured for the terminal; `--json` gives the same
 * fields as an object. Platform failures show their HTTP status, and
 * `--verbose` adds the agent conventions tried, the cause and the stack.
 */

import chalk from 'chalk';
import { AgentInvocationError, CLIError, PlatformError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show stack traces and attempt details */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** HTTP status of a platform failure */
  status?: number;
  /** Agent calling conventions tried before giving up */
  attempted?: string[];
  cause?: string;
  stack?: string;
}

/**
 * Extract a one-line message from any thrown value.
 *
 * Used wherever a failure is logged or embedded in user-facing text
 * instead of being rethrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}

/**
 * Collect the fields shown for an error, in text and JSON alike.
 */
function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: 1 };
  }

  const output: ErrorOutput = {
    error: error.message,
    code: getExitCode(error),
  };

  if (error instanceof CLIError) {
    output.hint = error.hint;
  }
  if (error instanceof PlatformError && error.status !== undefined) {
    output.status = error.status;
  }
  if (error instanceof AgentInvocationError && error.attempted.length > 0) {
    output.attempted = error.attempted;
  }
  if (error.cause !== undefined) {
    output.cause = describeError(error.cause);
  }
  if (verbose) {
    output.stack = error.stack;
  }
  return output;
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without
 * process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];

  if (output.status !== undefined) {
    lines.push(chalk.dim('Status: ') + String(output.status));
  }
  if (verbose && output.attempted) {
    lines.push(chalk.dim('Attempted: ') + output.attempted.join(', '));
  }
  if (verbose && output.cause) {
    lines.push(chalk.dim('Caused by: ') + output.cause);
  }

  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  } else if (error instanceof Error && !(error instanceof CLIError) && !verbose) {
    lines.push(chalk.dim('Hint: ') + 'Run with --verbose for more details');
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  if (error instanceof CLIError) {
    return error.code;
  }
  return 1;
}

/**
 * Handle an error by formatting and exiting.
 *
 * This is the main entry point for error handling in the CLI.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  const formatted = formatError(error, options);
  const code = getExitCode(error);

  // Use stderr for errors (stdout is for normal output)
  console.error(formatted);

  process.exit(code);
}

/**
 * Create a global error handler that can be attached to process events.
 *
 * Usage:
 *   const handler = createGlobalErrorHandler({ verbose: true });
 *   process.on('uncaughtException', handler);
 *   process.on('unhandledRejection', handler);
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
