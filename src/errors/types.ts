/**
 * Error type definitions for Policy Navigator
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for programmatic error handling
 * - Type safety for error handling logic
 */

/**
 * Base class for all navigator errors.
 *
 * - hint: Tells the user HOW to fix the problem
 * - code: Allows scripts to handle different errors differently
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Missing required config values
 * - Invalid config option names
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: pnav config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when the platform API key is missing.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  constructor(envVar: string = 'PLATFORM_API_KEY') {
    super(
      'Platform API key not configured',
      `Set the ${envVar} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the managed platform answers with a non-success status,
 * times out, or never completes an asynchronous run.
 *
 * Exit code 5: Platform error
 */
export class PlatformError extends CLIError {
  /** HTTP status, when the failure came from a response */
  public readonly status?: number;
  public readonly cause?: Error;

  constructor(message: string, status?: number, cause?: Error) {
    super(message, 'Check PLATFORM_BASE_URL, AGENT_ID and INDEX_ID', 5);
    this.name = 'PlatformError';
    this.status = status;
    this.cause = cause;
  }
}

/**
 * Thrown when the agent rejects the shape of the arguments it was given.
 *
 * Not a failure by itself: the invoker reacts by trying the next
 * calling convention.
 */
export class CallShapeError extends PlatformError {
  constructor(message: string, status?: number) {
    super(message, status);
    this.name = 'CallShapeError';
  }
}

/**
 * Thrown when every attempt to call the agent failed hard.
 *
 * Exit code 6: Agent error
 */
export class AgentInvocationError extends CLIError {
  public readonly cause?: Error;

  /** Conventions that were attempted before giving up */
  public readonly attempted: string[];

  constructor(message: string, attempted: string[] = [], cause?: Error) {
    super(message, 'Run with --verbose to see each attempt', 6);
    this.name = 'AgentInvocationError';
    this.attempted = attempted;
    this.cause = cause;
  }
}

/**
 * Thrown when a document cannot be downloaded, saved or pushed to the index.
 *
 * Exit code 7: Ingestion error
 */
export class IngestionError extends CLIError {
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Check the URL or file and try again', 7);
    this.name = 'IngestionError';
    this.cause = cause;
  }
}
