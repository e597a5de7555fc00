/**
 * Error handling module for Policy Navigator
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: pnav config list');
 */

// Error types
export {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  ValidationError,
  PlatformError,
  CallShapeError,
  AgentInvocationError,
  IngestionError,
} from './types.js';

// Error handling utilities
export {
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  describeError,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
