/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

// Stored JSON parsing
export { parseStoredJson, type JsonParseFailure } from './json.js';

// Locking primitives
export { Mutex, OnceCell, sleep } from './mutex.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './logger.js';

// Type guards
export { isRecord, isNonEmptyString, isPresent } from './guards.js';
