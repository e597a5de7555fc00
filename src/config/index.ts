/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `pnav config` commands.
 */

// Schema and types
export {
  ConfigSchema,
  PartialConfigSchema,
  PlatformConfigSchema,
  RetrievalConfigSchema,
  PolicyConfigSchema,
} from './schema.js';
export type { Config, PartialConfig, PlatformConfig, RetrievalConfig, PolicyConfig } from './schema.js';

// Defaults
export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

// Loader functions
export {
  loadConfig,
  resolveRuntimeConfig,
  getConfigValue,
  setConfigValue,
  listConfig,
} from './loader.js';

// Paths
export {
  PNAV_DIR,
  CONFIG_PATH,
  getPnavDir,
  getConfigPath,
  expandHome,
  getStoragePaths,
} from './paths.js';
export type { StoragePaths } from './paths.js';

// Environment variables
export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  COMMANDS_REQUIRING_PLATFORM,
  COMMANDS_REQUIRING_AGENT,
} from './startup-validation.js';
export type { StartupValidationResult } from './startup-validation.js';
