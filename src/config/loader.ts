/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create config directory (~/.pnav)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Overlay environment variables (resolveRuntimeConfig)
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getConfigPath } from './paths.js';
import type { EnvVars } from './env.js';
import { ConfigError } from '../errors/index.js';
import { isRecord } from '../utils/guards.js';

/**
 * Deep merge two objects, with source values overriding target
 * Nested objects are merged; arrays and primitives are replaced
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Format Zod issues as an indented bullet list
 */
function formatIssues(issues: Array<{ path: Array<string | number>; message: string }>): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the commented template on first run
 * @param configPath - Override the file location (tests, --config)
 * @throws ConfigError if the file exists but is invalid
 */
export function loadConfig(createIfMissing = true, configPath: string = getConfigPath()): Config {
  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath}`
    );
  }

  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error.issues)}`,
      `Fix the values in ${configPath}`
    );
  }

  const userConfig: PartialConfig = validationResult.data;
  const merged = ConfigSchema.safeParse(deepMerge(structuredClone(DEFAULT_CONFIG), userConfig));

  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error.issues)}`,
      `Fix the values in ${configPath}`
    );
  }

  return merged.data;
}

/**
 * Overlay environment variables on a loaded config.
 *
 * Environment wins over the file so deployments can be configured
 * without touching config.toml.
 */
export function resolveRuntimeConfig(config: Config, env: EnvVars): Config {
  return {
    ...config,
    platform: {
      ...config.platform,
      base_url: env.PLATFORM_BASE_URL ?? config.platform.base_url,
      agent_id: env.AGENT_ID ?? config.platform.agent_id,
      index_id: env.INDEX_ID ?? config.platform.index_id,
    },
    agent: {
      ...config.agent,
      general_fallback: env.GENERAL_ANSWER_FALLBACK ?? config.agent.general_fallback,
    },
    backfill: {
      ...config.backfill,
      web_enabled: env.WEB_BACKFILL ?? config.backfill.web_enabled,
      seed_url: env.SEED_URL ?? config.backfill.seed_url,
    },
    storage: {
      ...config.storage,
      data_dir: env.PNAV_DATA_DIR ?? config.storage.data_dir,
    },
  };
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('retrieval.top_k') => 5
 */
export function getConfigValue(key: string, configPath: string = getConfigPath()): unknown {
  const config = loadConfig(true, configPath);
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a specific config value by dot-notation path
 * Validates the merged result before writing the file back
 */
export function setConfigValue(key: string, value: string, configPath: string = getConfigPath()): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });

  let config: TOML.JsonMap = {};
  if (fs.existsSync(configPath)) {
    config = TOML.parse(fs.readFileSync(configPath, 'utf-8'));
  }

  const parts = key.split('.').filter((part) => part.length > 0);
  const lastPart = parts.pop();
  if (lastPart === undefined) {
    throw new ConfigError('Invalid config key: empty key');
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (typeof next === 'object' && !Array.isArray(next) && !(next instanceof Date)) {
      current = next;
    } else {
      const created: TOML.JsonMap = {};
      current[part] = created;
      current = created;
    }
  }
  current[lastPart] = parseValue(value);

  const merged = deepMerge(structuredClone(DEFAULT_CONFIG), config);
  const validationResult = ConfigSchema.safeParse(merged);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(validationResult.error.issues)}`,
      'Run: pnav config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * Parse a string value into the appropriate type
 * Handles booleans, numbers, comma-separated lists and strings
 */
function parseValue(value: string): boolean | number | string | string[] {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;

  if (value.startsWith('[') && value.endsWith(']')) {
    return value
      .slice(1, -1)
      .split(',')
      .map((item) => item.trim().replace(/^["']|["']$/g, ''))
      .filter((item) => item.length > 0);
  }

  return value;
}

/**
 * List all config values in a flat format
 * Returns entries like ['retrieval.top_k', 5]
 */
export function listConfig(configPath: string = getConfigPath()): Array<[string, unknown]> {
  const config = loadConfig(true, configPath);
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
