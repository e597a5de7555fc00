/**
 * Environment Variable Handler
 *
 * Loads the platform credentials and runtime switches.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - PLATFORM_API_KEY is NEVER logged, even in verbose mode
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load .env file (for local development)
// No-op if .env doesn't exist - production uses real env vars
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Boolean switch accepting 1/true/yes/y (case-insensitive); anything else is false.
 */
const BooleanSwitch = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined ? undefined : ['1', 'true', 'yes', 'y'].includes(value.trim().toLowerCase())
  );

/**
 * Environment variable schema.
 * Nothing is required at load time - validation happens on use, so
 * commands that never reach the platform work without credentials.
 */
export const EnvSchema = z.object({
  PLATFORM_API_KEY: z.string().optional(),
  PLATFORM_BASE_URL: z.string().url().optional(),
  AGENT_ID: z.string().optional(),
  INDEX_ID: z.string().optional(),
  SEED_URL: z.string().url().optional(),
  PNAV_DATA_DIR: z.string().optional(),
  WEB_BACKFILL: BooleanSwitch,
  GENERAL_ANSWER_FALLBACK: BooleanSwitch,
});

export type EnvVars = z.infer<typeof EnvSchema>;

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * _clearEnvCache() allows test isolation.
 */
let _envCache: EnvVars | null = null;

/**
 * Read a variable, treating blank values as unset.
 */
function readVar(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * Malformed values (e.g. a SEED_URL that is not a URL) are dropped
 * individually rather than discarding the whole environment.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const raw = {
    PLATFORM_API_KEY: readVar('PLATFORM_API_KEY'),
    PLATFORM_BASE_URL: readVar('PLATFORM_BASE_URL'),
    AGENT_ID: readVar('AGENT_ID'),
    INDEX_ID: readVar('INDEX_ID'),
    SEED_URL: readVar('SEED_URL'),
    PNAV_DATA_DIR: readVar('PNAV_DATA_DIR'),
    WEB_BACKFILL: readVar('WEB_BACKFILL'),
    GENERAL_ANSWER_FALLBACK: readVar('GENERAL_ANSWER_FALLBACK'),
  };

  const result = EnvSchema.safeParse(raw);

  if (result.success) {
    _envCache = result.data;
  } else {
    const invalid = new Set(result.error.issues.map((issue) => String(issue.path[0])));
    const cleaned = Object.fromEntries(
      Object.entries(raw).filter(([key]) => !invalid.has(key))
    );
    _envCache = EnvSchema.parse(cleaned);
  }

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Check if the platform API key is configured (non-empty), without
 * exposing its value.
 */
export function hasApiKey(): boolean {
  return Boolean(loadEnv().PLATFORM_API_KEY);
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown when platform credentials are missing.
 */
export const SETUP_INSTRUCTIONS = `
To connect to the agent platform:

1. Create a .env file in the working directory (or export the variables):

   PLATFORM_API_KEY="your-api-key"
   AGENT_ID="id of the deployed agent"
   INDEX_ID="id of the document index"

2. Optional switches:

   SEED_URL="https://www.federalregister.gov/presidential-documents/executive-orders"
   WEB_BACKFILL=true
   GENERAL_ANSWER_FALLBACK=false
   PNAV_DATA_DIR="/var/lib/pnav"
`.trim();
