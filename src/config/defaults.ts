/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No config.toml exists (first run)
 * 2. User's config.toml is missing certain fields
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: Config = {
  platform: {
    base_url: 'https://platform-api.aixplain.com',
    timeout_ms: 120000,
    poll_interval_ms: 1500,
    max_polls: 80,
  },

  retrieval: {
    top_k: 5,
    context_cap: 2500, // characters, not tokens
    min_context_chars: 600,
    history_hint_chars: 400,
    recent_excerpt_chars: 1800,
    secondary_results: 2,
  },

  agent: {
    max_retries: 3,
    backoff_ms: 500, // 0.5s, 1s, 1.5s
    general_fallback: true,
  },

  memory: {
    max_turns: 10,
    max_history_chars: 2000,
  },

  backfill: {
    web_enabled: false,
    max_pages: 2,
  },

  storage: {
    data_dir: '~/.pnav/data',
  },

  policy: {
    public_domains: [
      'federalregister.gov',
      'govinfo.gov',
      'whitehouse.gov',
      'congress.gov',
      'ecfr.gov',
      'regulations.gov',
      'eur-lex.europa.eu',
      'edpb.europa.eu',
      'gdpr-info.eu',
      'ico.org.uk',
    ],
    local_path_markers: [
      'file://',
      '~/',
      '/Users/',
      '\\Users\\',
      'data/uploads',
      'data/web',
      'data/kaggle',
      'data\\uploads',
      'data\\web',
      'data\\kaggle',
      '.pnav/',
    ],
    blocked_markers: [
      'Request Access',
      'programmatic access to these sites is limited',
      'aggressive automated scraping',
      'Checking your browser before accessing',
      'Enable JavaScript and cookies to continue',
    ],
    recent_document_phrases: [
      'just added',
      'just uploaded',
      'just ingested',
      'just shared',
      'just sent',
      'i added',
      'i uploaded',
      'this document',
      'that document',
      'the document',
      'this doc',
      'the link',
      'this link',
      'the pdf',
      'latest document',
      'recent document',
    ],
    transient_error_patterns: [
      'database is locked',
      'is locked',
      'resource busy',
      'temporarily unavailable',
      'try again',
    ],
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.pnav/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Policy Navigator Configuration
# Location: ~/.pnav/config.toml
# Secrets (PLATFORM_API_KEY) belong in the environment or .env, never here.

[platform]
base_url = "${DEFAULT_CONFIG.platform.base_url}"
# agent_id = "..."   # or set AGENT_ID
# index_id = "..."   # or set INDEX_ID
timeout_ms = ${DEFAULT_CONFIG.platform.timeout_ms}
poll_interval_ms = ${DEFAULT_CONFIG.platform.poll_interval_ms}
max_polls = ${DEFAULT_CONFIG.platform.max_polls}

# Context handed to the agent (characters)
[retrieval]
top_k = ${DEFAULT_CONFIG.retrieval.top_k}
context_cap = ${DEFAULT_CONFIG.retrieval.context_cap}
min_context_chars = ${DEFAULT_CONFIG.retrieval.min_context_chars}
history_hint_chars = ${DEFAULT_CONFIG.retrieval.history_hint_chars}
recent_excerpt_chars = ${DEFAULT_CONFIG.retrieval.recent_excerpt_chars}
secondary_results = ${DEFAULT_CONFIG.retrieval.secondary_results}

[agent]
max_retries = ${DEFAULT_CONFIG.agent.max_retries}
backoff_ms = ${DEFAULT_CONFIG.agent.backoff_ms}
general_fallback = ${DEFAULT_CONFIG.agent.general_fallback}

[memory]
max_turns = ${DEFAULT_CONFIG.memory.max_turns}
max_history_chars = ${DEFAULT_CONFIG.memory.max_history_chars}

# Re-scrape a seed site when retrieval stays thin
[backfill]
web_enabled = ${DEFAULT_CONFIG.backfill.web_enabled}
# seed_url = "https://www.federalregister.gov/presidential-documents/executive-orders"
max_pages = ${DEFAULT_CONFIG.backfill.max_pages}

[storage]
data_dir = "${DEFAULT_CONFIG.storage.data_dir}"

# Pattern tables (public_domains, local_path_markers, blocked_markers,
# recent_document_phrases, transient_error_patterns) can be overridden
# under [policy]; see: pnav config list
`;
