/**
 * Configuration Schema
 *
 * Defines the shape of ~/.pnav/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Managed platform endpoints and identifiers
 */
export const PlatformConfigSchema = z.object({
  base_url: z.string().url().describe('Base URL of the managed agent platform API'),
  agent_id: z.string().optional().describe('Identifier of the deployed agent'),
  index_id: z.string().optional().describe('Identifier of the document index'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for a single platform request (1000-600000)'),
  poll_interval_ms: z
    .number()
    .int()
    .min(0)
    .max(60000)
    .describe('Delay between polls of an asynchronous run'),
  max_polls: z.number().int().min(1).max(1000).describe('Polls before an asynchronous run is abandoned'),
});

/**
 * Retrieval and context assembly
 */
export const RetrievalConfigSchema = z.object({
  top_k: z.number().int().min(1).max(50).describe('Passages requested from the index'),
  context_cap: z
    .number()
    .int()
    .min(200)
    .max(20000)
    .describe('Hard character cap on the context handed to the agent'),
  min_context_chars: z
    .number()
    .int()
    .min(0)
    .describe('Context shorter than this triggers backfill'),
  history_hint_chars: z
    .number()
    .int()
    .min(0)
    .describe('Trailing history characters appended to the backfill query'),
  recent_excerpt_chars: z
    .number()
    .int()
    .min(0)
    .describe('Characters of a recently ingested document placed in context'),
  secondary_results: z
    .number()
    .int()
    .min(0)
    .max(20)
    .describe('Ordinary search results kept alongside a recent-document excerpt'),
});

/**
 * Agent invocation behaviour
 */
export const AgentConfigSchema = z.object({
  max_retries: z.number().int().min(1).max(10).describe('Attempts on transient lock errors'),
  backoff_ms: z.number().int().min(0).max(60000).describe('Linear backoff step between retries'),
  general_fallback: z
    .boolean()
    .describe('Ask the agent again without context when the first answer is empty'),
});

/**
 * Conversation memory limits
 */
export const MemoryConfigSchema = z.object({
  max_turns: z.number().int().min(1).max(200).describe('Remembered exchanges per session'),
  max_history_chars: z.number().int().min(0).describe('Characters of history placed in context'),
});

/**
 * Web backfill (re-scrape a seed site when retrieval is thin)
 */
export const BackfillConfigSchema = z.object({
  web_enabled: z.boolean().describe('Re-scrape the seed URL when context is still thin'),
  seed_url: z.string().url().optional().describe('Site scraped for web backfill and initial data'),
  max_pages: z.number().int().min(1).max(50).describe('Pages fetched per backfill scrape'),
});

/**
 * Local storage layout
 */
export const StorageConfigSchema = z.object({
  data_dir: z.string().describe('Root folder for sessions, uploads, web snapshots and the manifest'),
});

/**
 * Pattern tables behind the public/local source decision, blocked-page
 * detection, transient error detection and recent-document intent.
 */
export const PolicyConfigSchema = z.object({
  public_domains: z.array(z.string()).describe('Domains always accepted as public sources'),
  local_path_markers: z.array(z.string()).describe('Substrings that mark a source as a local path'),
  blocked_markers: z.array(z.string()).describe('Boilerplate phrases of access-blocked pages'),
  recent_document_phrases: z
    .array(z.string())
    .describe('Query phrases meaning "the document I just added"'),
  transient_error_patterns: z
    .array(z.string())
    .describe('Error message substrings treated as transient contention'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  platform: PlatformConfigSchema,
  retrieval: RetrievalConfigSchema,
  agent: AgentConfigSchema,
  memory: MemoryConfigSchema,
  backfill: BackfillConfigSchema,
  storage: StorageConfigSchema,
  policy: PolicyConfigSchema,
});

/**
 * TypeScript type inferred from the schema
 */
export type Config = z.infer<typeof ConfigSchema>;
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;
export type RetrievalConfig = z.infer<typeof RetrievalConfigSchema>;
export type PlatformConfig = z.infer<typeof PlatformConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
