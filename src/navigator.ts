/**
 * Navigator Factory
 *
 * Wires configuration, storage, platform handles, memory, ingestion and
 * the answer pipeline into one object. The CLI and any chat front-end
 * build exactly one navigator per process.
 */

import { loadConfig, resolveRuntimeConfig } from './config/loader.js';
import { loadEnv } from './config/env.js';
import { getStoragePaths, type StoragePaths } from './config/paths.js';
import type { Config } from './config/schema.js';
import { AgentInvoker } from './agent/invoker.js';
import { AnswerPipeline } from './agent/pipeline.js';
import { IngestService } from './ingest/service.js';
import { RecencyCache } from './ingest/recency.js';
import { SessionMemory } from './memory/session-store.js';
import { createHttpHandles, type PlatformHandles } from './platform/handles.js';
import { createSourcePolicy } from './search/source-policy.js';
import type { SourcePolicy } from './search/types.js';
import { silentLogger, type Logger } from './utils/logger.js';

export interface NavigatorOptions {
  /** Resolved configuration (default: config file + environment) */
  config?: Config;
  /** Platform API key (default: PLATFORM_API_KEY) */
  apiKey?: string;
  /** Index and agent clients (default: platform HTTP clients) */
  handles?: PlatformHandles;
  logger?: Logger;
  fetch?: typeof fetch;
}

export interface Navigator {
  readonly config: Config;
  readonly paths: StoragePaths;
  readonly policy: SourcePolicy;
  readonly memory: SessionMemory;
  readonly ingestion: IngestService;

  /** Answer a question, remembering the exchange under `sessionId` */
  answer(query: string, sessionId?: string): Promise<string>;

  /** Fetch, store and index a URL; returns status text */
  ingestUrl(url: string, sessionId?: string): Promise<string>;

  /** Store and index uploaded bytes; returns status text */
  ingestFileBytes(filename: string, bytes: Uint8Array, sessionId?: string): Promise<string>;

  /** Forget a session's transcript and its most recent document */
  clearSession(sessionId: string): Promise<void>;
}

/**
 * Build a navigator.
 *
 * @example
 * ```typescript
 * const navigator = createNavigator({ logger: consoleLogger });
 * await navigator.ingestUrl('https://www.federalregister.gov/d/2022-05471', 'dm:42');
 * console.log(await navigator.answer('When was it signed?', 'dm:42'));
 * ```
 */
export function createNavigator(options: NavigatorOptions = {}): Navigator {
  const logger = options.logger ?? silentLogger;
  const env = loadEnv();
  const config = options.config ?? resolveRuntimeConfig(loadConfig(), env);
  const paths = getStoragePaths(config.storage.data_dir);
  const policy = createSourcePolicy(config.policy);

  const handles =
    options.handles ??
    createHttpHandles(config.platform, options.apiKey ?? env.PLATFORM_API_KEY, logger, options.fetch);

  const memory = new SessionMemory(
    paths.sessionsDir,
    { maxTurns: config.memory.max_turns, maxHistoryChars: config.memory.max_history_chars },
    logger
  );
  const recency = new RecencyCache();

  const ingestion = new IngestService({
    handles,
    memory,
    recency,
    paths,
    policy,
    logger,
    fetch: options.fetch,
  });

  const invoker = new AgentInvoker(
    () => handles.agent(),
    {
      maxRetries: config.agent.max_retries,
      backoffMs: config.agent.backoff_ms,
      isTransientError: policy.isTransientError,
    },
    logger
  );

  const pipeline = new AnswerPipeline({
    handles,
    invoker,
    memory,
    recency,
    policy,
    config,
    documentFolders: [paths.webDir, paths.uploadsDir],
    rescrape: (seedUrl) => ingestion.rescrape(seedUrl, config.backfill.max_pages),
    logger,
  });

  return {
    config,
    paths,
    policy,
    memory,
    ingestion,
    answer: (query, sessionId) => pipeline.answer(query, sessionId),
    ingestUrl: (url, sessionId) => ingestion.ingestUrl(url, sessionId),
    ingestFileBytes: (filename, bytes, sessionId) => ingestion.ingestFileBytes(filename, bytes, sessionId),
    clearSession: async (sessionId) => {
      recency.forget(sessionId);
      await memory.clear(sessionId);
    },
  };
}
