/**
 * Answer Pipeline
 *
 * One user question in, one chat-ready answer out:
 *
 *   history → retrieval (recent document first) → backfill → inline block
 *     → agent → normalize → fallback → memory → sources
 *
 * Retrieval and memory are best-effort: their failures are logged and the
 * answer goes ahead without them. A hard agent failure becomes a
 * diagnostic answer rather than an exception.
 */

import type { Config } from '../config/schema.js';
import { describeError } from '../errors/index.js';
import type { RecencyCache } from '../ingest/recency.js';
import type { SessionMemory } from '../memory/session-store.js';
import type { PlatformHandles } from '../platform/handles.js';
import type { IndexClient } from '../platform/types.js';
import { resultsFromSearch } from '../search/normalizer.js';
import type { SourcePolicy } from '../search/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { backfillContext } from './backfill.js';
import { appendSources, publicSources, splitSources } from './citations.js';
import { buildContext, dedupe, emptyContext, joinPassages } from './context-builder.js';
import type { AgentInvoker } from './invoker.js';
import { composeAgentQuery } from './prompts.js';
import { findRecentDocument } from './recent-document.js';
import { formatOutput } from './response-normalizer.js';
import type { BuiltContext, RecentDocument } from './types.js';

/** Characters of context shown in a diagnostic answer */
export const DIAGNOSTIC_PREVIEW_CHARS = 800;

/** Sources listed in a diagnostic answer */
export const DIAGNOSTIC_MAX_SOURCES = 5;

export const NO_ANSWER_MESSAGE =
  "I couldn't find an answer to that in the indexed documents. " +
  'Try rephrasing the question, or ingest a document that covers it.';

export interface AnswerPipelineDeps {
  handles: PlatformHandles;
  invoker: AgentInvoker;
  memory: SessionMemory;
  recency: RecencyCache;
  policy: SourcePolicy;
  config: Config;
  /** Folders holding ingested documents (web, uploads) */
  documentFolders: readonly string[];
  /** Re-scrape and re-index the seed site; enables web backfill */
  rescrape?: (seedUrl: string) => Promise<void>;
  logger?: Logger;
}

/**
 * Answer shown when the agent could not be reached at all.
 */
export function diagnosticAnswer(query: string, built: BuiltContext, error: unknown): string {
  const sources = built.sources.slice(0, DIAGNOSTIC_MAX_SOURCES);
  const sourceLines = sources.length > 0 ? sources.map((s) => `- ${s}`).join('\n') : '(none)';
  const preview =
    built.context.length > DIAGNOSTIC_PREVIEW_CHARS
      ? `${built.context.slice(0, DIAGNOSTIC_PREVIEW_CHARS)}…`
      : built.context;

  return [
    'Agent call failed.',
    '',
    `Query: ${query}`,
    'Top sources:',
    sourceLines,
    '',
    'Context preview:',
    preview,
    '',
    `Error: ${describeError(error)}`,
  ].join('\n');
}

/**
 * Context led by a recently ingested document, followed by a few
 * ordinary results.
 */
export function recentFirstContext(
  recent: RecentDocument,
  search: BuiltContext,
  options: { excerptChars: number; secondaryResults: number; cap: number; policy: SourcePolicy }
): BuiltContext {
  const secondary = search.results.slice(0, options.secondaryResults);
  const excerpt = `Recently added document (${recent.filename}):\n${recent.text.slice(0, options.excerptChars)}`;
  const recentSource = options.policy.isPublicSource(recent.sourceHint) ? [recent.sourceHint] : [];

  return {
    context: joinPassages([excerpt, ...secondary.map((r) => r.text)], options.cap),
    sources: dedupe([
      ...recentSource,
      ...secondary.flatMap((result) => (result.source ? [result.source] : [])),
    ]),
    results: secondary,
  };
}

/**
 * Search results with a recent document's excerpt appended.
 */
export function recentAppendedContext(
  recent: RecentDocument,
  search: BuiltContext,
  options: { excerptChars: number; cap: number; policy: SourcePolicy }
): BuiltContext {
  const excerpt = `Recently added document (${recent.filename}):\n${recent.text.slice(0, options.excerptChars)}`;
  const recentSource = options.policy.isPublicSource(recent.sourceHint) ? [recent.sourceHint] : [];

  return {
    context: joinPassages([...search.results.map((r) => r.text), excerpt], options.cap),
    sources: dedupe([...search.sources, ...recentSource]),
    results: search.results,
  };
}

/**
 * The question-answering pipeline.
 *
 * @example
 * ```typescript
 * const pipeline = new AnswerPipeline({ handles, invoker, memory, recency, policy, config, documentFolders });
 * const reply = await pipeline.answer('When was EO 14067 signed?', 'dm:42');
 * ```
 */
export class AnswerPipeline {
  private readonly logger: Logger;

  constructor(private readonly deps: AnswerPipelineDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async answer(query: string, sessionId?: string): Promise<string> {
    const { config, memory, invoker, policy } = this.deps;

    const history = await this.history(sessionId);
    const index = await this.index();
    const built = await this.retrieve(query, sessionId, history, index);

    const agentQuery = composeAgentQuery(
      query,
      { history, context: built.context },
      config.retrieval.context_cap
    );

    let response: unknown;
    try {
      response = await invoker.invoke({ query: agentQuery, context: built.context, sessionId });
    } catch (error) {
      this.logger.warn(`Agent call failed: ${describeError(error)}`);
      return diagnosticAnswer(query, built, error);
    }

    let output = formatOutput(response);
    if (!output && config.agent.general_fallback) {
      this.logger.debug?.('Empty answer; asking again without context');
      try {
        output = formatOutput(await invoker.invoke({ query, sessionId }));
      } catch (error) {
        this.logger.warn(`General-answer fallback failed: ${describeError(error)}`);
      }
    }
    if (!output) {
      output = NO_ANSWER_MESSAGE;
    }

    const { body, sources: agentSources } = splitSources(output);

    if (sessionId) {
      try {
        await memory.addTurn(sessionId, 'user', query);
        await memory.addTurn(sessionId, 'assistant', body);
      } catch (error) {
        this.logger.warn(`Could not save conversation ${sessionId}: ${describeError(error)}`);
      }
    }

    return appendSources(body, publicSources([...built.sources, ...agentSources], policy));
  }

  private async history(sessionId: string | undefined): Promise<string> {
    try {
      return await this.deps.memory.buildHistoryText(sessionId, this.deps.config.memory.max_history_chars);
    } catch (error) {
      this.logger.warn(`Could not load history: ${describeError(error)}`);
      return '';
    }
  }

  private async index(): Promise<IndexClient | undefined> {
    try {
      return await this.deps.handles.index();
    } catch (error) {
      this.logger.warn(`Index unavailable; answering without retrieval: ${describeError(error)}`);
      return undefined;
    }
  }

  private async search(index: IndexClient | undefined, query: string): Promise<BuiltContext> {
    if (!index) {
      return emptyContext();
    }
    const raw = await index.search(query, this.deps.config.retrieval.top_k);
    return buildContext(resultsFromSearch(raw), {
      cap: this.deps.config.retrieval.context_cap,
      policy: this.deps.policy,
    });
  }

  private async recentDocument(sessionId: string | undefined): Promise<RecentDocument | undefined> {
    try {
      return await findRecentDocument(sessionId, {
        recency: this.deps.recency,
        loadTurns: (id) => this.deps.memory.load(id),
        folders: this.deps.documentFolders,
        policy: this.deps.policy,
        logger: this.logger,
      });
    } catch (error) {
      this.logger.warn(`Recent-document lookup failed: ${describeError(error)}`);
      return undefined;
    }
  }

  private async retrieve(
    query: string,
    sessionId: string | undefined,
    history: string,
    index: IndexClient | undefined
  ): Promise<BuiltContext> {
    const { retrieval, backfill } = this.deps.config;
    const policy = this.deps.policy;

    let built = emptyContext();
    try {
      built = await this.search(index, query);
    } catch (error) {
      this.logger.warn(`Search failed: ${describeError(error)}`);
    }

    if (policy.mentionsRecentDocument(query)) {
      const recent = await this.recentDocument(sessionId);
      if (recent) {
        built = recentFirstContext(recent, built, {
          excerptChars: retrieval.recent_excerpt_chars,
          secondaryResults: retrieval.secondary_results,
          cap: retrieval.context_cap,
          policy,
        });
      }
    } else {
      const recent = await this.recentDocument(sessionId);
      if (recent) {
        built = recentAppendedContext(recent, built, {
          excerptChars: retrieval.recent_excerpt_chars,
          cap: retrieval.context_cap,
          policy,
        });
      }
    }

    return backfillContext(
      built,
      query,
      history,
      {
        search: (q) => this.search(index, q),
        rescrape: this.deps.rescrape,
        logger: this.logger,
      },
      {
        minContextChars: retrieval.min_context_chars,
        historyHintChars: retrieval.history_hint_chars,
        webEnabled: backfill.web_enabled,
        seedUrl: backfill.seed_url,
      }
    );
  }
}
