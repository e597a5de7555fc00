/**
 * Context Backfill
 *
 * When retrieval comes back thin, try to enlarge the context:
 *
 * 1. re-search with the tail of the conversation appended to the query;
 * 2. if web backfill is enabled and a seed URL is set, re-scrape the
 *    seed site, re-index it and search the original query again.
 *
 * A stage replaces the context only when its context is strictly longer.
 * Stage failures are logged and never propagate.
 */

import { describeError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { BuiltContext } from './types.js';

export interface BackfillOptions {
  /** Contexts shorter than this are backfilled */
  minContextChars: number;

  /** Trailing history characters appended to the re-search query */
  historyHintChars: number;

  /** Re-scrape the seed site as a last resort */
  webEnabled: boolean;

  seedUrl?: string;
}

export interface BackfillDeps {
  /** Search and assemble a context for a query */
  search: (query: string) => Promise<BuiltContext>;

  /** Re-scrape the seed site and index what was fetched */
  rescrape?: (seedUrl: string) => Promise<void>;

  logger?: Logger;
}

/**
 * The longer of two contexts; ties keep the current one.
 */
export function preferLonger(current: BuiltContext, candidate: BuiltContext): BuiltContext {
  return candidate.context.length > current.context.length ? candidate : current;
}

/**
 * Query used for the history-hinted re-search.
 */
export function historyHintQuery(query: string, history: string, hintChars: number): string {
  const hint = hintChars > 0 ? history.slice(-hintChars) : '';
  return `${query}\n\nRelated conversation: ${hint}`;
}

/**
 * Backfill a thin context.
 *
 * @param current - Context from primary retrieval
 * @param query - The user's original query
 * @param history - Rendered conversation history ('' when none)
 */
export async function backfillContext(
  current: BuiltContext,
  query: string,
  history: string,
  deps: BackfillDeps,
  options: BackfillOptions
): Promise<BuiltContext> {
  const logger = deps.logger ?? silentLogger;
  let best = current;

  if (best.context.length >= options.minContextChars) {
    return best;
  }

  if (history) {
    try {
      const hinted = await deps.search(historyHintQuery(query, history, options.historyHintChars));
      best = preferLonger(best, hinted);
    } catch (error) {
      logger.warn(`History-hinted re-search failed: ${describeError(error)}`);
    }
  }

  if (best.context.length >= options.minContextChars) {
    return best;
  }

  const seedUrl = options.seedUrl;
  if (options.webEnabled && seedUrl && deps.rescrape) {
    try {
      logger.info?.(`Context still thin (${best.context.length} chars); re-scraping ${seedUrl}`);
      await deps.rescrape(seedUrl);
      const fresh = await deps.search(query);
      best = preferLonger(best, fresh);
    } catch (error) {
      logger.warn(`Web backfill failed: ${describeError(error)}`);
    }
  }

  return best;
}
