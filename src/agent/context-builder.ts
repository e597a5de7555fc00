/**
 * Context Builder
 *
 * Reads text and a candidate source out of each raw search entry, joins
 * the passages into one capped context string and keeps only the sources
 * that may be shown to users.
 */

import { isNonEmptyString, isPresent, isRecord } from '../utils/guards.js';
import type { RawResultEntry, SearchResult } from '../search/types.js';
import type { BuiltContext, ContextOptions } from './types.js';

/** Separator between passages */
export const PASSAGE_SEPARATOR = '\n\n---\n\n';

/** Entry fields holding passage text, in priority order */
export const TEXT_FIELDS = ['data', 'text', 'content', 'document'] as const;

/** Metadata fields naming where a passage came from, in priority order */
export const SOURCE_FIELDS = ['url', 'path', 'source', 'filename', 'dataset'] as const;

/** Top-level entry fields checked when metadata names no source */
const TOP_LEVEL_SOURCE_FIELDS = ['url', 'source'] as const;

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Hard character cut. Never rounds to a word or passage boundary.
 */
export function truncate(text: string, cap: number): string {
  return text.length > cap ? text.slice(0, Math.max(0, cap)) : text;
}

/**
 * Remove duplicates, keeping first-seen order.
 */
export function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}

/**
 * Passage text of a raw entry; `''` when it has none.
 */
export function entryText(entry: RawResultEntry): string {
  if (typeof entry === 'string') {
    return entry;
  }
  if (!isRecord(entry)) {
    return '';
  }
  for (const field of TEXT_FIELDS) {
    const value = entry[field];
    if (isPresent(value)) {
      return stringify(value);
    }
  }
  return '';
}

/**
 * Candidate source of a raw entry, before policy filtering.
 */
export function entrySource(entry: RawResultEntry): string | undefined {
  if (!isRecord(entry)) {
    return undefined;
  }

  const metadata = entry['metadata'];
  if (isRecord(metadata)) {
    for (const field of SOURCE_FIELDS) {
      const value = metadata[field];
      if (isNonEmptyString(value)) {
        return value.trim();
      }
    }
  }

  for (const field of TOP_LEVEL_SOURCE_FIELDS) {
    const value = entry[field];
    if (isNonEmptyString(value)) {
      return value.trim();
    }
  }

  return undefined;
}

/**
 * Join passages with the separator and cut to the cap.
 */
export function joinPassages(texts: readonly string[], cap: number): string {
  const joined = texts
    .filter((text) => text.length > 0)
    .join(PASSAGE_SEPARATOR)
    .trim();
  return truncate(joined, cap);
}

/**
 * Build the agent context from raw search entries.
 *
 * @example
 * ```typescript
 * const { context, sources } = buildContext(resultsFromSearch(raw), {
 *   cap: 2500,
 *   policy: createSourcePolicy(config.policy),
 * });
 * ```
 */
export function buildContext(entries: readonly RawResultEntry[], options: ContextOptions): BuiltContext {
  const results: SearchResult[] = [];
  const sources: string[] = [];

  for (const entry of entries) {
    const text = entryText(entry);
    const candidate = entrySource(entry);
    const source =
      candidate !== undefined && options.policy.isPublicSource(candidate) ? candidate : undefined;

    if (text) {
      results.push(source ? { text, source } : { text });
    }
    if (source) {
      sources.push(source);
    }
  }

  return {
    context: joinPassages(
      results.map((result) => result.text),
      options.cap
    ),
    sources: dedupe(sources),
    results,
  };
}

/**
 * An empty context.
 */
export function emptyContext(): BuiltContext {
  return { context: '', sources: [], results: [] };
}
