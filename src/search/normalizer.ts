/**
 * Search Result Normalizer
 *
 * Turns whatever the index client returned for a search into an ordered
 * list of raw entries. Never throws.
 *
 * Accepted shapes:
 * - `null` / `undefined` → `[]`
 * - array → as-is
 * - mapping with `details`, `output` or `results` → the first non-empty one
 * - object with a nested `data` payload → the same keys under `data`
 * - anything else → one synthetic entry carrying the raw value as text
 */

import { isPresent, isRecord } from '../utils/guards.js';
import type { RawResultEntry } from './types.js';

/** Result-list fields, in priority order */
const RESULT_KEYS = ['details', 'output', 'results'] as const;

/**
 * Read the first non-empty result-list field of a mapping.
 *
 * Returns `undefined` when the mapping carries none of the fields,
 * `[]` when it carries them but all are empty.
 */
function pickResultList(mapping: Record<string, unknown>): RawResultEntry[] | undefined {
  let sawKey = false;

  for (const key of RESULT_KEYS) {
    if (!(key in mapping)) {
      continue;
    }
    sawKey = true;
    const value = mapping[key];
    if (isPresent(value)) {
      return Array.isArray(value) ? value : [value];
    }
  }

  return sawKey ? [] : undefined;
}

/**
 * Wrap an unrecognized value as a single entry so nothing is dropped.
 */
function wrapRaw(raw: unknown): RawResultEntry[] {
  if (typeof raw === 'string') {
    return raw.trim() ? [{ text: raw }] : [];
  }
  if (isRecord(raw)) {
    if (Object.keys(raw).length === 0) {
      return [];
    }
    try {
      return [{ text: JSON.stringify(raw) }];
    } catch {
      return [{ text: String(raw) }];
    }
  }
  return [{ text: String(raw) }];
}

/**
 * Normalize a raw index search response into an ordered entry list.
 *
 * @example
 * ```typescript
 * resultsFromSearch(null);                              // []
 * resultsFromSearch({ details: [{ data: 'EO 14067' }] }); // [{ data: 'EO 14067' }]
 * resultsFromSearch({ data: { results: ['a', 'b'] } });   // ['a', 'b']
 * ```
 */
export function resultsFromSearch(raw: unknown): RawResultEntry[] {
  if (raw === null || raw === undefined) {
    return [];
  }

  if (Array.isArray(raw)) {
    return raw;
  }

  if (!isRecord(raw)) {
    return wrapRaw(raw);
  }

  const direct = pickResultList(raw);
  if (direct !== undefined) {
    return direct;
  }

  const data = raw['data'];
  if (Array.isArray(data)) {
    return data;
  }
  if (isRecord(data)) {
    const nested = pickResultList(data);
    if (nested !== undefined) {
      return nested;
    }
    return wrapRaw(data);
  }
  if (typeof data === 'string') {
    return wrapRaw(data);
  }

  return wrapRaw(raw);
}
