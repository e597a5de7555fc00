/**
 * Search Module
 *
 * Interpretation of index search responses and the source policy.
 */

export { resultsFromSearch } from './normalizer.js';
export { createSourcePolicy, BLOCKED_SCAN_CHARS } from './source-policy.js';
export type { RawResultEntry, SearchResult, SourcePolicy } from './types.js';
