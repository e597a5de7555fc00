/**
 * Source Policy
 *
 * Pattern tables deciding which source strings may be cited, which page
 * bodies are access walls, which errors are transient and which queries
 * refer to a just-ingested document. All tables come from the `policy`
 * config section.
 */

import type { PolicyConfig } from '../config/schema.js';
import type { SourcePolicy } from './types.js';

/** Characters of a page body inspected for blocked-page markers */
export const BLOCKED_SCAN_CHARS = 20000;

/** `C:\...` or `c:/...` */
const DRIVE_LETTER = /^[a-z]:[\\/]/i;

function lowerAll(values: readonly string[]): string[] {
  return values.map((value) => value.toLowerCase()).filter((value) => value.length > 0);
}

/**
 * Build a source policy from config tables.
 *
 * Matching is case-insensitive substring search throughout.
 *
 * @example
 * ```typescript
 * const policy = createSourcePolicy(config.policy);
 * policy.isPublicSource('https://www.federalregister.gov/d/2022-05471'); // true
 * policy.isPublicSource('C:\\data\\uploads\\eo.html');                 // false
 * ```
 */
export function createSourcePolicy(config: PolicyConfig): SourcePolicy {
  const publicDomains = lowerAll(config.public_domains);
  const localMarkers = lowerAll(config.local_path_markers);
  const blockedMarkers = lowerAll(config.blocked_markers);
  const recentPhrases = lowerAll(config.recent_document_phrases);
  const transientPatterns = lowerAll(config.transient_error_patterns);

  const isLocalPath = (source: string): boolean => {
    const trimmed = source.trim();
    if (DRIVE_LETTER.test(trimmed) || trimmed.startsWith('/') || trimmed.startsWith('\\')) {
      return true;
    }
    const lower = trimmed.toLowerCase();
    return localMarkers.some((marker) => lower.includes(marker));
  };

  return {
    isLocalPath,

    isPublicSource(source: string): boolean {
      const lower = source.trim().toLowerCase();
      if (!lower || isLocalPath(source)) {
        return false;
      }
      return lower.startsWith('http') || publicDomains.some((domain) => lower.includes(domain));
    },

    isBlockedPage(text: string): boolean {
      const snippet = text.slice(0, BLOCKED_SCAN_CHARS).toLowerCase();
      return blockedMarkers.some((marker) => snippet.includes(marker));
    },

    isTransientError(message: string): boolean {
      const lower = message.toLowerCase();
      return transientPatterns.some((pattern) => lower.includes(pattern));
    },

    mentionsRecentDocument(query: string): boolean {
      const lower = query.toLowerCase();
      return recentPhrases.some((phrase) => lower.includes(phrase));
    },
  };
}
