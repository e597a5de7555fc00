/**
 * Search Module Types
 *
 * Shapes exchanged between the index client and the context assembler.
 */

/**
 * One entry of an index search response, before interpretation.
 *
 * The managed index returns strings, flat records or records with
 * `data`/`text`/`metadata` fields depending on the index type, so
 * entries stay opaque until the context assembler reads them.
 */
export type RawResultEntry = unknown;

/**
 * An interpreted search hit.
 */
export interface SearchResult {
  /** Passage text handed to the agent */
  text: string;

  /**
   * Citable reference for the passage. Only public references
   * (web URLs or allow-listed regulatory domains) are kept.
   */
  source?: string;
}

/**
 * Heuristics over source strings, page bodies, error messages and queries.
 *
 * Built from the `policy` config section by `createSourcePolicy()`.
 */
export interface SourcePolicy {
  /** A filesystem path, `file://` URL or storage-folder reference */
  isLocalPath(source: string): boolean;

  /** A reference that may be shown to users in a Sources section */
  isPublicSource(source: string): boolean;

  /** Page body is an access wall rather than content */
  isBlockedPage(text: string): boolean;

  /** Error message signals contention worth retrying */
  isTransientError(message: string): boolean;

  /** Query refers to "the document I just added" */
  mentionsRecentDocument(query: string): boolean;
}
