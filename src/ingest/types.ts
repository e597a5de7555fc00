/**
 * Ingestion Types
 */

import { z } from 'zod';

/**
 * Manifest record for one file, keyed by absolute path.
 * `mtime` is epoch seconds with a fractional part.
 */
export const ManifestEntrySchema = z.object({
  mtime: z.number(),
  size: z.number().optional(),
  skipped: z.boolean(),
});

export const ManifestSchema = z.record(z.string(), ManifestEntrySchema);

export type ManifestEntry = z.infer<typeof ManifestEntrySchema>;
export type ManifestData = z.infer<typeof ManifestSchema>;

/**
 * A stored file and what happened when it was offered to the index.
 */
export interface IngestedAsset {
  /** Absolute path of the stored copy */
  path: string;
  filename: string;
  /** URL or upload name it came from */
  sourceHint: string;
  /** Epoch seconds */
  mtime: number;
  sizeBytes: number;
  /** True when the file has no extractable text */
  skipped: boolean;
}

/**
 * Result of offering one file to the index.
 *
 * - indexed: text pushed to the index
 * - unchanged: manifest mtime matches, nothing to do
 * - skipped: no extractable text, recorded so it is not retried
 * - missing: file does not exist
 */
export type IndexOutcome = 'indexed' | 'unchanged' | 'skipped' | 'missing';

/**
 * File discovered in a storage folder.
 */
export interface StoredFile {
  path: string;
  filename: string;
  /** Epoch milliseconds */
  mtimeMs: number;
  size: number;
}

/**
 * Outcome of a seed-site crawl.
 */
export interface ScrapeResult {
  dir: string;
  /** Files written, in crawl order */
  pages: string[];
}
