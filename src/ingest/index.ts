/**
 * Ingest Module
 *
 * Acquisition, text extraction, manifest-aware indexing and the
 * user-facing ingestion service.
 */

export { IngestService, DEFAULT_SEED_PAGES } from './service.js';
export type { IngestServiceDeps } from './service.js';
export {
  saveUrlToWeb,
  saveBytesToUploads,
  scrapeSite,
  findGovinfoPdfUrl,
  extractLinks,
  hashName,
  USER_AGENT,
} from './acquisition.js';
export { addFileToIndex, addFolderToIndex } from './indexer.js';
export { IndexManifest } from './manifest.js';
export { scanFolder, filesNewestFirst, isFolderEmpty } from './scanner.js';
export { extractText, readableText, htmlToText, TEXT_EXTENSIONS } from './extract.js';
export { RecencyCache, formatIngestMarker, parseIngestMarker, INGEST_MARKER_PREFIX } from './recency.js';
export type { IngestedAsset, IndexOutcome, ManifestEntry, StoredFile, ScrapeResult } from './types.js';
