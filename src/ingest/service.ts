/**
 * Ingestion Service
 *
 * User-facing ingestion: fetch or store a document, offer it to the
 * index, and remember it as the session's most recent document. Every
 * operation answers with status text; failures are described, not thrown.
 */

import { mkdir, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { describeError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { Mutex } from '../utils/mutex.js';
import type { StoragePaths } from '../config/paths.js';
import type { PlatformHandles } from '../platform/handles.js';
import type { SessionMemory } from '../memory/session-store.js';
import type { SourcePolicy } from '../search/types.js';
import { saveBytesToUploads, saveUrlToWeb, scrapeSite } from './acquisition.js';
import { addFileToIndex, addFolderToIndex } from './indexer.js';
import { IndexManifest } from './manifest.js';
import { formatIngestMarker, type RecencyCache } from './recency.js';
import { isFolderEmpty } from './scanner.js';
import type { IndexOutcome, IngestedAsset } from './types.js';

/** Pages crawled when seeding an empty web folder */
export const DEFAULT_SEED_PAGES = 3;

export interface IngestServiceDeps {
  handles: PlatformHandles;
  memory: SessionMemory;
  recency: RecencyCache;
  paths: StoragePaths;
  policy: SourcePolicy;
  logger?: Logger;
  fetch?: typeof fetch;
  /** Epoch milliseconds (default: Date.now) */
  now?: () => number;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

export class IngestService {
  private readonly logger: Logger;
  /** Held while files are offered to the index and recorded */
  private readonly indexLock = new Mutex();
  private loadedManifest: IndexManifest | undefined;

  constructor(private readonly deps: IngestServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Fetch a URL, store it under the web folder and index it.
   */
  async ingestUrl(url: string, sessionId?: string): Promise<string> {
    const target = url.trim();
    if (!isHttpUrl(target)) {
      return `Not a valid http(s) URL: ${target}`;
    }

    let saved: string;
    try {
      saved = await saveUrlToWeb(target, this.deps.paths.webDir, {
        policy: this.deps.policy,
        fetch: this.deps.fetch,
        logger: this.logger,
        now: this.deps.now,
      });
    } catch (error) {
      return `Could not fetch ${target}: ${describeError(error)}`;
    }

    const filename = basename(saved);
    if (filename.startsWith('blocked_')) {
      return `Saved ${filename}, but ${target} returned an access wall instead of the document, so it was not indexed.`;
    }

    return this.ingestStored(saved, target, sessionId);
  }

  /**
   * Store uploaded bytes under the uploads folder and index them.
   */
  async ingestFileBytes(filename: string, bytes: Uint8Array, sessionId?: string): Promise<string> {
    if (bytes.length === 0) {
      return `Upload ${filename} is empty; nothing to ingest.`;
    }

    let saved: string;
    try {
      saved = await saveBytesToUploads(filename, bytes, this.deps.paths.uploadsDir, this.logger);
    } catch (error) {
      return `Could not store ${filename}: ${describeError(error)}`;
    }

    return this.ingestStored(saved, basename(filename.replace(/\\/g, '/')), sessionId);
  }

  /**
   * Create the storage folders and seed the web folder when it is empty.
   *
   * @returns The data directory
   */
  async ensureData(seedUrl?: string, maxPages: number = DEFAULT_SEED_PAGES): Promise<string> {
    const { dataDir, kaggleDir, webDir, uploadsDir, sessionsDir } = this.deps.paths;
    for (const dir of [dataDir, kaggleDir, webDir, uploadsDir, sessionsDir]) {
      await mkdir(dir, { recursive: true });
    }

    if (seedUrl && (await isFolderEmpty(webDir))) {
      await scrapeSite(seedUrl, maxPages, webDir, { fetch: this.deps.fetch, logger: this.logger });
    }

    return dataDir;
  }

  /**
   * ensureData, then index the kaggle and web folders.
   */
  async bootstrap(seedUrl?: string, maxPages: number = DEFAULT_SEED_PAGES): Promise<number> {
    await this.ensureData(seedUrl, maxPages);
    const kaggle = await this.indexFolder(this.deps.paths.kaggleDir, 'kaggle');
    const web = await this.indexFolder(this.deps.paths.webDir, seedUrl ?? 'web');
    return kaggle + web;
  }

  /**
   * Re-crawl the seed site into the web folder and index what changed.
   */
  async rescrape(seedUrl: string, maxPages: number): Promise<void> {
    await scrapeSite(seedUrl, maxPages, this.deps.paths.webDir, {
      fetch: this.deps.fetch,
      logger: this.logger,
    });
    await this.indexFolder(this.deps.paths.webDir, seedUrl);
  }

  /**
   * Index every changed file in a folder.
   *
   * @returns Number of files indexed
   */
  async indexFolder(folder: string, sourceHint?: string): Promise<number> {
    const index = await this.deps.handles.index();
    return this.indexLock.runExclusive(() =>
      addFolderToIndex(index, folder, { manifest: this.manifest(), sourceHint, logger: this.logger })
    );
  }

  /**
   * The manifest, read once and shared by every ingestion of this service.
   */
  private manifest(): IndexManifest {
    if (!this.loadedManifest) {
      this.loadedManifest = IndexManifest.load(this.deps.paths.manifestPath, this.logger);
    }
    return this.loadedManifest;
  }

  /**
   * Index a stored file, then record it as the session's latest document.
   */
  private async ingestStored(savedPath: string, sourceHint: string, sessionId?: string): Promise<string> {
    const filename = basename(savedPath);

    let outcome: IndexOutcome | undefined;
    let failure: string | undefined;
    try {
      const index = await this.deps.handles.index();
      outcome = await this.indexLock.runExclusive(() =>
        addFileToIndex(index, savedPath, { manifest: this.manifest(), sourceHint, logger: this.logger })
      );
    } catch (error) {
      failure = describeError(error);
      this.logger.warn(`Indexing ${filename} failed: ${failure}`);
    }

    const asset = await this.describeAsset(savedPath, sourceHint, outcome === 'skipped');
    if (sessionId) {
      this.deps.recency.record(sessionId, {
        path: asset.path,
        filename: asset.filename,
        sourceHint: asset.sourceHint,
      });
      try {
        await this.deps.memory.addTurn(sessionId, 'system', formatIngestMarker(filename, sourceHint));
      } catch (error) {
        this.logger.warn(`Could not record ingestion in session ${sessionId}: ${describeError(error)}`);
      }
    }

    if (failure !== undefined) {
      return `Saved ${filename}, but indexing failed: ${failure}`;
    }
    switch (outcome) {
      case 'indexed':
        return `Ingested ${filename} (${asset.sizeBytes} bytes) from ${sourceHint}.`;
      case 'unchanged':
        return `${filename} is already in the index.`;
      case 'skipped':
        return `Saved ${filename}; it has no extractable text, so it was stored but not indexed.`;
      default:
        return `Could not find ${filename} after saving it.`;
    }
  }

  private async describeAsset(path: string, sourceHint: string, skipped: boolean): Promise<IngestedAsset> {
    const stats = await stat(path).catch(() => undefined);
    return {
      path,
      filename: basename(path),
      sourceHint,
      mtime: stats ? stats.mtimeMs / 1000 : 0,
      sizeBytes: stats?.size ?? 0,
      skipped,
    };
  }
}
