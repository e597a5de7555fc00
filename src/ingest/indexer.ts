/**
 * Folder Indexer
 *
 * Offers stored files to the index, skipping files whose mtime matches
 * the manifest.
 */

import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { pushText } from '../platform/ingestion.js';
import { describeError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { extractText } from './extract.js';
import type { IndexManifest } from './manifest.js';
import { scanFolder } from './scanner.js';
import type { IndexOutcome } from './types.js';

export interface IndexFileOptions {
  manifest: IndexManifest;
  /** Recorded as `metadata.source` (default: 'local') */
  sourceHint?: string;
  logger?: Logger;
}

/**
 * Index one file if it changed since it was last offered.
 *
 * @throws IngestionError when the index rejects the document
 */
export async function addFileToIndex(
  index: object,
  filePath: string,
  options: IndexFileOptions
): Promise<IndexOutcome> {
  const logger = options.logger ?? silentLogger;
  const key = resolve(filePath);

  let mtime: number;
  let size: number;
  try {
    const stats = await stat(key);
    mtime = stats.mtimeMs / 1000;
    size = stats.size;
  } catch {
    return 'missing';
  }

  if (options.manifest.isUnchanged(key, mtime)) {
    return 'unchanged';
  }

  const text = await extractText(key).catch((error: unknown) => {
    logger.warn(`Read failed for ${key}: ${describeError(error)}`);
    return undefined;
  });

  if (!text) {
    logger.info?.(`Skip non-text or unreadable: ${key}`);
    options.manifest.record(key, { mtime, skipped: true });
    return 'skipped';
  }

  await pushText(
    index,
    text,
    {
      path: key,
      filename: basename(key),
      source: options.sourceHint || 'local',
    },
    logger
  );
  options.manifest.record(key, { mtime, size, skipped: false });
  logger.info?.(`Indexed file: ${key}`);
  return 'indexed';
}

/**
 * Index every changed file under a folder.
 *
 * Per-file failures are logged and do not stop the pass.
 *
 * @returns Number of files indexed
 */
export async function addFolderToIndex(
  index: object,
  folder: string,
  options: IndexFileOptions
): Promise<number> {
  const logger = options.logger ?? silentLogger;
  const files = await scanFolder(folder);
  let count = 0;

  for (const file of files) {
    try {
      if ((await addFileToIndex(index, file.path, options)) === 'indexed') {
        count++;
      }
    } catch (error) {
      logger.warn(`Ingest error for ${file.path}: ${describeError(error)}`);
    }
  }

  if (count > 0) {
    logger.info?.(`Ingested ${count} file(s) from: ${folder}`);
  }
  return count;
}
