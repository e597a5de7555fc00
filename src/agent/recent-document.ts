/**
 * Recent-Document Priority
 *
 * "What does the document I just added say?" should be answered from
 * that document, not from whatever ranks first in the index. The latest
 * ingested document is looked up, in order:
 *
 * 1. the in-process recency cache for the session;
 * 2. ingestion marker turns in the session history (newest first);
 * 3. stored files in the web and uploads folders, newest first.
 *
 * Candidates whose text is an access wall are discarded.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { describeError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { readableText } from '../ingest/extract.js';
import { parseIngestMarker, type RecencyCache } from '../ingest/recency.js';
import { filesNewestFirst } from '../ingest/scanner.js';
import type { Turn } from '../memory/types.js';
import type { SourcePolicy } from '../search/types.js';
import type { RecentAsset, RecentDocument } from './types.js';

export interface RecentDocumentDeps {
  recency: RecencyCache;
  /** Session transcript reader */
  loadTurns: (sessionId: string) => Promise<Turn[]>;
  /** Folders holding ingested files, searched for marker filenames and by mtime */
  folders: readonly string[];
  policy: SourcePolicy;
  logger?: Logger;
}

/**
 * Assets named by ingestion markers in a transcript, newest first.
 */
function assetsFromHistory(turns: readonly Turn[], folders: readonly string[]): RecentAsset[] {
  const assets: RecentAsset[] = [];

  for (let i = turns.length - 1; i >= 0; i--) {
    const turn = turns[i];
    if (!turn || turn.role !== 'system') {
      continue;
    }
    const marker = parseIngestMarker(turn.content);
    if (!marker) {
      continue;
    }
    for (const folder of folders) {
      const candidate = join(folder, marker.filename);
      if (existsSync(candidate)) {
        assets.push({ path: candidate, filename: marker.filename, sourceHint: marker.sourceHint });
        break;
      }
    }
  }

  return assets;
}

/**
 * Text of the most recently ingested document, or undefined.
 */
export async function findRecentDocument(
  sessionId: string | undefined,
  deps: RecentDocumentDeps
): Promise<RecentDocument | undefined> {
  const logger = deps.logger ?? silentLogger;
  const tried = new Set<string>();

  const load = async (asset: RecentAsset): Promise<RecentDocument | undefined> => {
    if (tried.has(asset.path)) {
      return undefined;
    }
    tried.add(asset.path);

    try {
      const text = (await readableText(asset.path))?.trim();
      if (!text) {
        return undefined;
      }
      if (deps.policy.isBlockedPage(text)) {
        logger.debug?.(`Ignoring access-wall page ${asset.filename}`);
        return undefined;
      }
      return { ...asset, text };
    } catch (error) {
      logger.warn(`Could not read recent document ${asset.path}: ${describeError(error)}`);
      return undefined;
    }
  };

  if (sessionId) {
    const cached = deps.recency.get(sessionId);
    if (cached) {
      const doc = await load(cached);
      if (doc) {
        return doc;
      }
    }

    try {
      for (const asset of assetsFromHistory(await deps.loadTurns(sessionId), deps.folders)) {
        const doc = await load(asset);
        if (doc) {
          return doc;
        }
      }
    } catch (error) {
      logger.warn(`Could not scan session history: ${describeError(error)}`);
    }
  }

  for (const file of await filesNewestFirst(deps.folders)) {
    const doc = await load({ path: file.path, filename: file.filename, sourceHint: '' });
    if (doc) {
      return doc;
    }
  }

  return undefined;
}
