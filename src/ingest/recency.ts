/**
 * Ingestion Recency
 *
 * Tracks the latest document each session ingested, in memory and as a
 * system marker turn in the session transcript:
 *
 *   [ingested] 3f9a0c1d2e4b5a6f-eo14067.pdf <- https://www.federalregister.gov/d/2022-05471
 */

import type { RecentAsset } from '../agent/types.js';

export const INGEST_MARKER_PREFIX = '[ingested]';

const MARKER_PATTERN = /^\[ingested\]\s+(.+?)\s+<-\s+(.*)$/s;

/**
 * Marker turn content for an ingested file.
 */
export function formatIngestMarker(filename: string, sourceHint: string): string {
  return `${INGEST_MARKER_PREFIX} ${filename} <- ${sourceHint}`;
}

/**
 * Parse marker turn content; undefined for ordinary turns.
 */
export function parseIngestMarker(content: string): { filename: string; sourceHint: string } | undefined {
  const match = MARKER_PATTERN.exec(content.trim());
  if (!match?.[1]) {
    return undefined;
  }
  return { filename: match[1], sourceHint: (match[2] ?? '').trim() };
}

/**
 * Latest ingested asset per session, for this process only.
 */
export class RecencyCache {
  private readonly latest = new Map<string, RecentAsset>();

  record(sessionId: string, asset: RecentAsset): void {
    this.latest.set(sessionId, asset);
  }

  get(sessionId: string): RecentAsset | undefined {
    return this.latest.get(sessionId);
  }

  forget(sessionId: string): void {
    this.latest.delete(sessionId);
  }
}
