/**
 * Recent-Document Lookup Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { findRecentDocument, type RecentDocumentDeps } from '../recent-document.js';
import { RecencyCache, formatIngestMarker } from '../../ingest/recency.js';
import { createSourcePolicy } from '../../search/source-policy.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Turn } from '../../memory/types.js';

const policy = createSourcePolicy(DEFAULT_CONFIG.policy);

describe('findRecentDocument', () => {
  let root: string;
  let webDir: string;
  let uploadsDir: string;
  let recency: RecencyCache;
  let turns: Turn[];

  function write(dir: string, name: string, content: string, mtimeSeconds: number): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content, 'utf-8');
    fs.utimesSync(file, mtimeSeconds, mtimeSeconds);
    return file;
  }

  function deps(): RecentDocumentDeps {
    return {
      recency,
      loadTurns: async () => turns,
      folders: [webDir, uploadsDir],
      policy,
    };
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'pnav-recent-'));
    webDir = path.join(root, 'web');
    uploadsDir = path.join(root, 'uploads');
    fs.mkdirSync(webDir);
    fs.mkdirSync(uploadsDir);
    recency = new RecencyCache();
    turns = [];
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('uses the recency cache first', async () => {
    const file = write(uploadsDir, 'abc-eo.txt', 'Executive Order 14067 text', 1000);
    write(webDir, 'newer.html', '<p>Newer page</p>', 2000);
    recency.record('dm:1', { path: file, filename: 'abc-eo.txt', sourceHint: 'eo.txt' });

    const doc = await findRecentDocument('dm:1', deps());

    expect(doc).toEqual({
      path: file,
      filename: 'abc-eo.txt',
      sourceHint: 'eo.txt',
      text: 'Executive Order 14067 text',
    });
  });

  it('falls back to ingestion markers in the session history', async () => {
    write(webDir, 'older.html', '<p>Older page</p>', 1000);
    write(webDir, 'latest.html', '<p>Marked page</p>', 500);
    turns = [
      { t: 1, role: 'system', content: formatIngestMarker('older.html', 'https://a.gov/1') },
      { t: 2, role: 'user', content: 'thanks' },
      { t: 3, role: 'system', content: formatIngestMarker('latest.html', 'https://a.gov/2') },
    ];

    const doc = await findRecentDocument('dm:1', deps());

    expect(doc?.filename).toBe('latest.html');
    expect(doc?.sourceHint).toBe('https://a.gov/2');
    expect(doc?.text).toBe('Marked page');
  });

  it('skips access-wall pages', async () => {
    const blocked = write(webDir, 'blocked_1.html', '<h1>Request Access</h1>', 3000);
    write(uploadsDir, 'real.txt', 'Real content', 1000);
    recency.record('dm:1', { path: blocked, filename: 'blocked_1.html', sourceHint: 'https://a.gov' });

    const doc = await findRecentDocument('dm:1', deps());

    expect(doc?.filename).toBe('real.txt');
  });

  it('uses the newest stored file without a session', async () => {
    write(webDir, 'page_1.html', '<p>Old</p>', 1000);
    write(uploadsDir, 'fresh.md', '# Fresh', 2000);

    const doc = await findRecentDocument(undefined, deps());

    expect(doc).toMatchObject({ filename: 'fresh.md', sourceHint: '', text: '# Fresh' });
  });

  it('returns undefined when nothing is stored', async () => {
    await expect(findRecentDocument('dm:1', deps())).resolves.toBeUndefined();
  });
});
