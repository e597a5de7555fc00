/**
 * Ingestion Service Tests
 *
 * In-process index fake, stubbed fetch, storage in a temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { IngestService } from '../service.js';
import { hashName } from '../acquisition.js';
import { RecencyCache } from '../recency.js';
import { getStoragePaths, type StoragePaths } from '../../config/paths.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import { SessionMemory } from '../../memory/session-store.js';
import { PlatformHandles } from '../../platform/handles.js';
import type { IndexClient, IndexDocument } from '../../platform/types.js';
import { createSourcePolicy } from '../../search/source-policy.js';
import { isRecord } from '../../utils/guards.js';

const NOW = 1_700_000_000_000;

describe('IngestService', () => {
  let root: string;
  let paths: StoragePaths;
  let memory: SessionMemory;
  let recency: RecencyCache;
  let documents: IndexDocument[];
  let fetchMock: Mock<typeof fetch>;
  let indexFactory: () => Promise<IndexClient>;

  function service(): IngestService {
    return new IngestService({
      handles: new PlatformHandles({
        index: indexFactory,
        agent: () => ({ run: async () => 'unused' }),
      }),
      memory,
      recency,
      paths,
      policy: createSourcePolicy(DEFAULT_CONFIG.policy),
      fetch: fetchMock,
      now: () => NOW,
    });
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'pnav-ingest-'));
    paths = getStoragePaths(root);
    memory = new SessionMemory(paths.sessionsDir);
    recency = new RecencyCache();
    documents = [];
    fetchMock = vi.fn<typeof fetch>();
    const index = {
      search: async () => [],
      addDocument: async (doc: IndexDocument) => {
        documents.push(doc);
      },
    };
    indexFactory = async () => index;
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  describe('ingestFileBytes', () => {
    it('stores, indexes and remembers an upload', async () => {
      const bytes = new TextEncoder().encode('Executive Order text');
      const stored = `${hashName('eo.txt', bytes)}-eo.txt`;

      const status = await service().ingestFileBytes('eo.txt', bytes, 'dm:1');

      expect(status).toBe(`Ingested ${stored} (20 bytes) from eo.txt.`);
      expect(documents).toHaveLength(1);
      expect(documents[0]?.metadata).toMatchObject({ filename: stored, source: 'eo.txt' });
      expect(recency.get('dm:1')).toEqual({
        path: path.join(paths.uploadsDir, stored),
        filename: stored,
        sourceHint: 'eo.txt',
      });
      const turns = await memory.load('dm:1');
      expect(turns.map((t) => [t.role, t.content])).toEqual([['system', `[ingested] ${stored} <- eo.txt`]]);
    });

    it('keeps every entry when uploads are ingested concurrently', async () => {
      const ingest = service();
      const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

      await Promise.all([
        ingest.ingestFileBytes('a.txt', encode('First order'), 'dm:1'),
        ingest.ingestFileBytes('b.txt', encode('Second order'), 'dm:2'),
      ]);

      const manifest: unknown = JSON.parse(fs.readFileSync(paths.manifestPath, 'utf-8'));
      expect(Object.keys(isRecord(manifest) ? manifest : {}).sort()).toEqual(
        [
          path.join(paths.uploadsDir, `${hashName('a.txt', encode('First order'))}-a.txt`),
          path.join(paths.uploadsDir, `${hashName('b.txt', encode('Second order'))}-b.txt`),
        ].sort()
      );
      expect(documents).toHaveLength(2);
    });

    it('refuses empty uploads', async () => {
      await expect(service().ingestFileBytes('eo.txt', new Uint8Array(), 'dm:1')).resolves.toBe(
        'Upload eo.txt is empty; nothing to ingest.'
      );
    });

    it('stores files without extractable text but does not index them', async () => {
      const bytes = new Uint8Array([37, 80, 68, 70]);
      const stored = `${hashName('eo.pdf', bytes)}-eo.pdf`;

      await expect(service().ingestFileBytes('eo.pdf', bytes)).resolves.toBe(
        `Saved ${stored}; it has no extractable text, so it was stored but not indexed.`
      );
      expect(documents).toEqual([]);
    });

    it('reports indexing failures after saving', async () => {
      indexFactory = async () => {
        throw new Error('index offline');
      };
      const bytes = new TextEncoder().encode('text');
      const stored = `${hashName('a.txt', bytes)}-a.txt`;

      await expect(service().ingestFileBytes('a.txt', bytes)).resolves.toBe(
        `Saved ${stored}, but indexing failed: index offline`
      );
      expect(fs.existsSync(path.join(paths.uploadsDir, stored))).toBe(true);
    });
  });

  describe('ingestUrl', () => {
    it('rejects anything but http(s)', async () => {
      await expect(service().ingestUrl('ftp://x.gov/a')).resolves.toBe('Not a valid http(s) URL: ftp://x.gov/a');
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('describes fetch failures', async () => {
      fetchMock.mockResolvedValueOnce(new Response('nope', { status: 404 }));

      await expect(service().ingestUrl('https://x.gov/a')).resolves.toBe(
        'Could not fetch https://x.gov/a: GET https://x.gov/a returned 404'
      );
    });

    it('indexes a fetched page under its URL', async () => {
      const url = 'https://www.whitehouse.gov/eo';
      fetchMock.mockResolvedValueOnce(new Response('<p>Order text</p>'));
      const stored = `external-${hashName(url)}.html`;

      await expect(service().ingestUrl(url, 'dm:1')).resolves.toBe(
        `Ingested ${stored} (17 bytes) from ${url}.`
      );
      expect(documents[0]).toMatchObject({ text: '<p>Order text</p>', metadata: { source: url } });
    });

    it('does not index an access wall', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<h1>Request Access</h1>'));
      const url = 'https://www.federalregister.gov/d/2022-05471';

      await expect(service().ingestUrl(url, 'dm:1')).resolves.toBe(
        `Saved blocked_1700000000.html, but ${url} returned an access wall instead of the document, so it was not indexed.`
      );
      expect(documents).toEqual([]);
      expect(recency.get('dm:1')).toBeUndefined();
    });
  });

  describe('ensureData', () => {
    it('creates the storage folders and seeds an empty web folder', async () => {
      fetchMock.mockImplementation(async () => new Response('<p>Seed</p>'));

      await service().ensureData('https://site.gov/', 1);

      for (const dir of [paths.sessionsDir, paths.uploadsDir, paths.webDir, paths.kaggleDir]) {
        expect(fs.existsSync(dir)).toBe(true);
      }
      expect(fs.readFileSync(path.join(paths.webDir, 'page_0.html'), 'utf-8')).toBe('<p>Seed</p>');
    });

    it('leaves a populated web folder alone', async () => {
      fs.mkdirSync(paths.webDir, { recursive: true });
      fs.writeFileSync(path.join(paths.webDir, 'existing.html'), '<p>x</p>', 'utf-8');

      await service().ensureData('https://site.gov/', 1);

      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('bootstrap', () => {
    it('indexes the kaggle and web folders', async () => {
      fs.mkdirSync(paths.kaggleDir, { recursive: true });
      fs.mkdirSync(paths.webDir, { recursive: true });
      fs.writeFileSync(path.join(paths.kaggleDir, 'orders.csv'), 'eo,date', 'utf-8');
      fs.writeFileSync(path.join(paths.webDir, 'page_0.html'), '<p>x</p>', 'utf-8');

      await expect(service().bootstrap()).resolves.toBe(2);
      expect(documents.map((d) => d.metadata['source'])).toEqual(['kaggle', 'web']);
    });
  });
});
