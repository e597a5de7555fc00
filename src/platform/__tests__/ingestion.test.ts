/**
 * Index Ingestion Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { pushText } from '../ingestion.js';
import { IngestionError } from '../../errors/index.js';

const META = { filename: 'eo.txt', source: 'upload' };

describe('pushText', () => {
  it('uses addDocument with a single document', async () => {
    class Index {
      received: unknown[] = [];
      async addDocument(doc: unknown): Promise<string> {
        this.received.push(doc);
        return 'stored';
      }
    }
    const index = new Index();

    const result = await pushText(index, 'body', META);

    expect(result).toBe('stored');
    expect(index.received).toEqual([{ text: 'body', metadata: META }]);
  });

  it('prefers earlier conventions', async () => {
    const index = { upsert: vi.fn(), addDocuments: vi.fn() };

    await pushText(index, 'body', META);

    expect(index.upsert).toHaveBeenCalledTimes(1);
    expect(index.addDocuments).not.toHaveBeenCalled();
  });

  it('wraps the document in an array for batch methods', async () => {
    const index = { upsertMany: vi.fn() };

    await pushText(index, 'body', META);

    expect(index.upsertMany).toHaveBeenCalledWith([{ text: 'body', metadata: META }]);
  });

  it('retries a TypeError with positional arguments', async () => {
    const add = vi.fn((...args: unknown[]) => {
      if (args.length === 1) {
        throw new TypeError('expected (text, metadata)');
      }
      return 'positional';
    });

    const result = await pushText({ add }, 'body', META);

    expect(result).toBe('positional');
    expect(add).toHaveBeenLastCalledWith('body', META);
  });

  it('moves to the next method after a failure', async () => {
    const index = {
      addDocument: vi.fn(() => {
        throw new Error('read-only index');
      }),
      addDocuments: vi.fn(() => 'ok'),
    };

    expect(await pushText(index, 'body', META)).toBe('ok');
  });

  it('throws when the client has no ingestion method', async () => {
    await expect(pushText({ search: vi.fn() }, 'body', META)).rejects.toThrow(
      'Index client has no known ingestion method for plain text'
    );
  });

  it('reports the last failure when every method rejects', async () => {
    const index = {
      upsert: vi.fn(() => {
        throw new Error('quota exceeded');
      }),
    };

    const error = await pushText(index, 'body', META).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IngestionError);
    expect(error).toMatchObject({ message: 'Index ingestion failed: quota exceeded' });
  });
});
