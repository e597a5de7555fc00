/**
 * Platform Handles Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { PlatformHandles, createHttpHandles } from '../handles.js';
import { HttpIndexClient } from '../http-client.js';
import { APIKeyError, ConfigError } from '../../errors/index.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { IndexClient } from '../types.js';

describe('PlatformHandles', () => {
  it('constructs each client once for concurrent callers', async () => {
    const fakeIndex: IndexClient = { search: async () => [] };
    const indexFactory = vi.fn(async () => fakeIndex);
    const handles = new PlatformHandles({
      index: indexFactory,
      agent: () => ({ run: async () => 'ok' }),
    });

    const [a, b] = await Promise.all([handles.index(), handles.index()]);

    expect(a).toBe(fakeIndex);
    expect(b).toBe(fakeIndex);
    expect(indexFactory).toHaveBeenCalledTimes(1);
  });
});

describe('createHttpHandles', () => {
  const platform = { ...DEFAULT_CONFIG.platform, index_id: 'idx-1', agent_id: 'agent-1' };

  it('builds HTTP clients from config', async () => {
    const handles = createHttpHandles(platform, 'test-secret');

    const index = await handles.index();

    expect(index).toBeInstanceOf(HttpIndexClient);
    expect(index).toMatchObject({ indexId: 'idx-1' });
  });

  it('rejects without an API key', async () => {
    const handles = createHttpHandles(platform, undefined);

    await expect(handles.agent()).rejects.toBeInstanceOf(APIKeyError);
  });

  it('rejects without an index id', async () => {
    const handles = createHttpHandles({ ...platform, index_id: undefined }, 'test-secret');

    await expect(handles.index()).rejects.toBeInstanceOf(ConfigError);
  });
});
