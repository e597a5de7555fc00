/**
 * Startup Validation Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { validateStartupConfig } from '../startup-validation.js';
import { DEFAULT_CONFIG } from '../defaults.js';
import { _clearEnvCache } from '../env.js';
import type { Config } from '../schema.js';

const configured: Config = {
  ...DEFAULT_CONFIG,
  platform: { ...DEFAULT_CONFIG.platform, agent_id: 'agent-1', index_id: 'index-1' },
};

describe('validateStartupConfig', () => {
  beforeEach(() => {
    _clearEnvCache();
    vi.stubEnv('PLATFORM_API_KEY', 'test-secret');
  });

  afterEach(() => {
    _clearEnvCache();
    vi.unstubAllEnvs();
  });

  it('passes when key, agent and index are present', () => {
    const result = validateStartupConfig(configured, 'ask');

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  it('reports a missing API key', () => {
    vi.stubEnv('PLATFORM_API_KEY', '');
    _clearEnvCache();

    const result = validateStartupConfig(configured, 'ask');

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['PLATFORM_API_KEY is not set']);
    expect(result.hints).toHaveLength(1);
  });

  it('requires an agent only for ask', () => {
    const noAgent: Config = {
      ...configured,
      platform: { ...configured.platform, agent_id: undefined },
    };

    expect(validateStartupConfig(noAgent, 'ask').valid).toBe(false);
    expect(validateStartupConfig(noAgent, 'ingest').valid).toBe(true);
  });

  it('warns when no index is configured', () => {
    const noIndex: Config = {
      ...configured,
      platform: { ...configured.platform, index_id: undefined },
    };

    const result = validateStartupConfig(noIndex, 'ask');

    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(1);
  });

  it('skips local-only commands', () => {
    vi.stubEnv('PLATFORM_API_KEY', '');
    _clearEnvCache();

    expect(validateStartupConfig(DEFAULT_CONFIG, 'history').valid).toBe(true);
  });
});
