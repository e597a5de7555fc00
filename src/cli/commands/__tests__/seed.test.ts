/**
 * Tests for seed command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createSeedCommand } from '../seed.js';
import type { CommandContext } from '../../types.js';
import { createNavigator, type Navigator } from '../../../navigator.js';
import { PlatformHandles } from '../../../platform/handles.js';
import { KeywordIndex, ScriptedAgent, testConfig } from '../../../test-utils/index.js';

const spinner = vi.hoisted(() => {
  const instance = { start: vi.fn(), stop: vi.fn(), fail: vi.fn(), succeed: vi.fn() };
  instance.start.mockReturnValue(instance);
  return instance;
});

vi.mock('ora', () => ({ default: vi.fn(() => spinner) }));

describe('createSeedCommand', () => {
  let root: string;
  let index: KeywordIndex;
  let navigator: Navigator;
  let mockContext: CommandContext;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function run(args: string[]): Promise<Command> {
    const program = new Command();
    program.exitOverride();
    // Settings are not inherited by an added command
    const seed = createSeedCommand(() => mockContext, () => navigator)
      .exitOverride()
      .configureOutput({ writeErr: () => {} });
    program.addCommand(seed);
    return program.parseAsync(['node', 'test', 'seed', ...args]);
  }

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'pnav-seed-'));
    index = new KeywordIndex();
    mockContext = {
      options: { verbose: false, json: false },
      log: vi.fn(),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    navigator = createNavigator({
      config: testConfig(root),
      handles: new PlatformHandles({ index: () => index, agent: () => new ScriptedAgent(() => '') }),
    });
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
    rmSync(root, { recursive: true, force: true });
  });

  it('rejects a non-numeric page count', async () => {
    await expect(run(['--pages', 'many'])).rejects.toThrow('Must be a positive integer.');
  });

  it('creates the data folders and indexes existing web pages', async () => {
    mkdirSync(navigator.paths.webDir, { recursive: true });
    writeFileSync(join(navigator.paths.webDir, 'eo-14067.txt'), 'Executive Order 14067');

    await run([]);

    expect(existsSync(navigator.paths.uploadsDir)).toBe(true);
    expect(existsSync(navigator.paths.sessionsDir)).toBe(true);
    expect(index.documents).toHaveLength(1);
    expect(spinner.succeed).toHaveBeenCalledWith(`Indexed 1 file under ${navigator.paths.dataDir}`);
  });

  it('skips files indexed on an earlier run', async () => {
    mkdirSync(navigator.paths.webDir, { recursive: true });
    writeFileSync(join(navigator.paths.webDir, 'eo-14067.txt'), 'Executive Order 14067');

    await run([]);
    mockContext.options.json = true;
    await run([]);

    const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
    expect(output).toEqual({ dataDir: navigator.paths.dataDir, seedUrl: null, indexed: 0 });
    expect(index.documents).toHaveLength(1);
  });
});
