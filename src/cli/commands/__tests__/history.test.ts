/**
 * Tests for history and reset commands
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createHistoryCommand, formatTurn } from '../history.js';
import { createResetCommand } from '../reset.js';
import type { CommandContext } from '../../types.js';
import { createNavigator, type Navigator } from '../../../navigator.js';
import { PlatformHandles } from '../../../platform/handles.js';
import { KeywordIndex, ScriptedAgent, testConfig } from '../../../test-utils/index.js';

describe('history and reset', () => {
  let root: string;
  let navigator: Navigator;
  let mockContext: CommandContext;
  let logOutput: string[];
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  function run(args: string[]): Promise<Command> {
    const program = new Command();
    program.exitOverride();
    program.addCommand(createHistoryCommand(() => mockContext, () => navigator));
    program.addCommand(createResetCommand(() => mockContext, () => navigator));
    return program.parseAsync(['node', 'test', ...args]);
  }

  beforeEach(async () => {
    root = mkdtempSync(join(tmpdir(), 'pnav-history-'));
    logOutput = [];
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    navigator = createNavigator({
      config: testConfig(root),
      handles: new PlatformHandles({ index: () => new KeywordIndex(), agent: () => new ScriptedAgent(() => '') }),
    });

    await navigator.memory.addTurn('dm:9', 'user', 'Is EO 14067 in effect?');
    await navigator.memory.addTurn('dm:9', 'assistant', 'Yes.');

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    rmSync(root, { recursive: true, force: true });
  });

  describe('formatTurn', () => {
    it('shows the UTC time, role and content', () => {
      const line = formatTurn({ t: 1_700_000_000, role: 'user', content: 'hello' });

      expect(line).toContain('22:13:20');
      expect(line).toContain('user:');
      expect(line.endsWith(' hello')).toBe(true);
    });
  });

  describe('history', () => {
    it('prints one line per turn', async () => {
      await run(['history', '--session', 'dm:9']);

      expect(logOutput).toHaveLength(2);
      expect(logOutput[0]).toContain('Is EO 14067 in effect?');
      expect(logOutput[1]).toContain('Yes.');
    });

    it('reports an empty session', async () => {
      await run(['history', '--session', 'dm:404']);

      expect(logOutput).toEqual(['No conversation stored for dm:404']);
    });

    it('prints turns as JSON', async () => {
      mockContext.options.json = true;

      await run(['history', '-s', 'dm:9']);

      const output: unknown = JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]));
      expect(output).toMatchObject({
        session: 'dm:9',
        turns: [
          { role: 'user', content: 'Is EO 14067 in effect?' },
          { role: 'assistant', content: 'Yes.' },
        ],
      });
    });
  });

  describe('reset', () => {
    it('deletes the session transcript', async () => {
      const file = navigator.memory.pathFor('dm:9');
      expect(existsSync(file)).toBe(true);

      await run(['reset', '--session', 'dm:9']);

      expect(existsSync(file)).toBe(false);
      expect(await navigator.memory.load('dm:9')).toEqual([]);
      expect(logOutput[0]).toContain('dm:9');
    });
  });
});
