/**
 * Context Backfill Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { backfillContext, historyHintQuery, preferLonger, type BackfillOptions } from '../backfill.js';
import type { BuiltContext } from '../types.js';

function contextOf(length: number, label = 'x'): BuiltContext {
  return { context: label.repeat(length), sources: [], results: [] };
}

const options: BackfillOptions = {
  minContextChars: 600,
  historyHintChars: 10,
  webEnabled: false,
};

describe('preferLonger', () => {
  it('keeps the 700-character context over the 500-character one', () => {
    const short = contextOf(500);
    const long = contextOf(700);

    expect(preferLonger(short, long)).toBe(long);
    expect(preferLonger(long, short)).toBe(long);
  });

  it('keeps the current context on a tie', () => {
    const current = contextOf(500, 'a');
    const candidate = contextOf(500, 'b');

    expect(preferLonger(current, candidate)).toBe(current);
  });
});

describe('historyHintQuery', () => {
  it('appends the tail of the history', () => {
    expect(historyHintQuery('q', 'User: hello world', 5)).toBe('q\n\nRelated conversation: world');
  });
});

describe('backfillContext', () => {
  it('leaves a long enough context alone', async () => {
    const search = vi.fn(async (_q: string) => contextOf(900));
    const current = contextOf(600);

    await expect(backfillContext(current, 'q', 'history', { search }, options)).resolves.toBe(current);
    expect(search).not.toHaveBeenCalled();
  });

  it('replaces a thin context with a longer history-hinted one', async () => {
    const search = vi.fn(async (_q: string) => contextOf(700));

    const result = await backfillContext(contextOf(500), 'q', 'User: earlier question', { search }, options);

    expect(result.context).toHaveLength(700);
    expect(search).toHaveBeenCalledWith('q\n\nRelated conversation: r question');
  });

  it('keeps the original when the re-search is shorter', async () => {
    const current = contextOf(500);
    const search = vi.fn(async (_q: string) => contextOf(300));

    await expect(backfillContext(current, 'q', 'User: hi', { search }, options)).resolves.toBe(current);
  });

  it('skips the hinted stage without history', async () => {
    const search = vi.fn(async (_q: string) => contextOf(700));

    await backfillContext(contextOf(100), 'q', '', { search }, options);

    expect(search).not.toHaveBeenCalled();
  });

  it('re-scrapes the seed site when enabled and still thin', async () => {
    const search = vi.fn(async (q: string) => (q === 'q' ? contextOf(800) : contextOf(200)));
    const rescrape = vi.fn(async (_seed: string) => {});

    const result = await backfillContext(
      contextOf(100),
      'q',
      'User: hi',
      { search, rescrape },
      { ...options, webEnabled: true, seedUrl: 'https://www.federalregister.gov/' }
    );

    expect(rescrape).toHaveBeenCalledWith('https://www.federalregister.gov/');
    expect(result.context).toHaveLength(800);
  });

  it('logs and swallows stage failures', async () => {
    const warn = vi.fn();
    const current = contextOf(100);
    const search = vi.fn(async (_q: string): Promise<BuiltContext> => {
      throw new Error('index offline');
    });

    const result = await backfillContext(current, 'q', 'User: hi', { search, logger: { warn } }, options);

    expect(result).toBe(current);
    expect(warn).toHaveBeenCalledWith('History-hinted re-search failed: index offline');
  });
});
