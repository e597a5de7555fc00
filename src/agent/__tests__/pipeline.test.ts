/**
 * Answer Pipeline Tests
 *
 * Runs the whole pipeline against in-process index and agent fakes and
 * a session store in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { AnswerPipeline, NO_ANSWER_MESSAGE, diagnosticAnswer } from '../pipeline.js';
import { AgentInvoker } from '../invoker.js';
import { PASSAGE_SEPARATOR } from '../context-builder.js';
import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { Config } from '../../config/schema.js';
import { PlatformError } from '../../errors/index.js';
import { RecencyCache } from '../../ingest/recency.js';
import { SessionMemory } from '../../memory/session-store.js';
import { PlatformHandles } from '../../platform/handles.js';
import type { AgentInput, IndexClient } from '../../platform/types.js';
import { createSourcePolicy } from '../../search/source-policy.js';
import { isRecord } from '../../utils/guards.js';

const FR_URL = 'https://www.federalregister.gov/d/2022-05471';

const SEARCH_RESPONSE = {
  details: [
    { text: 'EO 14067 was signed on March 9, 2022.', metadata: { url: FR_URL } },
    { text: 'Local copy of the order.', metadata: { path: 'C:\\data\\uploads\\eo.html' } },
  ],
};

describe('AnswerPipeline', () => {
  let root: string;
  let config: Config;
  let memory: SessionMemory;
  let recency: RecencyCache;
  let searchResponse: unknown;
  let run: Mock<(input: AgentInput) => Promise<unknown>>;
  let indexFactory: () => Promise<IndexClient>;
  const warn = vi.fn();

  function pipeline(): AnswerPipeline {
    const handles = new PlatformHandles({
      index: indexFactory,
      agent: () => ({ run }),
    });
    return new AnswerPipeline({
      handles,
      invoker: new AgentInvoker(() => handles.agent(), { sleep: async () => {} }),
      memory,
      recency,
      policy: createSourcePolicy(config.policy),
      config,
      documentFolders: [path.join(root, 'web'), path.join(root, 'uploads')],
      logger: { warn },
    });
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'pnav-pipeline-'));
    fs.mkdirSync(path.join(root, 'web'));
    fs.mkdirSync(path.join(root, 'uploads'));
    config = structuredClone(DEFAULT_CONFIG);
    memory = new SessionMemory(path.join(root, 'sessions'));
    recency = new RecencyCache();
    searchResponse = SEARCH_RESPONSE;
    indexFactory = async () => ({ search: async () => searchResponse });
    run = vi.fn(async (_input: AgentInput): Promise<unknown> => ({
      data: { output: 'EO 14067 was signed on March 9, 2022.' },
    }));
    warn.mockClear();
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('answers with public sources and remembers the exchange', async () => {
    const reply = await pipeline().answer('When was EO 14067 signed?', 'dm:1');

    expect(reply).toBe(`EO 14067 was signed on March 9, 2022.\n\n**Sources**\n- ${FR_URL}`);

    const turns = await memory.load('dm:1');
    expect(turns.map((t) => [t.role, t.content])).toEqual([
      ['user', 'When was EO 14067 signed?'],
      ['assistant', 'EO 14067 was signed on March 9, 2022.'],
    ]);
  });

  it('sends the composed query, context and session to the agent', async () => {
    await pipeline().answer('When was EO 14067 signed?', 'dm:1');

    const input = run.mock.calls[0]?.[0];
    expect(input).toMatchObject({
      sessionId: 'dm:1',
      context: `EO 14067 was signed on March 9, 2022.${PASSAGE_SEPARATOR}Local copy of the order.`,
    });
    expect(isRecord(input) && String(input['query']).endsWith('\n\nWhen was EO 14067 signed?')).toBe(true);
  });

  it('never lists a local path in Sources', async () => {
    run.mockResolvedValue({
      output: 'Answer.\n\n**Sources**\n- C:\\data\\uploads\\eo.html\n- https://www.govinfo.gov/app/details/x',
    });

    const reply = await pipeline().answer('When was EO 14067 signed?');

    expect(reply).toBe(`Answer.\n\n**Sources**\n- ${FR_URL}\n- https://www.govinfo.gov/app/details/x`);
  });

  it('returns a diagnostic when the agent fails hard', async () => {
    run.mockRejectedValue(new PlatformError('POST /run returned 500: boom', 500));

    const reply = await pipeline().answer('When was EO 14067 signed?', 'dm:1');

    expect(reply).toBe(
      [
        'Agent call failed.',
        '',
        'Query: When was EO 14067 signed?',
        'Top sources:',
        `- ${FR_URL}`,
        '',
        'Context preview:',
        `EO 14067 was signed on March 9, 2022.${PASSAGE_SEPARATOR}Local copy of the order.`,
        '',
        'Error: Agent call failed: POST /run returned 500: boom',
      ].join('\n')
    );
    expect(await memory.load('dm:1')).toEqual([]);
  });

  it('falls back to a general answer when the first answer is empty', async () => {
    searchResponse = null;
    run.mockImplementation(async (input: AgentInput) =>
      isRecord(input) && input['query'] === 'What is GDPR?' ? { output: 'General answer' } : { output: '' }
    );

    await expect(pipeline().answer('What is GDPR?')).resolves.toBe('General answer');
  });

  it('says so politely when no answer is found', async () => {
    config.agent.general_fallback = false;
    run.mockResolvedValue({ output: '' });

    await expect(pipeline().answer('Unanswerable?')).resolves.toBe(
      `${NO_ANSWER_MESSAGE}\n\n**Sources**\n- ${FR_URL}`
    );
  });

  it('answers without retrieval when the index is unavailable', async () => {
    indexFactory = async () => {
      throw new Error('index offline');
    };

    await expect(pipeline().answer('When was EO 14067 signed?')).resolves.toBe(
      'EO 14067 was signed on March 9, 2022.'
    );
    expect(warn).toHaveBeenCalledWith('Index unavailable; answering without retrieval: index offline');
  });

  it('puts a just-ingested document ahead of search results', async () => {
    const file = path.join(root, 'uploads', 'abc-eo.txt');
    fs.writeFileSync(file, 'Full text of the uploaded order.', 'utf-8');
    recency.record('dm:1', { path: file, filename: 'abc-eo.txt', sourceHint: 'https://www.whitehouse.gov/eo' });

    const reply = await pipeline().answer('Summarize the document I just added', 'dm:1');

    const input = run.mock.calls[0]?.[0];
    const context = isRecord(input) ? String(input['context']) : '';
    expect(context.startsWith('Recently added document (abc-eo.txt):\nFull text of the uploaded order.')).toBe(true);
    expect(reply.endsWith(`**Sources**\n- https://www.whitehouse.gov/eo\n- ${FR_URL}`)).toBe(true);
  });

  it('appends the latest ingested document after search results', async () => {
    const file = path.join(root, 'uploads', 'memo.txt');
    fs.writeFileSync(file, 'RECENT-MEMO-CONTENT', 'utf-8');
    recency.record('s1', { path: file, filename: 'memo.txt', sourceHint: 'upload' });
    searchResponse = { details: [{ text: 'p'.repeat(700) }] };

    await pipeline().answer('What changed this year?', 's1');

    const input = run.mock.calls[0]?.[0];
    const context = isRecord(input) ? String(input['context']) : '';
    expect(context).toBe(`${'p'.repeat(700)}${PASSAGE_SEPARATOR}Recently added document (memo.txt):\nRECENT-MEMO-CONTENT`);
  });

  it('finds the latest document from ingestion markers in the history', async () => {
    fs.writeFileSync(path.join(root, 'web', 'page_1.html'), '<p>Crawled page.</p>', 'utf-8');
    await memory.addTurn('s2', 'system', '[ingested] page_1.html <- https://www.federalregister.gov/d/2022-05471');
    searchResponse = { details: [{ text: 'p'.repeat(700) }] };

    await pipeline().answer('What changed this year?', 's2');

    const input = run.mock.calls[0]?.[0];
    const context = isRecord(input) ? String(input['context']) : '';
    expect(context.endsWith('Recently added document (page_1.html):\nCrawled page.')).toBe(true);
  });

  it('still answers when the conversation cannot be saved', async () => {
    const blocker = path.join(root, 'not-a-dir');
    fs.writeFileSync(blocker, '', 'utf-8');
    memory = new SessionMemory(blocker, { readRetryDelayMs: 0 });

    await expect(pipeline().answer('When was EO 14067 signed?', 'dm:1')).resolves.toContain('EO 14067');
    expect(warn).toHaveBeenCalledWith(expect.stringContaining('Could not save conversation dm:1'));
  });

  it('keeps context within the cap for any input', async () => {
    config.retrieval.context_cap = 300;
    searchResponse = { details: Array.from({ length: 5 }, (_, i) => ({ text: String(i).repeat(200) })) };

    await pipeline().answer('Long question');

    const input = run.mock.calls[0]?.[0];
    const context = isRecord(input) ? String(input['context']) : '';
    expect(context).toHaveLength(300);
  });
});

describe('diagnosticAnswer', () => {
  it('lists "(none)" and cuts the preview', () => {
    const text = diagnosticAnswer('q', { context: 'x'.repeat(900), sources: [], results: [] }, 'boom');

    expect(text).toBe(`Agent call failed.\n\nQuery: q\nTop sources:\n(none)\n\nContext preview:\n${'x'.repeat(800)}…\n\nError: boom`);
  });
});
