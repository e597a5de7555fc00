/**
 * Session Memory Store
 *
 * Per-conversation transcripts kept in an in-process cache and persisted
 * as one pretty-printed JSON file per session:
 *
 *   <sessionsDir>/<sanitized key>.json  →  [{ "t": ..., "role": ..., "content": ... }, ...]
 *
 * Reads go through the cache; every append writes the file back with
 * write-to-temp-then-rename, serialized by a mutex so two quick appends
 * never interleave partial writes.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { Mutex, sleep } from '../utils/mutex.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { TranscriptSchema, type Turn, type TurnRole, type SessionMemoryOptions } from './types.js';

const DEFAULT_MAX_TURNS = 10;
const DEFAULT_MAX_HISTORY_CHARS = 2000;
const DEFAULT_READ_ATTEMPTS = 3;
const DEFAULT_READ_RETRY_DELAY_MS = 50;

const ROLE_LABELS: Record<TurnRole, string> = {
  user: 'User',
  assistant: 'Assistant',
  system: 'System',
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-backed conversation memory.
 *
 * @example
 * ```typescript
 * const memory = new SessionMemory(paths.sessionsDir, { maxTurns: 10 }, logger);
 * await memory.addTurn('dm:42', 'user', 'Is EO 14067 still in effect?');
 * const history = await memory.buildHistoryText('dm:42');
 * ```
 */
export class SessionMemory {
  private readonly cache = new Map<string, Turn[]>();
  private readonly writeLock = new Mutex();
  private readonly maxTurns: number;
  private readonly maxHistoryChars: number;
  private readonly readAttempts: number;
  private readonly readRetryDelayMs: number;
  private readonly now: () => number;
  private tmpCounter = 0;

  constructor(
    private readonly sessionsDir: string,
    options: SessionMemoryOptions = {},
    private readonly logger: Logger = silentLogger
  ) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
    this.maxHistoryChars = options.maxHistoryChars ?? DEFAULT_MAX_HISTORY_CHARS;
    this.readAttempts = options.readAttempts ?? DEFAULT_READ_ATTEMPTS;
    this.readRetryDelayMs = options.readRetryDelayMs ?? DEFAULT_READ_RETRY_DELAY_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * File backing a session. Characters outside `[A-Za-z0-9_\-:|]` become `_`.
   */
  pathFor(sessionId: string): string {
    const safe = sessionId.replace(/[^a-zA-Z0-9_\-:|]/g, '_');
    return path.join(this.sessionsDir, `${safe}.json`);
  }

  /**
   * Turns of a session, oldest first. Missing sessions load as empty.
   */
  async load(sessionId: string): Promise<Turn[]> {
    return [...(await this.turnsFor(sessionId))];
  }

  /**
   * Append a turn and persist the transcript.
   *
   * The transcript keeps the most recent `maxTurns * 2` turns.
   *
   * @throws when the session file cannot be written
   */
  async addTurn(sessionId: string, role: TurnRole, content: string): Promise<void> {
    const turns = await this.turnsFor(sessionId);
    turns.push({ t: this.now() / 1000, role, content });

    const limit = this.maxTurns * 2;
    if (turns.length > limit) {
      turns.splice(0, turns.length - limit);
    }

    await this.save(sessionId);
  }

  /**
   * Render recent turns as `User: ...` / `Assistant: ...` lines, keeping
   * the last `maxChars` characters. No session or no turns gives `''`.
   */
  async buildHistoryText(
    sessionId: string | undefined,
    maxChars: number = this.maxHistoryChars
  ): Promise<string> {
    if (!sessionId || maxChars <= 0) {
      return '';
    }

    const turns = await this.turnsFor(sessionId);
    if (turns.length === 0) {
      return '';
    }

    const text = turns
      .slice(-(this.maxTurns * 2))
      .map((turn) => `${ROLE_LABELS[turn.role]}: ${turn.content}`)
      .join('\n');

    return text.length > maxChars ? text.slice(-maxChars) : text;
  }

  /**
   * Forget a session: drop the cache entry and delete its file.
   */
  async clear(sessionId: string): Promise<void> {
    this.cache.delete(sessionId);
    const file = this.pathFor(sessionId);

    await this.writeLock.runExclusive(async () => {
      try {
        await fs.promises.unlink(file);
      } catch (error) {
        if (!isMissingFile(error)) {
          throw error;
        }
      }
    });
  }

  /**
   * Write the cached transcript atomically.
   */
  private async save(sessionId: string): Promise<void> {
    const file = this.pathFor(sessionId);

    await this.writeLock.runExclusive(async () => {
      const snapshot = JSON.stringify(this.cache.get(sessionId) ?? [], null, 2);
      const tmp = `${file}.${process.pid}.${this.tmpCounter++}.tmp`;

      await fs.promises.mkdir(this.sessionsDir, { recursive: true });
      try {
        await fs.promises.writeFile(tmp, snapshot, 'utf-8');
        await fs.promises.rename(tmp, file);
      } catch (error) {
        await fs.promises.rm(tmp, { force: true });
        throw error;
      }
    });
  }

  /**
   * Cached turn list for a session, read from disk on first access.
   */
  private async turnsFor(sessionId: string): Promise<Turn[]> {
    const cached = this.cache.get(sessionId);
    if (cached) {
      return cached;
    }

    const loaded = await this.readFile(sessionId);

    // Another caller may have populated the cache while we were reading
    const raced = this.cache.get(sessionId);
    if (raced) {
      return raced;
    }

    this.cache.set(sessionId, loaded);
    return loaded;
  }

  private async readFile(sessionId: string): Promise<Turn[]> {
    const file = this.pathFor(sessionId);

    for (let attempt = 1; attempt <= this.readAttempts; attempt++) {
      try {
        const raw = await fs.promises.readFile(file, 'utf-8');
        const parsed: unknown = JSON.parse(raw);
        return TranscriptSchema.parse(parsed);
      } catch (error) {
        if (isMissingFile(error)) {
          return [];
        }
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Failed reading session ${sessionId} (attempt ${attempt}): ${message}`);
        if (attempt < this.readAttempts) {
          await sleep(this.readRetryDelayMs);
        }
      }
    }

    return [];
  }
}
