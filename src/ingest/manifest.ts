/**
 * Index Manifest
 *
 * Remembers which files were offered to the index and their mtime, so
 * unchanged files are skipped on the next pass.
 *
 * Stored at `<data_dir>/.index_manifest.json`:
 * { "/abs/path/page_0.html": { "mtime": 1717000000.12, "size": 5120, "skipped": false } }
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parseStoredJson } from '../utils/json.js';
import { describeError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { ManifestSchema, type ManifestData, type ManifestEntry } from './types.js';

/** mtimes closer than this are the same */
const MTIME_EPSILON = 1e-9;

export class IndexManifest {
  private constructor(
    private readonly filePath: string,
    private readonly entries: ManifestData,
    private readonly logger: Logger
  ) {}

  /**
   * Load the manifest; a missing or corrupt file starts empty.
   */
  static load(filePath: string, logger: Logger = silentLogger): IndexManifest {
    let raw: string | undefined;
    try {
      raw = fs.readFileSync(filePath, 'utf-8');
    } catch {
      raw = undefined;
    }

    const entries = parseStoredJson<ManifestData>(raw, ManifestSchema, {}, (failure) => {
      logger.warn(`Ignoring corrupt manifest ${filePath}: ${failure.message}`);
    });

    return new IndexManifest(filePath, entries, logger);
  }

  get(key: string): ManifestEntry | undefined {
    return this.entries[key];
  }

  /**
   * Whether the file at `key` was already handled at this mtime.
   */
  isUnchanged(key: string, mtime: number): boolean {
    const previous = this.entries[key];
    return previous !== undefined && Math.abs(previous.mtime - mtime) < MTIME_EPSILON;
  }

  /**
   * Record an entry and write the manifest. Write failures are logged.
   */
  record(key: string, entry: ManifestEntry): void {
    this.entries[key] = entry;
    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(this.filePath, JSON.stringify(this.entries, null, 2), 'utf-8');
    } catch (error) {
      this.logger.warn(`Couldn't write manifest: ${describeError(error)}`);
    }
  }

  /** Number of recorded files */
  get size(): number {
    return Object.keys(this.entries).length;
  }
}
