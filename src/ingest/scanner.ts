/**
 * Storage Folder Scanner
 *
 * Lists files in the storage folders using fast-glob. Dotfiles (the
 * manifest among them) and temporary files are never returned.
 */

import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import fg from 'fast-glob';
import type { StoredFile } from './types.js';

/**
 * Files under a folder, at any depth, oldest first.
 * A missing folder yields an empty list.
 */
export async function scanFolder(folder: string): Promise<StoredFile[]> {
  const root = resolve(folder);
  const entries = await fg('**/*', {
    cwd: root,
    absolute: true,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore: ['**/*.tmp'],
  });

  const files: StoredFile[] = [];
  for (const absolutePath of entries) {
    try {
      const stats = await stat(absolutePath);
      files.push({
        path: absolutePath,
        filename: basename(absolutePath),
        mtimeMs: stats.mtimeMs,
        size: stats.size,
      });
    } catch {
      // Removed between listing and stat
      continue;
    }
  }

  return files.sort((a, b) => a.mtimeMs - b.mtimeMs || a.path.localeCompare(b.path));
}

/**
 * Files across folders, most recently modified first.
 */
export async function filesNewestFirst(folders: readonly string[]): Promise<StoredFile[]> {
  const files: StoredFile[] = [];
  for (const folder of folders) {
    files.push(...(await scanFolder(folder)));
  }
  return files.sort((a, b) => b.mtimeMs - a.mtimeMs || a.path.localeCompare(b.path));
}

/**
 * Whether a folder has no files (or does not exist).
 */
export async function isFolderEmpty(folder: string): Promise<boolean> {
  const entries = await fg('**/*', {
    cwd: resolve(folder),
    dot: true,
    onlyFiles: true,
    suppressErrors: true,
  });
  return entries.length === 0;
}
