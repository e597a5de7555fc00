/**
 * Centralized Path Definitions
 *
 * Single source of truth for the navigator's directory layout.
 *
 * ~/.pnav/
 * ├── config.toml          (user configuration)
 * └── data/                (default storage.data_dir)
 *     ├── .index_manifest.json
 *     ├── sessions/        (one JSON transcript per session key)
 *     ├── uploads/         (files sent by users)
 *     ├── web/             (URL snapshots and seed scrapes)
 *     └── kaggle/          (pre-seeded dataset files, indexed if present)
 */

import { join, resolve } from 'node:path';
import { homedir } from 'node:os';

// Core path constants
export const PNAV_DIR = join(homedir(), '.pnav');
export const CONFIG_PATH = join(PNAV_DIR, 'config.toml');

/**
 * Folders derived from a data directory.
 */
export interface StoragePaths {
  dataDir: string;
  sessionsDir: string;
  uploadsDir: string;
  webDir: string;
  kaggleDir: string;
  manifestPath: string;
}

/**
 * Get the navigator home directory (~/.pnav)
 */
export function getPnavDir(): string {
  return PNAV_DIR;
}

/**
 * Get the config file path (~/.pnav/config.toml)
 */
export function getConfigPath(): string {
  return CONFIG_PATH;
}

/**
 * Expand a leading `~` to the user's home directory and make the path absolute.
 */
export function expandHome(p: string): string {
  if (p === '~') {
    return homedir();
  }
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return join(homedir(), p.slice(2));
  }
  return resolve(p);
}

/**
 * Lay out the storage folders under a data directory.
 */
export function getStoragePaths(dataDir: string): StoragePaths {
  const root = expandHome(dataDir);
  return {
    dataDir: root,
    sessionsDir: join(root, 'sessions'),
    uploadsDir: join(root, 'uploads'),
    webDir: join(root, 'web'),
    kaggleDir: join(root, 'kaggle'),
    manifestPath: join(root, '.index_manifest.json'),
  };
}
