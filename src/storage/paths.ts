/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * ~/.partycluster/                 # Default data directory
 * └── cache/
 *     └── feeds/
 *         └── <sha256(url)>.json   # One cached feed body per URL
 * ```
 *
 * Nothing else is persisted: clusters live only for one run.
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Gets the root data directory for the application.
 *
 * Uses the `PARTYCLUSTER_DATA_DIR` environment variable if set,
 * otherwise defaults to `~/.partycluster/`.
 *
 * @returns Absolute path to the data directory
 * @example
 * ```typescript
 * process.env.PARTYCLUSTER_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  const envDir = process.env.PARTYCLUSTER_DATA_DIR;

  if (envDir) {
    if (envDir.startsWith('~')) {
      return path.join(os.homedir(), envDir.slice(1));
    }
    return path.resolve(envDir);
  }

  return path.join(os.homedir(), '.partycluster');
}

/**
 * Gets the cache root directory.
 *
 * @param dataDir - Data directory override (default: getDataDir())
 */
export function getCacheDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'cache');
}

/**
 * Gets the directory holding cached feed bodies.
 *
 * @param dataDir - Data directory override (default: getDataDir())
 */
export function getFeedCacheDir(dataDir: string = getDataDir()): string {
  return path.join(getCacheDir(dataDir), 'feeds');
}
