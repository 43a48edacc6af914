/**
 * Cache Commands
 *
 * Inspect and clear the on-disk feed cache.
 *
 * Usage:
 *   partycluster cache path
 *   partycluster cache clear
 *
 * @module cli/commands/cache
 */

import type { Command } from 'commander';
import { FeedCache } from '../../feeds/cache.js';
import { getFeedCacheDir } from '../../storage/paths.js';
import { getBaseCommand } from '../base-command.js';

async function clearHandler(_options: Record<string, unknown>, cmd: Command): Promise<void> {
  const base = getBaseCommand(cmd);
  const directory = getFeedCacheDir(base.dataDir);
  base.debug(`Clearing ${directory}`);

  const removed = await new FeedCache({ directory, ttlSeconds: 0 }).clear();
  base.success(`Removed ${removed} cached feed${removed === 1 ? '' : 's'}`);
}

function pathHandler(_options: Record<string, unknown>, cmd: Command): void {
  const base = getBaseCommand(cmd);
  // Printed even with --quiet so it can be used in scripts
  console.log(getFeedCacheDir(base.dataDir));
}

/**
 * Register the `cache` command group.
 */
export function registerCacheCommands(program: Command): void {
  const cache = program.command('cache').description('Manage the feed cache');

  cache.command('clear').description('Delete every cached feed').action(clearHandler);

  cache.command('path').description('Print the feed cache directory').action(pathHandler);
}
