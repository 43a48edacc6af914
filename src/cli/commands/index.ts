/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - detect (default): Find parties in a feed list
 * - cache: Inspect and clear the feed cache
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerDetectCommand } from './detect.js';
import { registerCacheCommands } from './cache.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerDetectCommand(program);
  registerCacheCommands(program);
}

