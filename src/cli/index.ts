#!/usr/bin/env node
/**
 * partycluster CLI
 *
 * Main entry point for the partycluster command.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   partycluster --help
 *   partycluster feeds.txt 100
 *   partycluster detect feeds.txt 250 --json
 *   partycluster cache clear
 *
 * @module cli
 */

import { Command, type CommanderError } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Exit code for an error commander raised while parsing.
 */
export function exitCodeFor(err: CommanderError): number {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    return EXIT_CODES.SUCCESS;
  }
  return EXIT_CODES.USAGE_ERROR;
}

function readGlobalOptions(command: Command): GlobalOptions {
  const opts = command.opts();
  return {
    verbose: opts['verbose'] === true,
    quiet: opts['quiet'] === true,
    color: opts['color'] !== false,
    dataDir: typeof opts['dataDir'] === 'string' ? opts['dataDir'] : undefined,
  };
}

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('partycluster')
    .description('Spot likely parties in the location check-ins of Atom/GeoRSS feeds')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.partycluster)')
    .showHelpAfterError('(run with --help for usage)');

  program.hook('preAction', (thisCommand) => {
    const opts = readGlobalOptions(thisCommand);
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Subcommands copy this setting when they are created, so it goes first
  program.exitOverride((err) => {
    process.exit(exitCodeFor(err));
  });

  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    process.exit(EXIT_CODES.ERROR);
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(error);
    process.exit(EXIT_CODES.ERROR);
  });
}
