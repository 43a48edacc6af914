/**
 * Logger interface for library modules.
 *
 * Library code never writes to the console directly; it receives a
 * Logger. The CLI passes its BaseCommand, which routes messages through
 * the verbose/quiet flags and chalk styling.
 *
 * @module logging/logger
 */

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
}

/**
 * Logger that drops everything. Default for library calls and tests.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
