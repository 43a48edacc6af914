/**
 * Progress Formatters
 *
 * Spinner shown while feeds are loading. Uses the ora library; on a
 * non-TTY stream the spinner stays silent and only final states print.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Hide the spinner entirely (quiet mode, JSON output) */
  silent?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = createSpinner('Loading feeds').start();
 * spinner.update('Loading feeds (3/10)');
 * spinner.succeed('Loaded 10 feeds');
 * ```
 */
export class ProgressSpinner {
  private readonly spinner: Ora;
  private readonly silent: boolean;
  private startTime = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.silent = options.silent === true;

    // Progress goes to stderr so stdout carries only the report
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: !this.silent && process.stderr.isTTY === true,
      isSilent: this.silent,
      stream: process.stderr,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  warn(text?: string): this {
    this.spinner.warn(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * ```typescript
 * formatDuration(450);    // '450ms'
 * formatDuration(2500);   // '2.5s'
 * formatDuration(95000);  // '1m 35s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
