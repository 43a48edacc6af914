/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export { ProgressSpinner, createSpinner, formatDuration, type SpinnerOptions } from './progress.js';
export { formatRunSummary, toJsonReport, type JsonReport } from './run-summary.js';
