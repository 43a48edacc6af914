/**
 * Run Summary Formatters
 *
 * Text and JSON renderings of a detection run.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import { STAGE_ORDER, type PartyRunResult } from '../../pipeline/types.js';
import type { PartyAnnouncement } from '../../report/announcement.js';
import { formatDuration } from './progress.js';

// ============================================================================
// Types
// ============================================================================

/**
 * JSON document printed by `--json`.
 */
export interface JsonReport {
  threshold: number;
  minSize: number;
  feeds: {
    total: number;
    cached: number;
    failed: Array<{ url: string; error: string }>;
  };
  people: number;
  skippedRecords: number;
  clusterCount: number;
  parties: Array<{
    text: string;
    participants: string[];
    placeNames: string[];
    maxSpatialDistance: number;
    maxTemporalDistance: number;
    startedAt: string;
    endedAt: string;
    members: Array<{
      name: string;
      uri: string;
      publishedAt: string;
      latitude: number;
      longitude: number;
    }>;
  }>;
}

// ============================================================================
// Text Summary
// ============================================================================

/**
 * Format the statistics of a run.
 *
 * @example
 * ```
 * === Run Complete ===
 * Feeds:    12 (3 cached, 1 failed)
 * People:   41 (5 entries skipped)
 * Clusters: 36 at threshold 100
 * Parties:  2 (3+ people)
 * Duration: 1.4s (ingest 1.3s, cluster 85ms, select 0ms)
 * ```
 */
export function formatRunSummary(result: PartyRunResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Run Complete ==='));

  const feedNotes = [`${result.cachedFeeds} cached`];
  if (result.failedFeeds.length > 0) {
    feedNotes.push(chalk.yellow(`${result.failedFeeds.length} failed`));
  }
  lines.push(`Feeds:    ${result.feedCount} (${feedNotes.join(', ')})`);

  const skipped =
    result.skippedRecords > 0 ? ` (${result.skippedRecords} entries skipped)` : '';
  lines.push(`People:   ${result.eventCount}${skipped}`);
  lines.push(`Clusters: ${result.clusters.length} at threshold ${result.threshold}`);
  lines.push(`Parties:  ${result.parties.length} (${result.minSize}+ people)`);
  const stages = STAGE_ORDER.map(
    (stage) => `${stage} ${formatDuration(result.timing.perStage[stage])}`
  ).join(', ');
  lines.push(`Duration: ${formatDuration(result.timing.totalMs)} (${stages})`);

  return lines.join('\n');
}

// ============================================================================
// JSON Report
// ============================================================================

/**
 * Serializable report of a run and its announcements.
 */
export function toJsonReport(
  result: PartyRunResult,
  announcements: readonly PartyAnnouncement[]
): JsonReport {
  return {
    threshold: result.threshold,
    minSize: result.minSize,
    feeds: {
      total: result.feedCount,
      cached: result.cachedFeeds,
      failed: result.failedFeeds.map((f) => ({ url: f.url, error: f.error })),
    },
    people: result.eventCount,
    skippedRecords: result.skippedRecords,
    clusterCount: result.clusters.length,
    parties: announcements.map(({ summary, placeNames, text }) => ({
      text,
      participants: summary.participants,
      placeNames,
      maxSpatialDistance: summary.maxSpatialDistance,
      maxTemporalDistance: summary.maxTemporalDistance,
      startedAt: summary.startedAt.toISOString(),
      endedAt: summary.endedAt.toISOString(),
      members: summary.members.map((m) => ({
        name: m.name,
        uri: m.uri,
        publishedAt: m.publishedAt.toISOString(),
        latitude: m.latitude,
        longitude: m.longitude,
      })),
    })),
  };
}
