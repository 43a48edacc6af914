/**
 * Pipeline Type Definitions
 *
 * A run has three stages:
 * - ingest: load every feed and merge its check-ins into the event store
 * - cluster: build the space-time dendrogram and cut it at the threshold
 * - select: keep clusters large enough to be parties
 *
 * @module pipeline/types
 */

import type { CheckIn } from '../schemas/checkin.js';
import type { FeedLoader } from '../feeds/source.js';
import type { ClusterSummary } from '../report/summary.js';
import type { Logger } from '../logging/logger.js';

// ============================================================================
// Stages
// ============================================================================

export type StageName = 'ingest' | 'cluster' | 'select';

export const STAGE_ORDER: readonly StageName[] = ['ingest', 'cluster', 'select'];

// ============================================================================
// Options & Dependencies
// ============================================================================

/**
 * Progress of feed ingestion, reported after each feed settles.
 */
export interface FeedProgress {
  url: string;
  /** Feeds settled so far (loaded or failed) */
  completed: number;
  total: number;
  /** Whether this feed failed */
  failed: boolean;
}

/**
 * Inputs of one run.
 */
export interface PartyRunOptions {
  /** Feed URLs to ingest */
  feedUrls: readonly string[];
  /** Clustering cutoff, meters-equivalent */
  threshold: number;
  /** Minimum members for a cluster to count as a party (default: 3) */
  minSize?: number;
  /** Simultaneous feed downloads (default: 4) */
  concurrency?: number;
  /** Called after each feed settles */
  onFeedSettled?: (progress: FeedProgress) => void;
}

/**
 * Collaborators of one run.
 */
export interface PartyRunDependencies {
  /** Turns feed URLs into check-ins */
  loader: FeedLoader;
  logger?: Logger;
}

// ============================================================================
// Results
// ============================================================================

/**
 * A feed that could not be loaded.
 */
export interface FailedFeed {
  url: string;
  error: string;
}

/**
 * Outcome of one run.
 */
export interface PartyRunResult {
  threshold: number;
  minSize: number;
  /** Number of feeds requested */
  feedCount: number;
  /** Feeds served from the cache */
  cachedFeeds: number;
  failedFeeds: FailedFeed[];
  /** Distinct authors after deduplication */
  eventCount: number;
  /** Feed entries skipped as incomplete */
  skippedRecords: number;
  /** Full partition, singletons included */
  clusters: CheckIn[][];
  /** Clusters with at least minSize members */
  parties: ClusterSummary[];
  timing: {
    perStage: Record<StageName, number>;
    totalMs: number;
  };
}
