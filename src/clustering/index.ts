/**
 * Clustering Engine
 *
 * Groups check-ins into candidate gatherings using single-linkage
 * agglomerative clustering over the space-time interval, cut at a
 * caller-supplied threshold.
 *
 * @module clustering
 */

import type { CheckIn } from '../schemas/checkin.js';
import { compareCheckIns } from '../events/key.js';
import { spacelikeInterval, type DistanceFn } from '../spacetime/metric.js';
import { buildDendrogram, type Dendrogram } from './dendrogram.js';
import { cutDendrogram, assertThreshold } from './cut.js';

export {
  buildDendrogram,
  leavesOf,
  nodeSize,
  type Dendrogram,
  type DendrogramNode,
  type DendrogramLeaf,
  type DendrogramMerge,
} from './dendrogram.js';
export { cutDendrogram, assertThreshold } from './cut.js';

/**
 * Options for {@link clusterEvents}.
 */
export interface ClusterOptions {
  /** Pairwise distance (default: spacelikeInterval) */
  distance?: DistanceFn<CheckIn>;
}

/**
 * Build the space-time dendrogram of a set of check-ins.
 *
 * Check-ins are ranked by author key, so repeated runs over the same set
 * produce the same tree regardless of input order.
 */
export function buildEventDendrogram(
  events: readonly CheckIn[],
  options: ClusterOptions = {}
): Dendrogram<CheckIn> {
  return buildDendrogram(events, options.distance ?? spacelikeInterval, compareCheckIns);
}

/**
 * Partition check-ins into clusters at a threshold.
 *
 * @param events - Deduplicated check-ins (one per author)
 * @param threshold - Cutoff in meters-equivalent units
 * @returns Clusters, including singletons, in deterministic order
 * @throws RangeError for an invalid threshold
 *
 * @example
 * ```typescript
 * const clusters = clusterEvents(store.values(), 100);
 * const parties = clusters.filter((c) => c.length > 2);
 * ```
 */
export function clusterEvents(
  events: readonly CheckIn[],
  threshold: number,
  options: ClusterOptions = {}
): CheckIn[][] {
  // Fail before the quadratic build, not after it
  assertThreshold(threshold);
  return cutDendrogram(buildEventDendrogram(events, options), threshold);
}
