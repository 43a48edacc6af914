/**
 * Level Cut
 *
 * Flattens a dendrogram into a partition at a distance threshold:
 * every maximal subtree whose merge distance is <= threshold becomes one
 * cluster, and leaves that were never merged at or below the threshold
 * become singletons.
 *
 * Consequences:
 * - every pair merged at distance <= threshold ends up in one cluster
 * - no two returned clusters were merged at distance <= threshold
 * - raising the threshold only ever joins clusters (refinement)
 *
 * @module clustering/cut
 */

import { ThresholdSchema } from '../schemas/checkin.js';
import { leavesOf, type Dendrogram, type DendrogramNode } from './dendrogram.js';

/**
 * Validate a cut threshold.
 *
 * @throws RangeError if the threshold is negative, NaN or infinite
 */
export function assertThreshold(threshold: number): void {
  const result = ThresholdSchema.safeParse(threshold);
  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join('; ');
    throw new RangeError(`Invalid threshold ${threshold}: ${reason}`);
  }
}

/**
 * Cut a dendrogram at the given threshold.
 *
 * @param dendrogram - Result of buildDendrogram()
 * @param threshold - Finite, non-negative distance
 * @returns Clusters ordered by their first member; members in rank order
 * @throws RangeError for an invalid threshold
 */
export function cutDendrogram<T>(dendrogram: Dendrogram<T>, threshold: number): T[][] {
  assertThreshold(threshold);

  const clusters: Array<{ rank: number; members: T[] }> = [];

  const visit = (node: DendrogramNode<T>): void => {
    if (node.kind === 'leaf' || node.distance <= threshold) {
      const leaves = leavesOf(node);
      clusters.push({ rank: leaves[0].rank, members: leaves.map((leaf) => leaf.item) });
      return;
    }
    visit(node.left);
    visit(node.right);
  };

  for (const root of dendrogram.roots) {
    visit(root);
  }

  return clusters.sort((a, b) => a.rank - b.rank).map((cluster) => cluster.members);
}
