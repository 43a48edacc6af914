/**
 * Agglomerative Single-Linkage Clustering
 *
 * Builds the merge hierarchy (dendrogram) over a set of items:
 * 1. Start with one singleton cluster per item
 * 2. Repeatedly merge the two clusters with the smallest linkage distance
 * 3. Record the distance of every merge
 *
 * Linkage is single-linkage: the distance between two clusters is the
 * smallest pairwise distance between their members. With the space-time
 * interval this reads "merge if any two members could have been at the
 * same gathering".
 *
 * Pairs at infinite distance are never merged, so the result is a forest
 * with one root per causally disconnected component.
 *
 * Determinism: items are sorted with the supplied comparator before
 * clustering. A cluster's rank is the sorted position of its first
 * member. Among equal minimum distances the pair with the lowest
 * (rank, rank) is merged first.
 *
 * Cost is O(n^2) memory and O(n^3) time.
 *
 * @module clustering/dendrogram
 */

import type { DistanceFn } from '../spacetime/metric.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A single input item.
 */
export interface DendrogramLeaf<T> {
  kind: 'leaf';
  /** The clustered item */
  item: T;
  /** Position of the item in sorted order */
  rank: number;
}

/**
 * Two subtrees joined at a given linkage distance.
 */
export interface DendrogramMerge<T> {
  kind: 'merge';
  /** Linkage distance at which the children were joined */
  distance: number;
  left: DendrogramNode<T>;
  right: DendrogramNode<T>;
  /** Smallest rank among the leaves below this node */
  rank: number;
  /** Number of leaves below this node */
  size: number;
}

export type DendrogramNode<T> = DendrogramLeaf<T> | DendrogramMerge<T>;

/**
 * Result of agglomeration.
 */
export interface Dendrogram<T> {
  /** Top-level subtrees, ordered by rank */
  roots: DendrogramNode<T>[];
  /** Input items in the order used for ranks */
  items: T[];
  /** Merges in the order they were performed */
  merges: DendrogramMerge<T>[];
}

// ============================================================================
// Helpers
// ============================================================================

export function nodeSize<T>(node: DendrogramNode<T>): number {
  return node.kind === 'leaf' ? 1 : node.size;
}

/**
 * All leaves below a node, in rank order.
 */
export function leavesOf<T>(node: DendrogramNode<T>): DendrogramLeaf<T>[] {
  const leaves: DendrogramLeaf<T>[] = [];
  const stack: DendrogramNode<T>[] = [node];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;

    if (current.kind === 'leaf') {
      leaves.push(current);
    } else {
      stack.push(current.left, current.right);
    }
  }

  return leaves.sort((a, b) => a.rank - b.rank);
}

// ============================================================================
// Main Function
// ============================================================================

/**
 * Build a single-linkage dendrogram.
 *
 * @param items - Items to cluster; not modified
 * @param distance - Symmetric pairwise distance
 * @param compare - Order used for ranks and tie-breaks
 * @returns Forest of merge trees
 *
 * @example
 * ```typescript
 * const tree = buildDendrogram(store.values(), spacelikeInterval, compareCheckIns);
 * console.log(`${tree.merges.length} merges, ${tree.roots.length} components`);
 * ```
 */
export function buildDendrogram<T>(
  items: readonly T[],
  distance: DistanceFn<T>,
  compare?: (a: T, b: T) => number
): Dendrogram<T> {
  const sorted = compare ? [...items].sort(compare) : [...items];
  const n = sorted.length;

  // Active clusters are kept in slots indexed by rank; a merged cluster
  // lives on in the slot of its lower-ranked half.
  const nodes: Array<DendrogramNode<T> | undefined> = sorted.map(
    (item, rank): DendrogramNode<T> => ({ kind: 'leaf', item, rank })
  );

  // Linkage matrix between active slots; only j > i is read.
  const linkage: number[][] = [];
  for (let i = 0; i < n; i++) {
    const row = new Array<number>(n).fill(Number.POSITIVE_INFINITY);
    for (let j = i + 1; j < n; j++) {
      const d = distance(sorted[i], sorted[j]);
      // NaN would poison the min() updates below; treat it as unreachable
      row[j] = Number.isNaN(d) ? Number.POSITIVE_INFINITY : d;
    }
    linkage.push(row);
  }

  const merges: DendrogramMerge<T>[] = [];
  let active = n;

  while (active > 1) {
    let best = Number.POSITIVE_INFINITY;
    let bestI = -1;
    let bestJ = -1;

    for (let i = 0; i < n; i++) {
      if (nodes[i] === undefined) continue;
      for (let j = i + 1; j < n; j++) {
        if (nodes[j] === undefined) continue;
        // Strict comparison keeps the first (lowest-rank) pair on ties
        if (linkage[i][j] < best) {
          best = linkage[i][j];
          bestI = i;
          bestJ = j;
        }
      }
    }

    // Only infinite distances remain
    if (bestI < 0) break;

    const left = nodes[bestI];
    const right = nodes[bestJ];
    if (left === undefined || right === undefined) break;

    const merged: DendrogramMerge<T> = {
      kind: 'merge',
      distance: best,
      left,
      right,
      rank: bestI,
      size: nodeSize(left) + nodeSize(right),
    };
    merges.push(merged);

    // Single-linkage update: d(k, i+j) = min(d(k, i), d(k, j))
    for (let k = 0; k < n; k++) {
      if (k === bestI || k === bestJ || nodes[k] === undefined) continue;
      const viaI = k < bestI ? linkage[k][bestI] : linkage[bestI][k];
      const viaJ = k < bestJ ? linkage[k][bestJ] : linkage[bestJ][k];
      const combined = Math.min(viaI, viaJ);
      if (k < bestI) {
        linkage[k][bestI] = combined;
      } else {
        linkage[bestI][k] = combined;
      }
    }

    nodes[bestI] = merged;
    nodes[bestJ] = undefined;
    active--;
  }

  const roots = nodes.filter((node): node is DendrogramNode<T> => node !== undefined);

  return { roots, items: sorted, merges };
}
