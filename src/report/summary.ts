/**
 * Cluster Summaries
 *
 * What the core exposes per cluster for reporting: members in time order,
 * spatial and temporal extent, and the participants' keys.
 *
 * @module report/summary
 */

import type { CheckIn, Coordinates, Instant } from '../schemas/checkin.js';
import { compareCheckIns, eventKeyOf, formatEventKey } from '../events/key.js';
import { maximumSpatialDistance, maximumTemporalDistance } from '../spacetime/metric.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Reporting view of one cluster.
 */
export interface ClusterSummary {
  /** Members sorted by publication time, ascending */
  members: CheckIn[];
  /** `name <uri>` of each member, in member order */
  participants: string[];
  /** Display names, in member order */
  names: string[];
  /** Largest distance between two members, meters */
  maxSpatialDistance: number;
  /** Largest time difference between two members, seconds */
  maxTemporalDistance: number;
  /** Earliest member check-in */
  startedAt: Instant;
  /** Latest member check-in */
  endedAt: Instant;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Clusters smaller than this are noise: a single check-in is no
 * gathering and two people meeting is not yet a party.
 */
export const DEFAULT_MIN_PARTY_SIZE = 3;

// ============================================================================
// Functions
// ============================================================================

/**
 * Summarize one cluster.
 *
 * @throws Error if the cluster is empty
 */
export function summarizeCluster(cluster: readonly CheckIn[]): ClusterSummary {
  if (cluster.length === 0) {
    throw new Error('Cannot summarize an empty cluster');
  }

  const members = [...cluster].sort(
    (a, b) => a.publishedAt.getTime() - b.publishedAt.getTime() || compareCheckIns(a, b)
  );

  return {
    members,
    participants: members.map((m) => formatEventKey(eventKeyOf(m))),
    names: members.map((m) => m.name),
    maxSpatialDistance: maximumSpatialDistance(members),
    maxTemporalDistance: maximumTemporalDistance(members),
    startedAt: members[0].publishedAt,
    endedAt: members[members.length - 1].publishedAt,
  };
}

/**
 * Keep clusters with at least `minSize` members and summarize them.
 *
 * @param clusters - Output of clusterEvents()
 * @param minSize - Minimum member count (default: 3)
 */
export function selectParties(
  clusters: readonly (readonly CheckIn[])[],
  minSize: number = DEFAULT_MIN_PARTY_SIZE
): ClusterSummary[] {
  return clusters.filter((cluster) => cluster.length >= minSize).map(summarizeCluster);
}

/**
 * Distinct member coordinates, in member order.
 */
export function distinctCoordinates(summary: ClusterSummary): Coordinates[] {
  const seen = new Set<string>();
  const result: Coordinates[] = [];

  for (const member of summary.members) {
    const key = `${member.latitude},${member.longitude}`;
    if (!seen.has(key)) {
      seen.add(key);
      result.push({ latitude: member.latitude, longitude: member.longitude });
    }
  }

  return result;
}
