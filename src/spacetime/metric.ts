/**
 * Space-Time Distance Metric
 *
 * Fuses spatial and temporal separation of two check-ins into one scalar.
 *
 * The interval treats walking pace, 1 meter per second, as the causal
 * speed limit:
 *
 *   interval(a, b) = sqrt(spatial(a, b)^2 - temporal(a, b)^2)
 *
 * When more seconds than meters separate two check-ins the radicand is
 * negative and the pair is causally disconnected (outside each other's
 * light cone). Such pairs get an interval of +Infinity so they are never
 * clustered at any finite threshold.
 *
 * All functions are pure and symmetric.
 *
 * @module spacetime/metric
 */

import type { CheckIn, Coordinates } from '../schemas/checkin.js';
import { geodesicDistance } from './geodesic.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Causal speed limit in meters per second.
 */
export const CAUSAL_SPEED_MPS = 1;

// ============================================================================
// Types
// ============================================================================

/**
 * Anything with a position in space.
 */
export type Located = Pick<CheckIn, 'latitude' | 'longitude'>;

/**
 * Anything with a position in time.
 */
export type Timed = Pick<CheckIn, 'publishedAt'>;

/**
 * Symmetric distance between two values of the same kind.
 */
export type DistanceFn<T> = (a: T, b: T) => number;

// ============================================================================
// Pairwise Metrics
// ============================================================================

/**
 * Order two coordinate pairs canonically so that the (not exactly
 * symmetric) floating point evaluation sees the same argument order
 * for (a, b) and (b, a).
 */
function canonicalPair(a: Located, b: Located): [Coordinates, Coordinates] {
  const first = { latitude: a.latitude, longitude: a.longitude };
  const second = { latitude: b.latitude, longitude: b.longitude };
  if (a.latitude < b.latitude || (a.latitude === b.latitude && a.longitude <= b.longitude)) {
    return [first, second];
  }
  return [second, first];
}

/**
 * Geodesic surface distance on the WGS84 ellipsoid.
 *
 * @returns Meters; 0 for identical coordinates
 */
export function spatialDistance(a: Located, b: Located): number {
  const [from, to] = canonicalPair(a, b);
  return geodesicDistance(from, to);
}

/**
 * Absolute difference of the two publication instants.
 *
 * @returns Seconds; 0 for identical instants
 */
export function temporalDistance(a: Timed, b: Timed): number {
  return Math.abs(a.publishedAt.getTime() - b.publishedAt.getTime()) / 1000;
}

/**
 * Minkowski-style space-time interval with c = 1 m/s.
 *
 * @returns Meters-equivalent, or +Infinity for causally disconnected pairs
 * @example
 * ```typescript
 * // 50 m apart, 30 s apart: sqrt(2500 - 900) = 40
 * // 50 m apart, 60 s apart: Infinity
 * ```
 */
export function spacelikeInterval(a: Located & Timed, b: Located & Timed): number {
  const space = spatialDistance(a, b);
  const time = temporalDistance(a, b) * CAUSAL_SPEED_MPS;
  const radicand = space * space - time * time;

  if (radicand < 0) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.sqrt(radicand);
}

// ============================================================================
// Extent Over a Collection
// ============================================================================

/**
 * Largest value of a metric over all distinct unordered pairs.
 *
 * @returns 0 for fewer than two items
 */
export function maximumPairwise<T>(items: readonly T[], distance: DistanceFn<T>): number {
  let maximum = 0;

  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      const d = distance(items[i], items[j]);
      if (d > maximum) {
        maximum = d;
      }
    }
  }

  return maximum;
}

/**
 * Largest spatial distance between any two members, in meters.
 * Used only to describe a cluster's extent.
 */
export function maximumSpatialDistance(events: readonly Located[]): number {
  return maximumPairwise(events, spatialDistance);
}

/**
 * Largest temporal distance between any two members, in seconds.
 */
export function maximumTemporalDistance(events: readonly Timed[]): number {
  return maximumPairwise(events, temporalDistance);
}
