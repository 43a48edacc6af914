/**
 * Geodesic Distance on the WGS84 Ellipsoid
 *
 * Surface distance between two coordinates using Vincenty's inverse
 * formula. Accurate to well under a millimeter for ordinary point pairs.
 *
 * Vincenty's iteration does not converge for some nearly antipodal pairs;
 * those fall back to the great-circle distance on a sphere of the WGS84
 * mean radius (error below 0.5%).
 *
 * @module spacetime/geodesic
 * @see T. Vincenty, "Direct and Inverse Solutions of Geodesics on the
 *      Ellipsoid with application of nested equations", Survey Review, 1975
 */

import type { Coordinates } from '../schemas/checkin.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * WGS84 ellipsoid parameters.
 */
export const WGS84 = {
  /** Semi-major axis in meters */
  a: 6378137,
  /** Flattening */
  f: 1 / 298.257223563,
} as const;

/** Semi-minor axis in meters */
const WGS84_B = (1 - WGS84.f) * WGS84.a;

/** Mean radius (2a + b) / 3 in meters */
export const WGS84_MEAN_RADIUS = (2 * WGS84.a + WGS84_B) / 3;

/** Convergence limit for lambda, in radians (about 0.006 mm) */
const CONVERGENCE_EPSILON = 1e-12;

const MAX_ITERATIONS = 200;

const toRad = (deg: number): number => deg * (Math.PI / 180);

// ============================================================================
// Distance Functions
// ============================================================================

/**
 * Great-circle distance on a sphere (haversine formula).
 *
 * @param radius - Sphere radius in meters (default: WGS84 mean radius)
 * @returns Distance in meters
 */
export function greatCircleDistance(
  from: Coordinates,
  to: Coordinates,
  radius: number = WGS84_MEAN_RADIUS
): number {
  const dLat = toRad(to.latitude - from.latitude);
  const dLng = toRad(to.longitude - from.longitude);

  const h =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRad(from.latitude)) *
      Math.cos(toRad(to.latitude)) *
      Math.sin(dLng / 2) *
      Math.sin(dLng / 2);

  return 2 * radius * Math.atan2(Math.sqrt(h), Math.sqrt(1 - h));
}

/**
 * Geodesic distance on the WGS84 ellipsoid.
 *
 * @returns Distance in meters; 0 for identical coordinates
 * @example
 * ```typescript
 * // One degree of longitude along the equator
 * geodesicDistance({ latitude: 0, longitude: 0 }, { latitude: 0, longitude: 1 });
 * // 111319.49...
 * ```
 */
export function geodesicDistance(from: Coordinates, to: Coordinates): number {
  if (from.latitude === to.latitude && from.longitude === to.longitude) {
    return 0;
  }

  const { a, f } = WGS84;
  const b = WGS84_B;

  // Longitude difference wrapped into [-180, 180]
  let dLng = to.longitude - from.longitude;
  if (dLng > 180) dLng -= 360;
  else if (dLng < -180) dLng += 360;

  const L = toRad(dLng);
  // Near-antipodal pairs may swing lambda past pi on the way to convergence
  const antipodal =
    Math.abs(L) > Math.PI / 2 || Math.abs(toRad(to.latitude - from.latitude)) > Math.PI / 2;
  const tanU1 = (1 - f) * Math.tan(toRad(from.latitude));
  const tanU2 = (1 - f) * Math.tan(toRad(to.latitude));
  const cosU1 = 1 / Math.sqrt(1 + tanU1 * tanU1);
  const sinU1 = tanU1 * cosU1;
  const cosU2 = 1 / Math.sqrt(1 + tanU2 * tanU2);
  const sinU2 = tanU2 * cosU2;

  let lambda = L;
  let sinSigma = 0;
  let cosSigma = 0;
  let sigma = 0;
  let cosSqAlpha = 0;
  let cos2SigmaM = 0;
  let converged = false;

  for (let iteration = 0; iteration < MAX_ITERATIONS; iteration++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);

    const sinSqSigma =
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2;
    sinSigma = Math.sqrt(sinSqSigma);

    // Coincident points (e.g. a pole reached with two different longitudes)
    if (sinSigma === 0) {
      return 0;
    }

    cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    sigma = Math.atan2(sinSigma, cosSigma);

    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    cosSqAlpha = 1 - sinAlpha * sinAlpha;

    // Equatorial line: cosSqAlpha = 0
    cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;

    const C = (f / 16) * cosSqAlpha * (4 + f * (4 - 3 * cosSqAlpha));
    const previous = lambda;
    lambda =
      L +
      (1 - C) *
        f *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM)));

    const overshoot = antipodal ? Math.abs(lambda) - Math.PI : Math.abs(lambda);
    if (overshoot > Math.PI) {
      break;
    }
    if (Math.abs(lambda - previous) <= CONVERGENCE_EPSILON) {
      converged = true;
      break;
    }
  }

  if (!converged) {
    return greatCircleDistance(from, to);
  }

  const uSq = (cosSqAlpha * (a * a - b * b)) / (b * b);
  const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
  const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
  const deltaSigma =
    B *
    sinSigma *
    (cos2SigmaM +
      (B / 4) *
        (cosSigma * (-1 + 2 * cos2SigmaM * cos2SigmaM) -
          (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma * sinSigma) * (-3 + 4 * cos2SigmaM * cos2SigmaM)));

  return b * A * (sigma - deltaSigma);
}
