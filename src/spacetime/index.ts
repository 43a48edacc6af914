/**
 * Space-Time Module
 *
 * @module spacetime
 */

export {
  WGS84,
  WGS84_MEAN_RADIUS,
  geodesicDistance,
  greatCircleDistance,
} from './geodesic.js';

export {
  CAUSAL_SPEED_MPS,
  type Located,
  type Timed,
  type DistanceFn,
  spatialDistance,
  temporalDistance,
  spacelikeInterval,
  maximumPairwise,
  maximumSpatialDistance,
  maximumTemporalDistance,
} from './metric.js';
