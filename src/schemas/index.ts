/**
 * Schema Exports
 *
 * Zod schemas and inferred types shared across modules.
 *
 * @module schemas
 */

export {
  LatitudeSchema,
  LongitudeSchema,
  CoordinatesSchema,
  CheckInSchema,
  ThresholdSchema,
  type Coordinates,
  type CheckInInput,
  type Instant,
  type CheckIn,
} from './checkin.js';
