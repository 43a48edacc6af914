/**
 * Check-in Schemas
 *
 * A check-in is one geotagged, timestamped post by one author. It is the
 * only record type the clustering core works with.
 *
 * @module schemas/checkin
 */

import { z } from 'zod';

// ============================================
// Coordinates
// ============================================

/**
 * Latitude in decimal degrees (WGS84).
 */
export const LatitudeSchema = z.number().finite().min(-90).max(90);

/**
 * Longitude in decimal degrees (WGS84).
 */
export const LongitudeSchema = z.number().finite().min(-180).max(180);

export const CoordinatesSchema = z.object({
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
});

export type Coordinates = z.infer<typeof CoordinatesSchema>;

// ============================================
// CheckIn
// ============================================

/**
 * A single check-in.
 *
 * - `name`: display name of the author
 * - `uri`: canonical identity URI of the author; together with `name`
 *   this identifies one author's timeline
 * - `publishedAt`: the instant the check-in was published
 */
export const CheckInSchema = z.object({
  name: z.string().min(1, 'Author name is required'),
  uri: z.string().min(1, 'Author URI is required'),
  publishedAt: z.date().refine((d) => !Number.isNaN(d.getTime()), {
    message: 'publishedAt must be a valid date',
  }),
  latitude: LatitudeSchema,
  longitude: LongitudeSchema,
});

export type CheckInInput = z.infer<typeof CheckInSchema>;

/**
 * A Date without its setters.
 */
export type Instant = Omit<Date, `set${string}`>;

/**
 * Check-ins never change after construction. Replacing the stored
 * check-in for an author is the only way to "update" one.
 */
export type CheckIn = Readonly<Omit<CheckInInput, 'publishedAt'>> & {
  /** Own copy of the caller's Date, exposed without setters */
  readonly publishedAt: Instant;
};

// ============================================
// Threshold
// ============================================

/**
 * Clustering cutoff in meters-equivalent units (causal speed 1 m/s).
 */
export const ThresholdSchema = z
  .number({ invalid_type_error: 'Threshold must be a number' })
  .finite('Threshold must be finite')
  .nonnegative('Threshold must not be negative');

export type Threshold = z.infer<typeof ThresholdSchema>;
