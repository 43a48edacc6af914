/**
 * Check-in construction.
 *
 * @module events/checkin
 */

import { CheckInSchema, type CheckIn, type CheckInInput } from '../schemas/checkin.js';

/**
 * Validate and freeze a check-in.
 *
 * The timestamp is copied so later mutation of the caller's Date
 * cannot change the stored instant.
 *
 * @throws ZodError if a field is missing or out of range
 */
export function createCheckIn(input: CheckInInput): CheckIn {
  const parsed = CheckInSchema.parse(input);
  return Object.freeze({
    ...parsed,
    publishedAt: new Date(parsed.publishedAt.getTime()),
  });
}

/**
 * Like {@link createCheckIn}, but returns undefined instead of throwing.
 * Ingestion uses this to skip incomplete records.
 */
export function tryCreateCheckIn(input: Partial<CheckInInput>): CheckIn | undefined {
  const result = CheckInSchema.safeParse(input);
  if (!result.success) {
    return undefined;
  }
  return Object.freeze({
    ...result.data,
    publishedAt: new Date(result.data.publishedAt.getTime()),
  });
}
