/**
 * Party Announcements
 *
 * Turns cluster summaries into one line of text each:
 *
 *   Possible party with Ann, Ben and Cem within 89 meters of Kreuzberg
 *   (21:58, 22:03, 22:10).
 *
 * Place names are resolved here, after clustering is final, once per
 * distinct member coordinate. A failed lookup degrades to printing the
 * coordinates.
 *
 * @module report/announcement
 */

import type { Coordinates, Instant } from '../schemas/checkin.js';
import { GeocodeError, type Geocoder } from '../geocode/client.js';
import { ConcurrencyLimiter } from '../net/concurrency.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import { distinctCoordinates, type ClusterSummary } from './summary.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for announcement formatting.
 */
export interface AnnouncementOptions {
  /** IANA time zone for clock times (default: 'UTC') */
  timeZone?: string;
}

/**
 * Options for {@link announceParties}.
 */
export interface AnnounceOptions extends AnnouncementOptions {
  /** Reverse geocoder; coordinates are printed when absent */
  geocoder?: Geocoder;
  /** Limits simultaneous geocoding requests */
  limiter?: ConcurrencyLimiter;
  logger?: Logger;
}

/**
 * One reported party.
 */
export interface PartyAnnouncement {
  summary: ClusterSummary;
  /** Place name per distinct member coordinate */
  placeNames: string[];
  /** Human-readable announcement */
  text: string;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Join items as natural-language list: "A", "A and B", "A, B and C".
 */
export function formatList(items: readonly string[]): string {
  if (items.length === 0) return '';
  if (items.length === 1) return items[0];
  return `${items.slice(0, -1).join(', ')} and ${items[items.length - 1]}`;
}

/**
 * 24-hour clock time, e.g. "09:05".
 */
export function formatClockTime(date: Instant, timeZone = 'UTC'): string {
  return new Intl.DateTimeFormat('en-GB', {
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
    timeZone,
  }).format(date.getTime());
}

/**
 * Coordinates as "lat,lng", used when no place name is available.
 */
export function formatCoordinates(coordinates: Coordinates): string {
  return `${coordinates.latitude},${coordinates.longitude}`;
}

/**
 * Announcement text for one cluster.
 *
 * @param placeNames - Place names of the members; duplicates are collapsed
 */
export function describeCluster(
  summary: ClusterSummary,
  placeNames: readonly string[],
  options: AnnouncementOptions = {}
): string {
  const places = [...new Set(placeNames)];
  const times = summary.members.map((m) => formatClockTime(m.publishedAt, options.timeZone));
  const radius = Math.trunc(summary.maxSpatialDistance);

  return (
    `Possible party with ${formatList(summary.names)} ` +
    `within ${radius} meters of ${formatList(places)} ` +
    `(${times.join(', ')}).`
  );
}

// ============================================================================
// Place Names
// ============================================================================

/**
 * Resolve a place name for each distinct member coordinate.
 *
 * GeocodeErrors are logged and replaced by the coordinates; any other
 * error propagates.
 */
export async function resolvePlaceNames(
  summary: ClusterSummary,
  options: Pick<AnnounceOptions, 'geocoder' | 'limiter' | 'logger'> = {}
): Promise<string[]> {
  const coordinates = distinctCoordinates(summary);
  const { geocoder, limiter } = options;
  const logger = options.logger ?? silentLogger;

  if (!geocoder) {
    return coordinates.map(formatCoordinates);
  }

  const lookup = async (point: Coordinates): Promise<string> => {
    try {
      return await geocoder.placeName(point.latitude, point.longitude);
    } catch (error) {
      if (error instanceof GeocodeError) {
        logger.warn(`Could not name ${formatCoordinates(point)}: ${error.message}`);
        return formatCoordinates(point);
      }
      throw error;
    }
  };

  return Promise.all(
    coordinates.map((point) => (limiter ? limiter.run(() => lookup(point)) : lookup(point)))
  );
}

/**
 * Build announcements for every party, in order.
 *
 * @example
 * ```typescript
 * const announcements = await announceParties(result.parties, {
 *   geocoder: new MemoizedGeocoder(new GeoNamesClient({ username })),
 * });
 * for (const a of announcements) console.log(a.text);
 * ```
 */
export async function announceParties(
  parties: readonly ClusterSummary[],
  options: AnnounceOptions = {}
): Promise<PartyAnnouncement[]> {
  const announcements: PartyAnnouncement[] = [];

  for (const summary of parties) {
    const placeNames = await resolvePlaceNames(summary, options);
    announcements.push({
      summary,
      placeNames,
      text: describeCluster(summary, placeNames, options),
    });
  }

  return announcements;
}
