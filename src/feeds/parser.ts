/**
 * Atom + GeoRSS Parser
 *
 * Extracts check-ins from an Atom feed whose entries carry a GeoRSS
 * location:
 *
 * ```xml
 * <feed xmlns="http://www.w3.org/2005/Atom" xmlns:georss="http://www.georss.org/georss">
 *   <entry>
 *     <author><name>Ann</name><uri>https://example.org/ann</uri></author>
 *     <published>2026-01-02T21:58:00+01:00</published>
 *     <georss:point>52.4987 13.4180</georss:point>
 *   </entry>
 * </feed>
 * ```
 *
 * Namespace prefixes are stripped, so any prefix bound to the GeoRSS
 * namespace works. GML-style `georss:where/gml:Point/gml:pos` is accepted
 * as well.
 *
 * Entries without author name, author URI, a valid position or a
 * timestamp (`published`, falling back to `updated`) are skipped and
 * counted; they never reach the event store.
 *
 * @module feeds/parser
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import type { CheckIn } from '../schemas/checkin.js';
import { tryCreateCheckIn } from '../events/checkin.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of parsing one feed document.
 */
export interface FeedParseResult {
  /** Usable check-ins, in document order */
  events: CheckIn[];
  /** Entries that were skipped as incomplete */
  skipped: number;
  /** Total number of entries in the document */
  total: number;
}

/**
 * The document is not well-formed XML or not an Atom feed.
 */
export class FeedFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FeedFormatError';
  }
}

// ============================================================================
// Document Schemas (Internal)
// ============================================================================

const TextSchema = z.string().trim().min(1);

const DocumentSchema = z.object({
  feed: z.union([
    z.literal(''),
    z.object({
      entry: z.array(z.unknown()).optional(),
    }),
  ]),
});

const AuthorSchema = z.object({
  name: TextSchema,
  uri: TextSchema,
});

const EntrySchema = z.object({
  author: z.array(z.unknown()).min(1),
  point: TextSchema.optional(),
  where: z
    .object({
      Point: z.object({ pos: TextSchema }),
    })
    .optional(),
  published: TextSchema.optional(),
  updated: TextSchema.optional(),
});

// ============================================================================
// Parser
// ============================================================================

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  // Decodes numeric references (&#233;, &#xE9;) along with named ones
  htmlEntities: true,
  isArray: (tagName: string) => tagName === 'entry' || tagName === 'author',
});

/**
 * Parse a "lat lng" pair as used by GeoRSS.
 */
export function parsePoint(text: string): { latitude: number; longitude: number } | undefined {
  const parts = text.trim().split(/\s+/);
  if (parts.length !== 2) {
    return undefined;
  }

  const latitude = Number(parts[0]);
  const longitude = Number(parts[1]);
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    return undefined;
  }

  return { latitude, longitude };
}

/**
 * Convert one parsed entry node into a check-in.
 */
function entryToCheckIn(node: unknown): CheckIn | undefined {
  const entry = EntrySchema.safeParse(node);
  if (!entry.success) {
    return undefined;
  }

  // Atom allows several authors; the first one owns the check-in
  const author = AuthorSchema.safeParse(entry.data.author[0]);
  if (!author.success) {
    return undefined;
  }

  const pointText = entry.data.point ?? entry.data.where?.Point.pos;
  const position = pointText === undefined ? undefined : parsePoint(pointText);
  if (!position) {
    return undefined;
  }

  const timestamp = entry.data.published ?? entry.data.updated;
  if (timestamp === undefined) {
    return undefined;
  }

  return tryCreateCheckIn({
    name: author.data.name,
    uri: author.data.uri,
    publishedAt: new Date(timestamp),
    latitude: position.latitude,
    longitude: position.longitude,
  });
}

/**
 * Extract check-ins from an Atom document.
 *
 * @param xml - Raw feed body
 * @throws FeedFormatError if the body is not well-formed XML or has no
 *         Atom `feed` root
 */
export function parseAtomFeed(xml: string): FeedParseResult {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new FeedFormatError(`Malformed XML at line ${line}: ${msg}`);
  }

  const document = DocumentSchema.safeParse(xmlParser.parse(xml));
  if (!document.success) {
    throw new FeedFormatError('Document is not an Atom feed');
  }

  const feed = document.data.feed;
  const entries = feed === '' ? [] : feed.entry ?? [];

  const events: CheckIn[] = [];
  for (const node of entries) {
    const event = entryToCheckIn(node);
    if (event) {
      events.push(event);
    }
  }

  return {
    events,
    skipped: entries.length - events.length,
    total: entries.length,
  };
}
