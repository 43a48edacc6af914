/**
 * Event Keys
 *
 * An author is identified by the pair (name, identity URI). The pair is
 * kept structured; the map key is an unambiguous encoding of it, so a
 * name that itself contains " <" or ">" can never collide with another
 * author.
 *
 * @module events/key
 */

import type { CheckIn } from '../schemas/checkin.js';

/**
 * Dedup key of one author's timeline.
 */
export interface EventKey {
  readonly name: string;
  readonly uri: string;
}

/**
 * Extract the dedup key of a check-in.
 */
export function eventKeyOf(event: Pick<CheckIn, 'name' | 'uri'>): EventKey {
  return { name: event.name, uri: event.uri };
}

/**
 * Encode a key as a string usable in a Map.
 *
 * JSON array encoding escapes quotes and backslashes, so two distinct
 * pairs always encode to distinct strings.
 *
 * @example
 * ```typescript
 * encodeEventKey({ name: 'a <b>', uri: 'c' }); // '["a <b>","c"]'
 * encodeEventKey({ name: 'a', uri: 'b> <c' }); // '["a","b> <c"]'
 * ```
 */
export function encodeEventKey(key: EventKey): string {
  return JSON.stringify([key.name, key.uri]);
}

/**
 * Human-readable form, `name <uri>`. For display only.
 */
export function formatEventKey(key: EventKey): string {
  return `${key.name} <${key.uri}>`;
}

export function eventKeysEqual(a: EventKey, b: EventKey): boolean {
  return a.name === b.name && a.uri === b.uri;
}

/**
 * Plain code-unit comparison of two strings.
 * Unlike localeCompare, the result does not depend on the host's ICU data.
 */
function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order keys by name, then by URI.
 */
export function compareEventKeys(a: EventKey, b: EventKey): number {
  return compareStrings(a.name, b.name) || compareStrings(a.uri, b.uri);
}

/**
 * Total order over check-ins: key, then publication time, then coordinates.
 *
 * Used wherever output order must be reproducible.
 */
export function compareCheckIns(a: CheckIn, b: CheckIn): number {
  return (
    compareEventKeys(a, b) ||
    a.publishedAt.getTime() - b.publishedAt.getTime() ||
    a.latitude - b.latitude ||
    a.longitude - b.longitude
  );
}
