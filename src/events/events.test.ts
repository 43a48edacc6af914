/**
 * Tests for the Events Module
 *
 * - Check-in construction and validation
 * - Author keys and ordering
 * - EventStore merge rule
 */

import { describe, it, expect } from '@jest/globals';
import { createCheckIn, tryCreateCheckIn } from './checkin.js';
import {
  compareCheckIns,
  compareEventKeys,
  encodeEventKey,
  eventKeysEqual,
  formatEventKey,
} from './key.js';
import { EventStore, updateEvents } from './store.js';
import type { CheckIn } from '../schemas/checkin.js';

// ============================================================================
// Helpers
// ============================================================================

function checkIn(
  name: string,
  publishedAt: string,
  overrides: Partial<Omit<CheckIn, 'publishedAt'>> = {}
): CheckIn {
  return createCheckIn({
    name,
    uri: `https://people.example/${name.toLowerCase()}`,
    publishedAt: new Date(publishedAt),
    latitude: 52.52,
    longitude: 13.405,
    ...overrides,
  });
}

// ============================================================================
// Check-in construction
// ============================================================================

describe('createCheckIn', () => {
  it('returns a frozen check-in', () => {
    const event = checkIn('Ada', '2024-05-01T20:00:00Z');
    expect(Object.isFrozen(event)).toBe(true);
  });

  it('copies the timestamp', () => {
    const when = new Date('2024-05-01T20:00:00Z');
    const event = createCheckIn({
      name: 'Ada',
      uri: 'https://people.example/ada',
      publishedAt: when,
      latitude: 0,
      longitude: 0,
    });

    when.setUTCFullYear(1999);
    expect(event.publishedAt.toISOString()).toBe('2024-05-01T20:00:00.000Z');
  });

  it('exposes the timestamp without setters', () => {
    type Setters = Extract<keyof CheckIn['publishedAt'], `set${string}`>;
    const readOnly: [Setters] extends [never] ? true : false = true;
    expect(readOnly).toBe(true);
  });

  it('rejects out-of-range coordinates', () => {
    expect(() => checkIn('Ada', '2024-05-01T20:00:00Z', { latitude: 91 })).toThrow();
    expect(() => checkIn('Ada', '2024-05-01T20:00:00Z', { longitude: -180.5 })).toThrow();
  });

  it('rejects an empty name', () => {
    expect(() => checkIn('', '2024-05-01T20:00:00Z')).toThrow('Author name is required');
  });
});

describe('tryCreateCheckIn', () => {
  it('returns undefined for incomplete records', () => {
    expect(tryCreateCheckIn({ name: 'Ada', latitude: 1, longitude: 2 })).toBeUndefined();
  });

  it('returns undefined for an invalid date', () => {
    expect(
      tryCreateCheckIn({
        name: 'Ada',
        uri: 'https://people.example/ada',
        publishedAt: new Date('not a date'),
        latitude: 1,
        longitude: 2,
      })
    ).toBeUndefined();
  });

  it('accepts complete records', () => {
    const event = tryCreateCheckIn({
      name: 'Ada',
      uri: 'https://people.example/ada',
      publishedAt: new Date('2024-05-01T20:00:00Z'),
      latitude: 1,
      longitude: 2,
    });
    expect(event?.latitude).toBe(1);
  });
});

// ============================================================================
// Keys
// ============================================================================

describe('event keys', () => {
  it('encodes pairs without ambiguity', () => {
    const a = encodeEventKey({ name: 'a <b>', uri: 'c' });
    const b = encodeEventKey({ name: 'a', uri: 'b> <c' });
    expect(a).not.toBe(b);
    expect(a).toBe('["a <b>","c"]');
  });

  it('formats keys for display', () => {
    expect(formatEventKey({ name: 'Ada', uri: 'https://x.example/ada' })).toBe(
      'Ada <https://x.example/ada>'
    );
  });

  it('compares names before URIs', () => {
    expect(compareEventKeys({ name: 'A', uri: 'z' }, { name: 'B', uri: 'a' })).toBeLessThan(0);
    expect(compareEventKeys({ name: 'A', uri: 'b' }, { name: 'A', uri: 'a' })).toBeGreaterThan(0);
    expect(compareEventKeys({ name: 'A', uri: 'a' }, { name: 'A', uri: 'a' })).toBe(0);
  });

  it('uses code-unit order', () => {
    // Uppercase sorts before lowercase
    expect(compareEventKeys({ name: 'Zoe', uri: 'u' }, { name: 'ada', uri: 'u' })).toBeLessThan(0);
  });

  it('tests equality on both fields', () => {
    expect(eventKeysEqual({ name: 'A', uri: 'u' }, { name: 'A', uri: 'u' })).toBe(true);
    expect(eventKeysEqual({ name: 'A', uri: 'u' }, { name: 'A', uri: 'v' })).toBe(false);
  });

  it('breaks key ties by time then coordinates', () => {
    const early = checkIn('Ada', '2024-05-01T20:00:00Z');
    const late = checkIn('Ada', '2024-05-01T21:00:00Z');
    const south = checkIn('Ada', '2024-05-01T20:00:00Z', { latitude: 10 });
    expect(compareCheckIns(early, late)).toBeLessThan(0);
    expect(compareCheckIns(south, early)).toBeLessThan(0);
    expect(compareCheckIns(early, early)).toBe(0);
  });
});

// ============================================================================
// EventStore
// ============================================================================

describe('EventStore', () => {
  it('starts empty', () => {
    const store = new EventStore();
    expect(store.size).toBe(0);
    expect(store.values()).toEqual([]);
  });

  it('keeps one check-in per author', () => {
    const store = new EventStore().update([
      checkIn('Ada', '2024-05-01T20:00:00Z'),
      checkIn('Bob', '2024-05-01T20:05:00Z'),
    ]);

    expect(store.size).toBe(2);
    expect(store.keys().map(formatEventKey)).toEqual([
      'Ada <https://people.example/ada>',
      'Bob <https://people.example/bob>',
    ]);
  });

  it('replaces a stored check-in with a newer one', () => {
    const store = new EventStore();
    store.update([checkIn('Ada', '2024-05-01T20:00:00Z', { latitude: 1 })]);
    const stats = store.merge([checkIn('Ada', '2024-05-01T21:00:00Z', { latitude: 2 })]);

    expect(stats).toEqual({ inserted: 0, replaced: 1, ignored: 0 });
    expect(store.get({ name: 'Ada', uri: 'https://people.example/ada' })?.latitude).toBe(2);
  });

  it('ignores an older check-in', () => {
    const store = new EventStore();
    store.update([checkIn('Ada', '2024-05-01T21:00:00Z', { latitude: 2 })]);
    const stats = store.merge([checkIn('Ada', '2024-05-01T20:00:00Z', { latitude: 1 })]);

    expect(stats).toEqual({ inserted: 0, replaced: 0, ignored: 1 });
    expect(store.get({ name: 'Ada', uri: 'https://people.example/ada' })?.latitude).toBe(2);
  });

  it('keeps the first of two check-ins with the same timestamp', () => {
    const store = new EventStore().update([
      checkIn('Ada', '2024-05-01T20:00:00Z', { latitude: 1 }),
      checkIn('Ada', '2024-05-01T20:00:00Z', { latitude: 2 }),
    ]);

    expect(store.size).toBe(1);
    expect(store.values()[0]?.latitude).toBe(1);
  });

  it('treats same name with different URIs as different authors', () => {
    const store = new EventStore().update([
      checkIn('Ada', '2024-05-01T20:00:00Z', { uri: 'https://a.example/ada' }),
      checkIn('Ada', '2024-05-01T20:00:00Z', { uri: 'https://b.example/ada' }),
    ]);

    expect(store.size).toBe(2);
    expect(store.has({ name: 'Ada', uri: 'https://b.example/ada' })).toBe(true);
  });

  it('does not confuse keys whose display forms collide', () => {
    const store = new EventStore().update([
      checkIn('a <b>', '2024-05-01T20:00:00Z', { uri: 'c' }),
      checkIn('a', '2024-05-01T20:00:00Z', { uri: 'b> <c' }),
    ]);
    expect(store.size).toBe(2);
  });

  it('is idempotent', () => {
    const batch = [checkIn('Ada', '2024-05-01T20:00:00Z'), checkIn('Bob', '2024-05-01T20:00:00Z')];
    const store = new EventStore().update(batch);
    const before = store.values();

    const stats = store.merge(batch);

    expect(stats).toEqual({ inserted: 0, replaced: 0, ignored: 2 });
    expect(store.values()).toEqual(before);
  });

  it('gives the same contents whatever the merge order', () => {
    const first = [checkIn('Ada', '2024-05-01T20:00:00Z', { latitude: 1 })];
    const second = [
      checkIn('Ada', '2024-05-01T22:00:00Z', { latitude: 3 }),
      checkIn('Bob', '2024-05-01T20:00:00Z'),
    ];

    const a = new EventStore().update(first).update(second);
    const b = new EventStore().update(second).update(first);

    const sorted = (store: EventStore) => [...store.values()].sort(compareCheckIns);
    expect(sorted(a)).toEqual(sorted(b));
  });

  it('accumulates totals across updates', () => {
    const store = new EventStore();
    store.update([checkIn('Ada', '2024-05-01T20:00:00Z')]);
    store.update([checkIn('Ada', '2024-05-01T21:00:00Z'), checkIn('Ada', '2024-05-01T19:00:00Z')]);

    expect(store.getStats()).toEqual({ inserted: 1, replaced: 1, ignored: 1 });
  });

  it('supports the functional update form', () => {
    const store = new EventStore();
    expect(updateEvents(store, [checkIn('Ada', '2024-05-01T20:00:00Z')])).toBe(store);
    expect(store.size).toBe(1);
  });
});
