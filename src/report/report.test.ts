/**
 * Tests for the Reporting Module
 *
 * - Cluster summaries and party selection
 * - Announcement formatting
 * - Place name resolution with a fake geocoder
 */

import { describe, it, expect } from '@jest/globals';
import { createCheckIn } from '../events/checkin.js';
import { GeocodeError, type Geocoder } from '../geocode/client.js';
import { ConcurrencyLimiter } from '../net/concurrency.js';
import type { Logger } from '../logging/logger.js';
import type { CheckIn } from '../schemas/checkin.js';
import { summarizeCluster, selectParties, distinctCoordinates } from './summary.js';
import {
  formatList,
  formatClockTime,
  formatCoordinates,
  describeCluster,
  resolvePlaceNames,
  announceParties,
} from './announcement.js';

// ============================================================================
// Helpers
// ============================================================================

function person(name: string, longitude: number, time: string): CheckIn {
  return createCheckIn({
    name,
    uri: `https://people.example/${name.toLowerCase()}`,
    publishedAt: new Date(`2024-06-01T${time}Z`),
    latitude: 0,
    longitude,
  });
}

const ada = person('Ada', 0, '22:00:00');
const ben = person('Ben', 0.0004, '22:01:00');
const cleo = person('Cleo', 0.0008, '22:02:00');

/**
 * Geocoder that names places by longitude and records its calls.
 */
function fakeGeocoder(
  names: Record<string, string>,
  failing: readonly number[] = []
): Geocoder & { calls: string[] } {
  const calls: string[] = [];
  return {
    calls,
    async placeName(latitude: number, longitude: number): Promise<string> {
      calls.push(`${latitude},${longitude}`);
      if (failing.includes(longitude)) {
        throw new GeocodeError('No place found', 404, false);
      }
      return names[String(longitude)] ?? 'Somewhere';
    },
  };
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: () => undefined,
    info: () => undefined,
    warn: (message: string) => {
      warnings.push(message);
    },
  };
}

// ============================================================================
// Summaries
// ============================================================================

describe('summarizeCluster', () => {
  it('orders members by time', () => {
    const summary = summarizeCluster([cleo, ada, ben]);
    expect(summary.names).toEqual(['Ada', 'Ben', 'Cleo']);
    expect(summary.participants[0]).toBe('Ada <https://people.example/ada>');
  });

  it('orders simultaneous members by key', () => {
    const bob = person('Bob', 0, '22:00:00');
    const amy = person('Amy', 0, '22:00:00');
    expect(summarizeCluster([bob, amy]).names).toEqual(['Amy', 'Bob']);
  });

  it('reports extent and time span', () => {
    const summary = summarizeCluster([ada, ben, cleo]);
    expect(Math.trunc(summary.maxSpatialDistance)).toBe(89);
    expect(summary.maxTemporalDistance).toBe(120);
    expect(summary.startedAt.toISOString()).toBe('2024-06-01T22:00:00.000Z');
    expect(summary.endedAt.toISOString()).toBe('2024-06-01T22:02:00.000Z');
  });

  it('rejects an empty cluster', () => {
    expect(() => summarizeCluster([])).toThrow('Cannot summarize an empty cluster');
  });
});

describe('selectParties', () => {
  const clusters = [[ada, ben, cleo], [person('Dan', 50, '20:00:00')], [ada, ben]];

  it('keeps clusters with more than two members by default', () => {
    expect(selectParties(clusters).map((p) => p.names)).toEqual([['Ada', 'Ben', 'Cleo']]);
  });

  it('honours a custom minimum', () => {
    expect(selectParties(clusters, 2)).toHaveLength(2);
    expect(selectParties(clusters, 4)).toEqual([]);
  });
});

describe('distinctCoordinates', () => {
  it('collapses repeated coordinates', () => {
    const twin = person('Zed', 0, '22:05:00');
    expect(distinctCoordinates(summarizeCluster([ada, twin, ben]))).toEqual([
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 0.0004 },
    ]);
  });
});

// ============================================================================
// Formatting
// ============================================================================

describe('formatList', () => {
  it('joins naturally', () => {
    expect(formatList([])).toBe('');
    expect(formatList(['A'])).toBe('A');
    expect(formatList(['A', 'B'])).toBe('A and B');
    expect(formatList(['A', 'B', 'C'])).toBe('A, B and C');
  });
});

describe('formatClockTime', () => {
  it('prints a 24-hour time in UTC by default', () => {
    expect(formatClockTime(new Date('2024-06-01T09:05:00Z'))).toBe('09:05');
    expect(formatClockTime(new Date('2024-06-01T00:30:00Z'))).toBe('00:30');
  });

  it('converts to the requested time zone', () => {
    expect(formatClockTime(new Date('2024-06-01T22:00:00Z'), 'Asia/Tokyo')).toBe('07:00');
  });
});

describe('formatCoordinates', () => {
  it('prints latitude before longitude', () => {
    expect(formatCoordinates({ latitude: 52.5, longitude: -0.25 })).toBe('52.5,-0.25');
  });
});

describe('describeCluster', () => {
  it('builds the announcement line', () => {
    const summary = summarizeCluster([ada, ben, cleo]);
    expect(describeCluster(summary, ['Mitte', 'Mitte', 'Wedding'], { timeZone: 'UTC' })).toBe(
      'Possible party with Ada, Ben and Cleo within 89 meters of Mitte and Wedding (22:00, 22:01, 22:02).'
    );
  });
});

// ============================================================================
// Place names
// ============================================================================

describe('resolvePlaceNames', () => {
  const summary = summarizeCluster([ada, ben, cleo]);

  it('prints coordinates without a geocoder', async () => {
    expect(await resolvePlaceNames(summary)).toEqual(['0,0', '0,0.0004', '0,0.0008']);
  });

  it('looks up each distinct coordinate once', async () => {
    const geocoder = fakeGeocoder({ '0': 'Mitte', '0.0004': 'Mitte', '0.0008': 'Wedding' });
    const twin = summarizeCluster([ada, person('Zed', 0, '22:05:00')]);

    expect(await resolvePlaceNames(twin, { geocoder })).toEqual(['Mitte']);
    expect(geocoder.calls).toEqual(['0,0']);
  });

  it('falls back to coordinates when a lookup fails', async () => {
    const geocoder = fakeGeocoder({ '0': 'Mitte', '0.0008': 'Wedding' }, [0.0004]);
    const logger = recordingLogger();

    expect(await resolvePlaceNames(summary, { geocoder, logger })).toEqual([
      'Mitte',
      '0,0.0004',
      'Wedding',
    ]);
    expect(logger.warnings).toEqual(['Could not name 0,0.0004: No place found']);
  });

  it('propagates unexpected errors', async () => {
    const geocoder: Geocoder = {
      placeName: async () => {
        throw new TypeError('boom');
      },
    };
    await expect(resolvePlaceNames(summary, { geocoder })).rejects.toThrow('boom');
  });

  it('respects the limiter', async () => {
    const limiter = new ConcurrencyLimiter(1);
    let inFlight = 0;
    let peak = 0;
    const geocoder: Geocoder = {
      placeName: async () => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight--;
        return 'Mitte';
      },
    };

    await resolvePlaceNames(summary, { geocoder, limiter });
    expect(peak).toBe(1);
  });
});

describe('announceParties', () => {
  it('announces every party in order', async () => {
    const geocoder = fakeGeocoder({ '0': 'Mitte', '0.0004': 'Mitte', '0.0008': 'Wedding' });
    const parties = selectParties([
      [ada, ben, cleo],
      [person('Dan', 10, '23:00:00'), person('Eve', 10, '23:00:30'), person('Fay', 10, '23:00:45')],
    ]);

    const announcements = await announceParties(parties, { geocoder, timeZone: 'UTC' });

    expect(announcements.map((a) => a.text)).toEqual([
      'Possible party with Ada, Ben and Cleo within 89 meters of Mitte and Wedding (22:00, 22:01, 22:02).',
      'Possible party with Dan, Eve and Fay within 0 meters of Somewhere (23:00, 23:00, 23:00).',
    ]);
    expect(announcements[1].placeNames).toEqual(['Somewhere']);
  });

  it('returns nothing for no parties', async () => {
    expect(await announceParties([])).toEqual([]);
  });
});
