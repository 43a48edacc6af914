/**
 * Per-run memoization of place names.
 *
 * @module geocode/memo
 */

import type { Geocoder } from './client.js';

/**
 * Wraps a geocoder so each distinct coordinate is looked up once.
 *
 * Concurrent requests for the same coordinate share one lookup. Failed
 * lookups are forgotten so a later call can try again.
 */
export class MemoizedGeocoder implements Geocoder {
  private readonly cache = new Map<string, Promise<string>>();

  constructor(private readonly inner: Geocoder) {}

  placeName(latitude: number, longitude: number): Promise<string> {
    const key = `${latitude},${longitude}`;
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const pending = this.inner.placeName(latitude, longitude).catch((error: unknown) => {
      this.cache.delete(key);
      throw error;
    });
    this.cache.set(key, pending);
    return pending;
  }

  /**
   * Number of distinct coordinates looked up (or in flight).
   */
  get size(): number {
    return this.cache.size;
  }
}
