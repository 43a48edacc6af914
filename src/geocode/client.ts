/**
 * GeoNames Reverse Geocoding Client
 *
 * Resolves coordinates to the name of the nearest populated place using
 * the GeoNames `findNearbyPlaceNameJSON` web service.
 *
 * Only used for reporting, after cluster membership is final.
 *
 * @module geocode/client
 * @see https://www.geonames.org/export/web-services.html#findNearbyPlaceName
 */

import { z } from 'zod';
import { defaultFetch, type FetchLike } from '../net/fetch.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Anything that can name a place.
 */
export interface Geocoder {
  placeName(latitude: number, longitude: number): Promise<string>;
}

/**
 * Options for the GeoNames client.
 */
export interface GeoNamesClientOptions {
  /** GeoNames account name */
  username: string;
  /** API base URL (default: http://api.geonames.org) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** fetch implementation (default: global fetch) */
  fetchImpl?: FetchLike;
}

/**
 * Reverse geocoding failure.
 */
export class GeocodeError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'GeocodeError';
  }
}

// ============================================================================
// API Response Schema (Internal)
// ============================================================================

/**
 * GeoNames answers errors with HTTP 200 and a `status` object.
 */
const GeoNamesResponseSchema = z.object({
  geonames: z
    .array(
      z.object({
        toponymName: z.string(),
        name: z.string().optional(),
        countryName: z.string().optional(),
      })
    )
    .optional(),
  status: z
    .object({
      message: z.string(),
      value: z.number(),
    })
    .optional(),
});

/**
 * GeoNames status codes that may succeed on a later attempt.
 * 13: database timeout, 18/19/20: credit limits, 22: server overloaded
 */
const RETRYABLE_STATUS_CODES = new Set([13, 18, 19, 20, 22]);

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  baseUrl: 'http://api.geonames.org',
  timeoutMs: 10000,
} as const;

// ============================================================================
// Client
// ============================================================================

/**
 * GeoNames client.
 *
 * @example
 * ```typescript
 * const geocoder = new GeoNamesClient({ username: 'demo' });
 * await geocoder.placeName(52.52, 13.405); // 'Berlin'
 * ```
 */
export class GeoNamesClient implements Geocoder {
  private readonly username: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: GeoNamesClientOptions) {
    if (!options.username) {
      throw new Error('GeoNames username is required');
    }
    this.username = options.username;
    this.baseUrl = (options.baseUrl ?? DEFAULTS.baseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  /**
   * Name of the populated place nearest to the coordinates.
   *
   * @throws GeocodeError on HTTP, API or network failure, or when
   *         no place is found
   */
  async placeName(latitude: number, longitude: number): Promise<string> {
    const params = new URLSearchParams({
      lat: String(latitude),
      lng: String(longitude),
      username: this.username,
    });
    const url = `${this.baseUrl}/findNearbyPlaceNameJSON?${params.toString()}`;

    const response = await this.fetchWithTimeout(url);

    if (!response.ok) {
      throw new GeocodeError(
        `GeoNames request failed with HTTP ${response.status}`,
        response.status,
        response.status === 429 || response.status >= 500
      );
    }

    const parsed = GeoNamesResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new GeocodeError('Unexpected GeoNames response format', 502, false);
    }

    const { geonames, status } = parsed.data;
    if (status) {
      throw new GeocodeError(
        `GeoNames error ${status.value}: ${status.message}`,
        400,
        RETRYABLE_STATUS_CODES.has(status.value)
      );
    }

    const nearest = geonames?.[0];
    if (!nearest) {
      throw new GeocodeError(`No place found near ${latitude},${longitude}`, 404, false);
    }

    return nearest.toponymName;
  }

  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await this.fetchImpl(url, { signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new GeocodeError(`Request timed out after ${this.timeoutMs}ms`, 408, true);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new GeocodeError(`Network error: ${message}`, 0, true);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
