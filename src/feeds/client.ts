/**
 * Feed HTTP Client
 *
 * Downloads raw feed documents. Handles request timeouts and maps every
 * failure to a FeedError carrying the URL and a retryable flag.
 *
 * @module feeds/client
 */

import { defaultFetch, type FetchLike } from '../net/fetch.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the feed client.
 */
export interface FeedClientOptions {
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** User-Agent header sent with every request */
  userAgent?: string;
  /** fetch implementation (default: global fetch) */
  fetchImpl?: FetchLike;
}

/**
 * A feed could not be downloaded or parsed.
 */
export class FeedError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'FeedError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULTS = {
  timeoutMs: 10000,
  userAgent: 'partycluster/1.0',
} as const;

const ACCEPT = 'application/atom+xml, application/xml;q=0.9, text/xml;q=0.8, */*;q=0.1';

// ============================================================================
// Client
// ============================================================================

export class FeedClient {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: FeedClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.userAgent = options.userAgent ?? DEFAULTS.userAgent;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
  }

  /**
   * Download a feed document.
   *
   * @returns Response body as text
   * @throws FeedError on invalid URL, timeout, network or HTTP error
   */
  async fetchFeed(url: string): Promise<string> {
    if (!isHttpUrl(url)) {
      throw new FeedError(`Not an http(s) URL: ${url}`, url, 400, false);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: { Accept: ACCEPT, 'User-Agent': this.userAgent },
      });

      if (!response.ok) {
        throw new FeedError(
          `HTTP ${response.status} for ${url}`,
          url,
          response.status,
          response.status === 429 || response.status >= 500
        );
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FeedError) {
        throw error;
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new FeedError(`Request timed out after ${this.timeoutMs}ms: ${url}`, url, 408, true);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FeedError(`Network error for ${url}: ${message}`, url, 0, true);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch (error) {
    if (error instanceof TypeError) {
      return false;
    }
    throw error;
  }
}
