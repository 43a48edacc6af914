/**
 * Feed Source
 *
 * Ingestion collaborator of the clustering core: given a feed URL, yields
 * the check-ins it contains. Consults the feed cache first, downloads on
 * a miss, and caches only bodies that parsed as Atom. Cache failures
 * are logged as warnings and never fail a load.
 *
 * @module feeds/source
 */

import type { CheckIn } from '../schemas/checkin.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { FeedCache } from './cache.js';
import { FeedClient, FeedError } from './client.js';
import { FeedFormatError, parseAtomFeed } from './parser.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Check-ins read from one feed.
 */
export interface FeedLoadResult {
  url: string;
  events: CheckIn[];
  /** Entries skipped as incomplete */
  skipped: number;
  /** Whether the body came from the cache */
  fromCache: boolean;
}

/**
 * Anything that can turn a feed URL into check-ins.
 */
export interface FeedLoader {
  load(url: string): Promise<FeedLoadResult>;
}

/**
 * Options for {@link FeedSource}.
 */
export interface FeedSourceOptions {
  client?: FeedClient;
  /** Cache to consult; omit to always download */
  cache?: FeedCache;
  logger?: Logger;
}

// ============================================================================
// FeedSource
// ============================================================================

export class FeedSource implements FeedLoader {
  private readonly client: FeedClient;
  private readonly cache: FeedCache | undefined;
  private readonly logger: Logger;

  constructor(options: FeedSourceOptions = {}) {
    this.client = options.client ?? new FeedClient();
    this.cache = options.cache;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Load the check-ins of one feed.
   *
   * @throws FeedError if the feed cannot be downloaded or is not Atom
   */
  async load(url: string): Promise<FeedLoadResult> {
    const cached = await this.readCache(url);

    if (cached !== undefined) {
      this.logger.debug(`Cache hit: ${url}`);
      return { url, fromCache: true, ...this.parse(url, cached) };
    }

    const body = await this.client.fetchFeed(url);
    const parsed = this.parse(url, body);
    await this.writeCache(url, body);

    return { url, fromCache: false, ...parsed };
  }

  /**
   * Cached body, or undefined. A cache that cannot be read counts as a miss.
   */
  private async readCache(url: string): Promise<string | undefined> {
    if (!this.cache) {
      return undefined;
    }
    try {
      return await this.cache.get(url);
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      this.logger.warn(`Feed cache unreadable, downloading ${url}: ${error.message}`);
      return undefined;
    }
  }

  /**
   * Store a body; a failed write is logged and the body is not cached.
   */
  private async writeCache(url: string, body: string): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set(url, body);
    } catch (error) {
      if (!(error instanceof Error)) {
        throw error;
      }
      this.logger.warn(`Could not cache ${url}: ${error.message}`);
    }
  }

  private parse(url: string, body: string): Pick<FeedLoadResult, 'events' | 'skipped'> {
    try {
      const { events, skipped, total } = parseAtomFeed(body);
      this.logger.debug(`${url}: ${events.length} of ${total} entries usable`);
      return { events, skipped };
    } catch (error) {
      if (error instanceof FeedFormatError) {
        throw new FeedError(`${error.message}: ${url}`, url, 422, false);
      }
      throw error;
    }
  }
}
