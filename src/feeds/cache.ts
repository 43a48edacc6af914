/**
 * Feed Cache
 *
 * Time-windowed file cache of raw feed bodies, one JSON file per URL:
 *
 *   <data-dir>/cache/feeds/<sha256(url)>.json
 *   { "url": "...", "cachedAt": "2026-01-02T21:00:00.000Z", "body": "<feed .../>" }
 *
 * An entry older than the TTL is a miss. Contents may therefore be stale
 * by up to one TTL window. Clustering never looks at the cache; only
 * FeedSource does.
 *
 * @module feeds/cache
 */

import { createHash } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { atomicWriteJson, isNotFound } from '../storage/atomic.js';
import { silentLogger, type Logger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

const CacheEntrySchema = z.object({
  url: z.string(),
  cachedAt: z.string().datetime(),
  body: z.string(),
});

export type CacheEntry = z.infer<typeof CacheEntrySchema>;

/**
 * Options for {@link FeedCache}.
 */
export interface FeedCacheOptions {
  /** Directory holding the cache files */
  directory: string;
  /** Freshness window in seconds; 0 disables reads */
  ttlSeconds: number;
  /** Clock (default: () => new Date()) */
  now?: () => Date;
  logger?: Logger;
}

// ============================================================================
// FeedCache
// ============================================================================

export class FeedCache {
  readonly directory: string;
  readonly ttlSeconds: number;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(options: FeedCacheOptions) {
    if (!Number.isFinite(options.ttlSeconds) || options.ttlSeconds < 0) {
      throw new Error('Cache TTL must be a non-negative number of seconds');
    }
    this.directory = options.directory;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * File that holds the entry for a URL.
   */
  pathFor(url: string): string {
    const digest = createHash('sha256').update(url).digest('hex');
    return path.join(this.directory, `${digest}.json`);
  }

  /**
   * Cached body for a URL, or undefined when absent, stale or unreadable.
   */
  async get(url: string): Promise<string | undefined> {
    if (this.ttlSeconds === 0) {
      return undefined;
    }

    const filePath = this.pathFor(url);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return undefined;
      }
      throw error;
    }

    const entry = this.parseEntry(content);
    if (!entry || entry.url !== url) {
      this.logger.debug(`Ignoring unreadable cache entry ${filePath}`);
      return undefined;
    }

    const ageMs = this.now().getTime() - new Date(entry.cachedAt).getTime();
    if (ageMs < 0 || ageMs >= this.ttlSeconds * 1000) {
      return undefined;
    }

    return entry.body;
  }

  /**
   * Store a body for a URL, stamped with the current time.
   */
  async set(url: string, body: string): Promise<void> {
    const entry: CacheEntry = {
      url,
      cachedAt: this.now().toISOString(),
      body,
    };
    await atomicWriteJson(this.pathFor(url), entry);
  }

  /**
   * Delete every cache entry.
   *
   * @returns Number of entries removed
   */
  async clear(): Promise<number> {
    let files: string[];
    try {
      files = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw error;
    }

    const entries = files.filter((file) => file.endsWith('.json'));
    await Promise.all(entries.map((file) => fs.rm(path.join(this.directory, file), { force: true })));
    return entries.length;
  }

  private parseEntry(content: string): CacheEntry | undefined {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      if (error instanceof SyntaxError) {
        return undefined;
      }
      throw error;
    }
    const result = CacheEntrySchema.safeParse(raw);
    return result.success ? result.data : undefined;
  }
}
