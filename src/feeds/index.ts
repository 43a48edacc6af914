/**
 * Feeds Module
 *
 * Reading feed lists, downloading and caching feeds, and parsing them
 * into check-ins.
 *
 * @module feeds
 */

export { FeedListError, parseFeedList, readFeedList } from './list.js';
export { FeedClient, FeedError, type FeedClientOptions } from './client.js';
export { FeedCache, type CacheEntry, type FeedCacheOptions } from './cache.js';
export { FeedFormatError, parseAtomFeed, parsePoint, type FeedParseResult } from './parser.js';
export {
  FeedSource,
  type FeedLoader,
  type FeedLoadResult,
  type FeedSourceOptions,
} from './source.js';
