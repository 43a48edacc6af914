/**
 * partycluster
 *
 * Library entry point. The CLI lives in `cli/`; everything here is free
 * of console output and process exits.
 *
 * @example
 * ```typescript
 * import { EventStore, clusterEvents, selectParties } from 'partycluster';
 *
 * const store = new EventStore().update(checkIns);
 * const parties = selectParties(clusterEvents(store.values(), 100));
 * ```
 *
 * @module partycluster
 */

export * from './schemas/index.js';
export * from './events/index.js';
export * from './spacetime/index.js';
export * from './clustering/index.js';
export * from './report/index.js';
export * from './feeds/index.js';
export * from './geocode/index.js';
export * from './pipeline/index.js';
export { getDataDir, getCacheDir, getFeedCacheDir } from './storage/index.js';
export { ConcurrencyLimiter, type ConcurrencyStats } from './net/concurrency.js';
export { defaultFetch, type FetchInit, type FetchLike } from './net/fetch.js';
export { silentLogger, type Logger } from './logging/logger.js';
