/**
 * Pipeline Executor
 *
 * Runs ingestion, clustering and party selection over a feed list.
 *
 * Feeds are downloaded concurrently; each result is merged into the event
 * store as it arrives. The merge keeps the newest check-in per author, so
 * arrival order does not affect the store. Clustering starts only after
 * every feed has settled.
 *
 * A feed that fails is logged and recorded in the result; the run
 * continues with the others.
 *
 * @module pipeline/executor
 */

import { EventStore } from '../events/store.js';
import { clusterEvents, assertThreshold } from '../clustering/index.js';
import { selectParties, DEFAULT_MIN_PARTY_SIZE } from '../report/summary.js';
import { FeedError } from '../feeds/client.js';
import { ConcurrencyLimiter } from '../net/concurrency.js';
import { silentLogger } from '../logging/logger.js';
import type {
  FailedFeed,
  PartyRunDependencies,
  PartyRunOptions,
  PartyRunResult,
  StageName,
} from './types.js';

const DEFAULT_CONCURRENCY = 4;

/**
 * Detect parties in a set of feeds.
 *
 * @throws RangeError for an invalid threshold, before any feed is loaded
 * @throws Error if minSize is not a positive integer
 *
 * @example
 * ```typescript
 * const result = await runPartyDetection(
 *   { feedUrls: await readFeedList('feeds.txt'), threshold: 100 },
 *   { loader: new FeedSource({ cache }) }
 * );
 * console.log(`${result.parties.length} parties among ${result.eventCount} people`);
 * ```
 */
export async function runPartyDetection(
  options: PartyRunOptions,
  deps: PartyRunDependencies
): Promise<PartyRunResult> {
  const { feedUrls, threshold } = options;
  const minSize = options.minSize ?? DEFAULT_MIN_PARTY_SIZE;
  const logger = deps.logger ?? silentLogger;

  assertThreshold(threshold);
  if (!Number.isInteger(minSize) || minSize < 1) {
    throw new Error('Minimum party size must be a positive integer');
  }

  const startedAt = Date.now();
  const perStage: Record<StageName, number> = { ingest: 0, cluster: 0, select: 0 };

  // Stage: ingest
  let stageStart = Date.now();
  const store = new EventStore();
  const limiter = new ConcurrencyLimiter(options.concurrency ?? DEFAULT_CONCURRENCY);
  const failedFeeds: FailedFeed[] = [];
  let cachedFeeds = 0;
  let skippedRecords = 0;
  let completed = 0;

  await Promise.all(
    feedUrls.map((url) =>
      limiter.run(async () => {
        let failed = false;
        try {
          const loaded = await deps.loader.load(url);
          const stats = store.merge(loaded.events);
          skippedRecords += loaded.skipped;
          if (loaded.fromCache) cachedFeeds++;
          logger.debug(
            `${url}: ${loaded.events.length} check-ins ` +
              `(${stats.inserted} new, ${stats.replaced} newer, ${loaded.skipped} skipped)`
          );
        } catch (error) {
          if (!(error instanceof FeedError)) {
            throw error;
          }
          failed = true;
          failedFeeds.push({ url, error: error.message });
          logger.warn(`Skipping feed: ${error.message}`);
        }
        completed++;
        options.onFeedSettled?.({ url, completed, total: feedUrls.length, failed });
      })
    )
  );
  perStage.ingest = Date.now() - stageStart;

  // Stage: cluster
  stageStart = Date.now();
  const events = store.values();
  logger.debug(`Clustering ${events.length} check-ins at threshold ${threshold}`);
  const clusters = clusterEvents(events, threshold);
  perStage.cluster = Date.now() - stageStart;

  // Stage: select
  stageStart = Date.now();
  const parties = selectParties(clusters, minSize);
  perStage.select = Date.now() - stageStart;

  // Report failures in feed list order
  const order = new Map(feedUrls.map((url, index) => [url, index]));
  failedFeeds.sort((a, b) => (order.get(a.url) ?? 0) - (order.get(b.url) ?? 0));

  return {
    threshold,
    minSize,
    feedCount: feedUrls.length,
    cachedFeeds,
    failedFeeds,
    eventCount: store.size,
    skippedRecords,
    clusters,
    parties,
    timing: {
      perStage,
      totalMs: Date.now() - startedAt,
    },
  };
}
