/**
 * Detect Command
 *
 * Default command: reads a feed list, clusters the latest check-in of
 * every author, and announces clusters large enough to be parties.
 *
 * Usage:
 *   partycluster feeds.txt 100
 *   partycluster detect feeds.txt 250 --min-size 4 --json
 *
 * @module cli/commands/detect
 */

import type { Command } from 'commander';
import { z } from 'zod';
import { config } from '../../config/index.js';
import { ThresholdSchema } from '../../schemas/checkin.js';
import { FeedCache } from '../../feeds/cache.js';
import { FeedClient } from '../../feeds/client.js';
import { FeedListError, readFeedList } from '../../feeds/list.js';
import { FeedSource } from '../../feeds/source.js';
import { GeoNamesClient } from '../../geocode/client.js';
import { MemoizedGeocoder } from '../../geocode/memo.js';
import { ConcurrencyLimiter } from '../../net/concurrency.js';
import { runPartyDetection } from '../../pipeline/executor.js';
import { announceParties } from '../../report/announcement.js';
import { DEFAULT_MIN_PARTY_SIZE } from '../../report/summary.js';
import { getFeedCacheDir } from '../../storage/paths.js';
import { EXIT_CODES, UsageError, getBaseCommand } from '../base-command.js';
import { createSpinner, formatRunSummary, toJsonReport } from '../formatters/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Raw options as commander hands them over.
 */
export interface DetectOptions {
  minSize?: string;
  json?: boolean;
  /** false with --no-geocode */
  geocode?: boolean;
  /** false with --no-cache */
  cache?: boolean;
  cacheTtl?: string;
  concurrency?: string;
  timeZone?: string;
}

/**
 * Validated inputs of the detect command.
 */
export interface DetectInput {
  threshold: number;
  minSize: number;
  json: boolean;
  geocode: boolean;
  cache: boolean;
  cacheTtlSeconds: number;
  concurrency: number;
  timeZone: string;
}

// ============================================================================
// Argument Validation
// ============================================================================

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-GB', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

/**
 * A non-empty string converted to a number.
 */
const numericArg = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} is required`)
    .pipe(z.coerce.number({ invalid_type_error: `${label} must be a number` }));

const DetectInputSchema = z.object({
  threshold: numericArg('Threshold').pipe(ThresholdSchema),
  minSize: numericArg('Minimum size').pipe(
    z.number().int('Minimum size must be a whole number').min(1, 'Minimum size must be at least 1')
  ),
  cacheTtlSeconds: numericArg('Cache TTL').pipe(
    z.number().int('Cache TTL must be whole seconds').nonnegative('Cache TTL must not be negative')
  ),
  concurrency: numericArg('Concurrency').pipe(
    z.number().int().min(1, 'Concurrency must be at least 1').max(64, 'Concurrency must be at most 64')
  ),
  timeZone: z.string().refine(isValidTimeZone, (tz) => ({ message: `Unknown time zone: ${tz}` })),
});

/**
 * Validate the threshold argument and options.
 *
 * @throws UsageError listing every invalid input
 */
export function parseDetectInput(threshold: string, options: DetectOptions): DetectInput {
  const result = DetectInputSchema.safeParse({
    threshold,
    minSize: options.minSize ?? String(DEFAULT_MIN_PARTY_SIZE),
    cacheTtlSeconds: options.cacheTtl ?? String(config.feeds.cacheTtlSeconds),
    concurrency: options.concurrency ?? String(config.feeds.concurrency),
    timeZone: options.timeZone ?? Intl.DateTimeFormat().resolvedOptions().timeZone,
  });

  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('; '));
  }

  return {
    ...result.data,
    json: options.json === true,
    geocode: options.geocode !== false,
    cache: options.cache !== false,
  };
}

// ============================================================================
// Handler
// ============================================================================

async function detectHandler(
  feedListPath: string,
  thresholdArg: string,
  options: DetectOptions,
  cmd: Command
): Promise<void> {
  const base = getBaseCommand(cmd);

  let input: DetectInput;
  try {
    input = parseDetectInput(thresholdArg, options);
  } catch (error) {
    if (error instanceof UsageError) {
      base.error(error.message, EXIT_CODES.USAGE_ERROR);
    }
    throw error;
  }

  let feedUrls: string[];
  try {
    feedUrls = await readFeedList(feedListPath);
  } catch (error) {
    if (error instanceof FeedListError) {
      base.error(error.message, EXIT_CODES.NOT_FOUND);
    }
    throw error;
  }

  if (feedUrls.length === 0) {
    base.warn(`No feed URLs in ${feedListPath}`);
  }

  const cache = input.cache
    ? new FeedCache({
        directory: getFeedCacheDir(base.dataDir),
        ttlSeconds: input.cacheTtlSeconds,
        logger: base,
      })
    : undefined;
  const loader = new FeedSource({
    client: new FeedClient({ timeoutMs: config.feeds.timeoutMs }),
    cache,
    logger: base,
  });

  const spinner = createSpinner(`Loading ${feedUrls.length} feeds`, {
    silent: input.json || base.isQuiet(),
  }).start();

  const result = await runPartyDetection(
    {
      feedUrls,
      threshold: input.threshold,
      minSize: input.minSize,
      concurrency: input.concurrency,
      onFeedSettled: ({ completed, total }) => {
        spinner.update(`Loading feeds (${completed}/${total})`);
      },
    },
    { loader, logger: base }
  );

  if (result.failedFeeds.length === result.feedCount && result.feedCount > 0) {
    spinner.fail('No feed could be loaded');
    base.error('All feeds failed to load', EXIT_CODES.API_ERROR);
  }
  spinner.succeed(`Loaded ${result.eventCount} check-ins from ${result.feedCount} feeds`);

  const geocoder = input.geocode
    ? new MemoizedGeocoder(
        new GeoNamesClient({
          username: config.geonames.username,
          baseUrl: config.geonames.baseUrl,
          timeoutMs: config.feeds.timeoutMs,
        })
      )
    : undefined;

  const announcements = await announceParties(result.parties, {
    geocoder,
    limiter: new ConcurrencyLimiter(input.concurrency),
    logger: base,
    timeZone: input.timeZone,
  });

  if (input.json) {
    base.json(toJsonReport(result, announcements));
    return;
  }

  if (announcements.length === 0) {
    base.info('No parties found.');
  }
  for (const announcement of announcements) {
    // The announcements are the program's output; print them even with --quiet
    console.log(announcement.text);
  }

  if (base.isVerbose()) {
    base.info('');
    base.info(formatRunSummary(result));
  }
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Register the detect command as the program's default command.
 */
export function registerDetectCommand(program: Command): void {
  program
    .command('detect', { isDefault: true })
    .description('Find likely parties in a list of Atom/GeoRSS feeds')
    .argument('<feed-list>', 'File with one feed URL per line')
    .argument('<threshold>', 'Largest space-time interval between party members, in meters')
    .option('-m, --min-size <n>', 'Minimum number of people for a party', String(DEFAULT_MIN_PARTY_SIZE))
    .option('--json', 'Print the report as JSON')
    .option('--no-geocode', 'Print coordinates instead of place names')
    .option('--no-cache', 'Always download feeds')
    .option('--cache-ttl <seconds>', 'How long downloaded feeds stay fresh')
    .option('-c, --concurrency <n>', 'Simultaneous downloads')
    .option('--time-zone <tz>', 'Time zone for clock times (default: system time zone)')
    .action(detectHandler);
}
