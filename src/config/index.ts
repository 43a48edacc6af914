/**
 * Configuration Module
 *
 * Loads and validates environment variables for partycluster.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';
import { getDataDir } from '../storage/paths.js';

// Environment schema with optional values and defaults
export const envSchema = z.object({
  // Data directory (feed cache)
  PARTYCLUSTER_DATA_DIR: z.string().optional(),

  // Feed ingestion
  FEED_CACHE_TTL_SECONDS: z.coerce.number().int().nonnegative().default(3600),
  FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  FEED_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),

  // Reverse geocoding
  GEONAMES_USERNAME: z.string().min(1).default('demo'),
  GEONAMES_BASE_URL: z.string().url().default('http://api.geonames.org'),
});

export type Env = z.infer<typeof envSchema>;

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Application configuration singleton
 */
export const config = {
  // Data directory
  dataDir: getDataDir(),

  feeds: {
    cacheTtlSeconds: env.FEED_CACHE_TTL_SECONDS,
    timeoutMs: env.FEED_TIMEOUT_MS,
    concurrency: env.FEED_CONCURRENCY,
  },

  geonames: {
    username: env.GEONAMES_USERNAME,
    baseUrl: env.GEONAMES_BASE_URL,
  },
} as const;

export type Config = typeof config;
