/**
 * Storage Module
 *
 * @module storage
 */

export { getDataDir, getCacheDir, getFeedCacheDir } from './paths.js';
export { atomicWriteJson, isNotFound } from './atomic.js';
