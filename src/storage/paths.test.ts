/**
 * Tests for path resolution
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as os from 'node:os';
import * as path from 'node:path';
import { getDataDir, getCacheDir, getFeedCacheDir } from './paths.js';

describe('paths', () => {
  const originalEnv = process.env.PARTYCLUSTER_DATA_DIR;

  beforeEach(() => {
    delete process.env.PARTYCLUSTER_DATA_DIR;
  });

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.PARTYCLUSTER_DATA_DIR;
    } else {
      process.env.PARTYCLUSTER_DATA_DIR = originalEnv;
    }
  });

  describe('getDataDir', () => {
    it('defaults to ~/.partycluster', () => {
      expect(getDataDir()).toBe(path.join(os.homedir(), '.partycluster'));
    });

    it('uses PARTYCLUSTER_DATA_DIR when set', () => {
      process.env.PARTYCLUSTER_DATA_DIR = '/custom/data';
      expect(getDataDir()).toBe(path.resolve('/custom/data'));
    });

    it('expands a leading ~', () => {
      process.env.PARTYCLUSTER_DATA_DIR = '~/party-data';
      expect(getDataDir()).toBe(path.join(os.homedir(), 'party-data'));
    });

    it('resolves relative paths', () => {
      process.env.PARTYCLUSTER_DATA_DIR = 'relative/dir';
      expect(getDataDir()).toBe(path.resolve('relative/dir'));
    });
  });

  describe('cache directories', () => {
    it('places the cache under the data directory', () => {
      expect(getCacheDir('/data')).toBe(path.join('/data', 'cache'));
    });

    it('places feed bodies under cache/feeds', () => {
      expect(getFeedCacheDir('/data')).toBe(path.join('/data', 'cache', 'feeds'));
    });

    it('follows the environment when no directory is given', () => {
      process.env.PARTYCLUSTER_DATA_DIR = '/env/data';
      expect(getFeedCacheDir()).toBe(path.join(path.resolve('/env/data'), 'cache', 'feeds'));
    });
  });
});
