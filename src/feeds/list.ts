/**
 * Feed List
 *
 * A feed list is a text file with one feed URL per line. Blank lines and
 * lines starting with `#` are ignored; repeated URLs are read once.
 *
 * @module feeds/list
 */

import * as fs from 'node:fs/promises';
import { isNotFound } from '../storage/atomic.js';

/**
 * The feed list file could not be read.
 */
export class FeedListError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message);
    this.name = 'FeedListError';
  }
}

/**
 * Split feed list text into URLs.
 */
export function parseFeedList(content: string): string[] {
  const urls = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));

  return [...new Set(urls)];
}

/**
 * Read a feed list file.
 *
 * @throws FeedListError if the file is missing or is a directory
 */
export async function readFeedList(filePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isNotFound(error)) {
      throw new FeedListError(`Feed list not found: ${filePath}`, filePath);
    }
    if (error instanceof Error && 'code' in error && error.code === 'EISDIR') {
      throw new FeedListError(`Feed list is a directory: ${filePath}`, filePath);
    }
    throw error;
  }

  return parseFeedList(content);
}
