/**
 * Event Store
 *
 * Holds the latest known check-in per author for the duration of one run.
 *
 * Merge rule (latest timestamp wins):
 * - unknown author: insert
 * - known author, strictly newer check-in: replace
 * - known author, equal or older check-in: keep the stored one
 *
 * Because the rule depends only on timestamps, merging feeds in any order
 * yields the same contents, and merging the same batch twice is a no-op.
 *
 * @module events/store
 */

import type { CheckIn } from '../schemas/checkin.js';
import { encodeEventKey, eventKeyOf, type EventKey } from './key.js';

/**
 * Counts produced by one {@link EventStore.update} call.
 */
export interface StoreUpdateStats {
  /** Authors seen for the first time */
  inserted: number;
  /** Stored check-ins replaced by a newer one */
  replaced: number;
  /** Incoming check-ins that were not newer than the stored one */
  ignored: number;
}

/**
 * Mapping from author key to that author's most recent check-in.
 */
export class EventStore {
  /** Encoded key -> latest check-in */
  private readonly latest = new Map<string, CheckIn>();

  /** Running totals across all updates */
  private readonly totals: StoreUpdateStats = { inserted: 0, replaced: 0, ignored: 0 };

  /**
   * Merge a batch of check-ins into the store.
   *
   * @returns this store, for chaining
   */
  update(events: Iterable<CheckIn>): this {
    this.merge(events);
    return this;
  }

  /**
   * Merge a batch and report what changed.
   */
  merge(events: Iterable<CheckIn>): StoreUpdateStats {
    const stats: StoreUpdateStats = { inserted: 0, replaced: 0, ignored: 0 };

    for (const event of events) {
      const key = encodeEventKey(eventKeyOf(event));
      const current = this.latest.get(key);

      if (current === undefined) {
        this.latest.set(key, event);
        stats.inserted++;
      } else if (event.publishedAt.getTime() > current.publishedAt.getTime()) {
        this.latest.set(key, event);
        stats.replaced++;
      } else {
        stats.ignored++;
      }
    }

    this.totals.inserted += stats.inserted;
    this.totals.replaced += stats.replaced;
    this.totals.ignored += stats.ignored;

    return stats;
  }

  get(key: EventKey): CheckIn | undefined {
    return this.latest.get(encodeEventKey(key));
  }

  has(key: EventKey): boolean {
    return this.latest.has(encodeEventKey(key));
  }

  /**
   * Number of distinct authors.
   */
  get size(): number {
    return this.latest.size;
  }

  /**
   * All stored check-ins, in the order their authors were first seen.
   */
  values(): CheckIn[] {
    return Array.from(this.latest.values());
  }

  keys(): EventKey[] {
    return this.values().map(eventKeyOf);
  }

  /**
   * Totals over every update since the store was created.
   */
  getStats(): StoreUpdateStats {
    return { ...this.totals };
  }
}

/**
 * Functional form of {@link EventStore.update}.
 *
 * @example
 * ```typescript
 * let store = new EventStore();
 * for (const feed of feeds) {
 *   store = updateEvents(store, await source.load(feed));
 * }
 * ```
 */
export function updateEvents(store: EventStore, newEvents: Iterable<CheckIn>): EventStore {
  return store.update(newEvents);
}
