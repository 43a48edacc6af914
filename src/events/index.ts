/**
 * Events Module
 *
 * Check-in construction, author keys and the per-run event store.
 *
 * @module events
 */

export { createCheckIn, tryCreateCheckIn } from './checkin.js';

export {
  type EventKey,
  eventKeyOf,
  encodeEventKey,
  formatEventKey,
  eventKeysEqual,
  compareEventKeys,
  compareCheckIns,
} from './key.js';

export { EventStore, updateEvents, type StoreUpdateStats } from './store.js';
