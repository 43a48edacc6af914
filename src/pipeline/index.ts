/**
 * Pipeline Module
 *
 * @module pipeline
 */

export { runPartyDetection } from './executor.js';
export {
  type StageName,
  STAGE_ORDER,
  type FeedProgress,
  type PartyRunOptions,
  type PartyRunDependencies,
  type FailedFeed,
  type PartyRunResult,
} from './types.js';
