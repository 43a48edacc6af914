/**
 * Reporting Module
 *
 * @module report
 */

export {
  type ClusterSummary,
  DEFAULT_MIN_PARTY_SIZE,
  summarizeCluster,
  selectParties,
  distinctCoordinates,
} from './summary.js';

export {
  type AnnouncementOptions,
  type AnnounceOptions,
  type PartyAnnouncement,
  formatList,
  formatClockTime,
  formatCoordinates,
  describeCluster,
  resolvePlaceNames,
  announceParties,
} from './announcement.js';
