/**
 * Geocode Module
 *
 * @module geocode
 */

export {
  type Geocoder,
  type GeoNamesClientOptions,
  GeoNamesClient,
  GeocodeError,
} from './client.js';
export { MemoizedGeocoder } from './memo.js';
