// Dataset store
export { DatasetStore, DEFAULT_TTL_MS } from './dataset-store.js';
export type { DatasetStoreConfig } from './dataset-store.js';
export { HttpGeobaseSource, DEFAULT_GEOBASE_URL } from './geobase-source.js';
export type { GeobaseSource, HttpGeobaseSourceConfig } from './geobase-source.js';
export { GeobaseCache } from './geobase-cache.js';
export type { CachedPayload, PayloadCache } from './geobase-cache.js';
export { parseGeobase, parseFeature } from './geobase-parser.js';
export type { ParseOptions, ParseResult } from './geobase-parser.js';

// Resolution
export { normalizeStreetName, foldText, levenshtein } from './normalize.js';
export {
  StreetResolver,
  DEFAULT_SEARCH_LIMIT,
  matchStreetName,
  rangeContains,
  isUnbounded,
  isBounded,
  parseAddress,
  describeSegment,
  formatAddressRange,
} from './street-resolver.js';
export type { NameMatch, SearchOptions, NearestOptions, ParsedAddress } from './street-resolver.js';
export { centroidOf, haversineMeters } from './geo.js';
export type { Coordinates } from './geo.js';
