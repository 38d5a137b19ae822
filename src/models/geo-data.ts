/**
 * Result of resolving a coordinate to a place
 */
export interface PlaceRecord {
  city: string | null;
  state: string;
  country: string;
  countryCode: string;
  found: boolean;
  lat: number;
  lon: number;
  anonymized?: boolean;
}

/**
 * Shape of a place record inside the persisted cache store.
 * Fields written by other versions of the tool are kept as they are.
 */
export interface StoredPlaceRecord {
  city: string | null;
  state: string;
  country: string;
  country_code: string;
  found: boolean;
  lat: number;
  lon: number;
  anonymized?: boolean;
  [extra: string]: unknown;
}

export type CacheEntries = Record<string, StoredPlaceRecord>;

export interface CacheHit {
  key: string;
  record: PlaceRecord;
}

export interface CacheStats {
  hits: number;
  misses: number;
  hitRate: number;
  entries: number;
}

/**
 * A coordinate submitted for batch resolution, tagged with its position
 * in the caller's list
 */
export interface IndexedCoordinate {
  index: number;
  lat: number;
  lon: number;
}

export interface BatchSummary {
  total: number;
  cacheHits: number;
  deduplicated: number;
  fetched: number;
  anonymizedHits: number;
}

/**
 * A single timestamped sample of a track
 */
export interface TrackPoint {
  lat: number;
  lon: number;
  time: Date;
  altitude?: number;
  name?: string;
  city?: string;
  state?: string;
  country?: string;
  countryCode?: string;
}

export type MatchResult =
  | { matched: true; point: TrackPoint; deltaSeconds: number }
  | { matched: false; deltaSeconds: number };

/**
 * GPS and capture time read from a photo's embedded metadata
 */
export interface PhotoMetadata {
  lat?: number;
  lon?: number;
  altitude?: number;
  takenAt?: Date;
}
