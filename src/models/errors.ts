export type ZoomTier = "street" | "region" | "country";

export type GeoErrorKind = "timeout" | "http" | "network" | "payload" | "no-city";

/**
 * Failure of a single provider request. Only used inside the resolver
 * cascade, callers always receive a PlaceRecord.
 */
export class GeoError extends Error {
  constructor(
    public readonly kind: GeoErrorKind,
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "GeoError";
  }
}

/**
 * The persisted cache store could not be read as a cache document
 */
export class CacheStoreError extends Error {
  constructor(message: string, public readonly location: string) {
    super(message);
    this.name = "CacheStoreError";
  }
}

/**
 * Invalid command line usage or missing input paths
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
