import {
  BatchSummary,
  CacheHit,
  IndexedCoordinate,
  PlaceRecord,
} from "../models/geo-data";
import { GeoResolver } from "./geo-resolver";
import { SpatialCache } from "./spatial-cache";

/**
 * Resolves many coordinates at once: cached places first, then the
 * remaining coordinates one by one through the resolver.
 */
export class BatchCoordinator {
  private lastSummary: BatchSummary = {
    total: 0,
    cacheHits: 0,
    deduplicated: 0,
    fetched: 0,
    anonymizedHits: 0,
  };

  constructor(
    private readonly cache: SpatialCache,
    private readonly resolver: GeoResolver
  ) {}

  /**
   * Resolve every coordinate; the result holds one record per input index.
   *
   * Network requests are sent sequentially in input order, and each new
   * record is added to the cache as soon as it arrives.
   */
  public async resolveBatch(
    coords: IndexedCoordinate[],
    anonymize: boolean = false
  ): Promise<Map<number, PlaceRecord>> {
    const results = new Map<number, PlaceRecord>();
    const toFetch: IndexedCoordinate[] = [];
    const summary: BatchSummary = {
      total: coords.length,
      cacheHits: 0,
      deduplicated: 0,
      fetched: 0,
      anonymizedHits: 0,
    };

    console.log("Checking cache...");
    for (const coord of coords) {
      const hit = this.cache.findNearbyEntry(coord.lat, coord.lon);
      if (hit) {
        summary.cacheHits++;
        results.set(coord.index, await this.useCached(hit, anonymize, summary));
      } else {
        toFetch.push(coord);
      }
    }

    console.log(
      `Cache: ${summary.cacheHits} hits, ${toFetch.length} requests needed`
    );
    if (toFetch.length > 0 && anonymize) {
      console.log("Anonymization mode active");
    }

    for (const [i, coord] of toFetch.entries()) {
      // An earlier request in this batch may already cover this coordinate
      const sibling = this.cache.peekNearby(coord.lat, coord.lon);
      if (sibling) {
        summary.deduplicated++;
        results.set(coord.index, await this.useCached(sibling, anonymize, summary));
        continue;
      }

      console.log(
        `[${i + 1}/${toFetch.length}] ${coord.lat.toFixed(4)}, ${coord.lon.toFixed(4)}`
      );
      const record = await this.resolver.resolve(coord.lat, coord.lon, anonymize);
      summary.fetched++;

      this.cache.add(coord.lat, coord.lon, record);
      results.set(coord.index, record);
    }

    this.lastSummary = summary;
    return results;
  }

  public getLastSummary(): BatchSummary {
    return { ...this.lastSummary };
  }

  private async useCached(
    hit: CacheHit,
    anonymize: boolean,
    summary: BatchSummary
  ): Promise<PlaceRecord> {
    if (!anonymize || hit.record.anonymized || !hit.record.city) {
      return hit.record;
    }

    const anonymized = await this.resolver.anonymize(hit.record);
    if (anonymized.anonymized) {
      summary.anonymizedHits++;
      // Persist so later hits in the same radius are already anonymized
      this.cache.replace(hit.key, anonymized);
    }
    return anonymized;
  }
}
