import { PlaceRecord } from "../models/geo-data";
import { GeoError, ZoomTier } from "../models/errors";
import { GeocodingProvider, ReverseGeocodeResult } from "./nominatim-provider";
import { RequestThrottle } from "./request-throttle";

type TierResult =
  | { ok: true; record: PlaceRecord }
  | { ok: false; error: GeoError; partial?: ReverseGeocodeResult };

export interface ResolverStats {
  requests: number;
  tierSuccesses: Record<ZoomTier, number>;
  fallbacks: number;
  anonymized: number;
  anonymizationFailures: number;
}

const TIERS: ZoomTier[] = ["street", "region", "country"];

/**
 * Reverse geocoder with a street -> region -> country cascade and a final
 * raw-coordinate label, so every call yields a usable record.
 */
export class GeoResolver {
  private stats: ResolverStats = {
    requests: 0,
    tierSuccesses: { street: 0, region: 0, country: 0 },
    fallbacks: 0,
    anonymized: 0,
    anonymizationFailures: 0,
  };

  constructor(
    private readonly provider: GeocodingProvider,
    private readonly throttle: RequestThrottle
  ) {}

  /**
   * Resolve a coordinate to a place. Never rejects.
   */
  public async resolve(
    lat: number,
    lon: number,
    anonymize: boolean = false
  ): Promise<PlaceRecord> {
    let last: ReverseGeocodeResult | undefined;

    for (const tier of TIERS) {
      const result = await this.queryTier(lat, lon, tier);
      if (result.ok) {
        this.stats.tierSuccesses[tier]++;
        return anonymize ? this.anonymize(result.record) : result.record;
      }

      last = result.partial ?? last;
      console.warn(
        `Reverse geocoding ${lat.toFixed(4)}, ${lon.toFixed(4)} failed at ${tier} tier (${result.error.kind}): ${result.error.message}`
      );
    }

    this.stats.fallbacks++;
    console.warn(`Using GPS fallback label for ${lat.toFixed(4)}, ${lon.toFixed(4)}`);
    return GeoResolver.fallbackRecord(lat, lon, last);
  }

  /**
   * Replace the record's coordinates with the centre of its city. Records
   * that are already anonymized, or have no city, are returned unchanged;
   * so is the record when the forward lookup fails.
   */
  public async anonymize(record: PlaceRecord): Promise<PlaceRecord> {
    if (record.anonymized || !record.city) {
      return record;
    }

    const query = [record.city, record.state, record.country]
      .filter((part) => part)
      .join(", ");

    await this.throttle.wait();
    this.stats.requests++;

    try {
      const centre = await this.provider.search(query);
      if (!centre) {
        this.stats.anonymizationFailures++;
        console.warn(`No city centre found for "${query}", keeping exact coordinates`);
        return record;
      }

      this.stats.anonymized++;
      return { ...record, lat: centre.lat, lon: centre.lon, anonymized: true };
    } catch (error) {
      this.stats.anonymizationFailures++;
      console.warn(
        `City centre lookup for "${query}" failed, keeping exact coordinates:`,
        error instanceof Error ? error.message : error
      );
      return record;
    }
  }

  public getStats(): ResolverStats {
    return {
      ...this.stats,
      tierSuccesses: { ...this.stats.tierSuccesses },
    };
  }

  /**
   * Record used when no tier yields a city: the coordinate itself as label
   * Example: (48.85661, 2.35222) -> city "GPS 48.8566, 2.3522"
   */
  static fallbackRecord(
    lat: number,
    lon: number,
    last?: ReverseGeocodeResult
  ): PlaceRecord {
    return {
      city: `GPS ${lat.toFixed(4)}, ${lon.toFixed(4)}`,
      state: last?.state ?? "",
      country: last?.country || "Unknown",
      countryCode: last?.countryCode ?? "",
      found: true,
      lat,
      lon,
    };
  }

  private async queryTier(
    lat: number,
    lon: number,
    tier: ZoomTier
  ): Promise<TierResult> {
    await this.throttle.wait();
    this.stats.requests++;

    let result: ReverseGeocodeResult;
    try {
      result = await this.provider.reverse(lat, lon, tier);
    } catch (error) {
      return {
        ok: false,
        error:
          error instanceof GeoError
            ? error
            : new GeoError(
                "network",
                error instanceof Error ? error.message : String(error)
              ),
      };
    }

    if (!result.city) {
      return {
        ok: false,
        error: new GeoError("no-city", "No place name in response"),
        partial: result,
      };
    }

    return {
      ok: true,
      record: {
        city: result.city,
        state: result.state,
        country: result.country,
        countryCode: result.countryCode,
        found: true,
        lat,
        lon,
      },
    };
  }
}
