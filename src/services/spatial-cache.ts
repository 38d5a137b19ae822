import {
  CacheEntries,
  CacheHit,
  CacheStats,
  PlaceRecord,
  StoredPlaceRecord,
} from "../models/geo-data";
import { CacheStoreError } from "../models/errors";
import { CacheStore } from "./cache-store";
import { GeoUtil } from "./geo-util";
import { PlaceRecordUtil } from "./place-record-util";

export interface SpatialCacheOptions {
  radiusKm?: number;
  loadLockTimeoutMs?: number;
  saveLockTimeoutMs?: number;
}

/**
 * Persistent coordinate -> place cache with radius lookup.
 *
 * Entries are only ever added or rewritten, never removed. Lookups return the
 * first entry (in insertion order) within the radius, not the nearest one.
 */
export class SpatialCache {
  private entries: Map<string, StoredPlaceRecord> = new Map();
  private hits = 0;
  private misses = 0;

  public readonly radiusKm: number;
  private readonly loadLockTimeoutMs: number;
  private readonly saveLockTimeoutMs: number;

  constructor(
    private readonly store: CacheStore,
    options: SpatialCacheOptions = {}
  ) {
    this.radiusKm = options.radiusKm ?? 5;
    this.loadLockTimeoutMs = options.loadLockTimeoutMs ?? 30000;
    this.saveLockTimeoutMs = options.saveLockTimeoutMs ?? 60000;
  }

  /**
   * Load the persisted entries. Never rejects: a corrupt or unreadable store
   * starts an empty cache, and a lock timeout falls back to an unlocked read.
   */
  public async load(): Promise<Map<string, StoredPlaceRecord>> {
    const lock = this.store.createLock();
    const locked = await lock.acquire(this.loadLockTimeoutMs);
    if (!locked) {
      console.warn(
        `Could not lock ${this.store.describe()}, reading without lock`
      );
    }

    try {
      const stored = await this.store.read();
      this.entries = new Map(Object.entries(stored));
      console.log(`Cache loaded: ${this.entries.size} entries`);
    } catch (error) {
      if (error instanceof CacheStoreError) {
        console.warn(`Cache store corrupted, starting fresh: ${error.message}`);
      } else {
        console.warn("Cache loading error, starting fresh:", error);
      }
      this.entries = new Map();
    } finally {
      await lock.release();
    }

    return this.entries;
  }

  /**
   * Find a cached place within `radiusKm` of the coordinate
   */
  public findNearby(
    lat: number,
    lon: number,
    radiusKm: number = this.radiusKm
  ): PlaceRecord | null {
    return this.findNearbyEntry(lat, lon, radiusKm)?.record ?? null;
  }

  /**
   * Like findNearby, also returning the key of the matched entry
   */
  public findNearbyEntry(
    lat: number,
    lon: number,
    radiusKm: number = this.radiusKm
  ): CacheHit | null {
    const hit = this.scan(lat, lon, radiusKm);
    if (hit) {
      this.hits++;
    } else {
      this.misses++;
    }
    return hit;
  }

  /**
   * Lookup that leaves the hit/miss counters untouched
   */
  public peekNearby(
    lat: number,
    lon: number,
    radiusKm: number = this.radiusKm
  ): CacheHit | null {
    return this.scan(lat, lon, radiusKm);
  }

  public add(lat: number, lon: number, record: PlaceRecord): string {
    const key = GeoUtil.cacheKey(lat, lon);
    this.entries.set(key, PlaceRecordUtil.toStored(record));
    return key;
  }

  /**
   * Rewrite an existing entry, keeping any fields this version does not know
   */
  public replace(key: string, record: PlaceRecord): void {
    const previous = this.entries.get(key);
    this.entries.set(key, PlaceRecordUtil.toStored(record, previous));
  }

  /**
   * Merge the in-memory entries into the persisted store.
   *
   * The store is re-read under the lock so entries added by other processes
   * since `load` survive; on key collisions the in-memory entry wins.
   * Resolves false (without writing) when the lock cannot be acquired or the
   * write fails.
   */
  public async save(): Promise<boolean> {
    const lock = this.store.createLock();
    if (!(await lock.acquire(this.saveLockTimeoutMs))) {
      console.warn(
        `Could not acquire lock for saving cache to ${this.store.describe()}`
      );
      return false;
    }

    try {
      let current: CacheEntries = {};
      try {
        current = await this.store.read();
      } catch (error) {
        console.warn("Could not re-read cache before saving, overwriting:", error);
      }

      const merged: CacheEntries = { ...current };
      for (const [key, stored] of this.entries) {
        merged[key] = stored;
      }

      await this.store.write(merged);
      this.entries = new Map(Object.entries(merged));
      return true;
    } catch (error) {
      console.warn("Cache saving error:", error);
      return false;
    } finally {
      await lock.release();
    }
  }

  public size(): number {
    return this.entries.size;
  }

  public getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? (this.hits / total) * 100 : 0,
      entries: this.entries.size,
    };
  }

  /**
   * Example: "Cache: 3 hits, 1 misses (rate: 75.0%)"
   */
  public formatStats(): string {
    const stats = this.getStats();
    return `Cache: ${stats.hits} hits, ${stats.misses} misses (rate: ${stats.hitRate.toFixed(1)}%)`;
  }

  private scan(lat: number, lon: number, radiusKm: number): CacheHit | null {
    for (const [key, stored] of this.entries) {
      const point = GeoUtil.parseCacheKey(key);
      if (!point) continue;

      if (GeoUtil.haversineKm(lat, lon, point.lat, point.lon) <= radiusKm) {
        return { key, record: PlaceRecordUtil.fromStored(stored) };
      }
    }
    return null;
  }
}
