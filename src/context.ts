import { AppConfig } from "./config";
import { BatchCoordinator } from "./services/batch-coordinator";
import { CacheStore, JsonFileCacheStore, RedisCacheStore } from "./services/cache-store";
import { GeoResolver } from "./services/geo-resolver";
import { GeocodingProvider, NominatimProvider } from "./services/nominatim-provider";
import { RedisClient } from "./services/redis-client";
import { RequestThrottle } from "./services/request-throttle";
import { SpatialCache } from "./services/spatial-cache";

/**
 * Services shared by the commands and the HTTP API
 */
export interface AppContext {
  config: AppConfig;
  cache: SpatialCache;
  resolver: GeoResolver;
  batch: BatchCoordinator;
  close(): Promise<void>;
}

export interface ContextOverrides {
  store?: CacheStore;
  provider?: GeocodingProvider;
  throttle?: RequestThrottle;
}

export async function createContext(
  config: AppConfig,
  overrides: ContextOverrides = {}
): Promise<AppContext> {
  let redis: RedisClient | null = null;
  let store = overrides.store;
  if (!store) {
    if (config.cacheBackend === "redis") {
      redis = new RedisClient({ host: config.redisHost, port: config.redisPort });
      await redis.ensureConnection();
      store = new RedisCacheStore(redis, config.redisCacheKey);
    } else {
      store = new JsonFileCacheStore(config.cacheFile);
    }
  }

  const cache = new SpatialCache(store, {
    radiusKm: config.cacheRadiusKm,
    loadLockTimeoutMs: config.loadLockTimeoutMs,
    saveLockTimeoutMs: config.saveLockTimeoutMs,
  });
  await cache.load();

  const provider =
    overrides.provider ??
    new NominatimProvider({
      baseUrl: config.nominatimBaseUrl,
      userAgent: config.userAgent,
      language: config.language,
      timeoutMs: config.requestTimeoutMs,
    });
  const throttle =
    overrides.throttle ?? new RequestThrottle(config.minRequestIntervalMs);
  const resolver = new GeoResolver(provider, throttle);

  return {
    config,
    cache,
    resolver,
    batch: new BatchCoordinator(cache, resolver),
    close: async () => {
      if (redis) {
        await redis.disconnect();
        console.log("Redis connection closed");
      }
    },
  };
}
