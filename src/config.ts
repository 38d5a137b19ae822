import path from "path";
import dotenv from "dotenv";

// Load environment variables from .env
dotenv.config();

export type CacheBackend = "file" | "redis";

export interface AppConfig {
  cacheBackend: CacheBackend;
  cacheFile: string;
  cacheRadiusKm: number;
  loadLockTimeoutMs: number;
  saveLockTimeoutMs: number;
  redisHost: string;
  redisPort: number;
  redisCacheKey: string;
  nominatimBaseUrl: string;
  userAgent: string;
  language: string;
  requestTimeoutMs: number;
  minRequestIntervalMs: number;
  syncToleranceSeconds: number;
  port: number;
}

type Env = Record<string, string | undefined>;

function readNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    console.warn(`Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

function readBackend(env: Env): CacheBackend {
  const raw = (env.CACHE_BACKEND || "file").toLowerCase();
  if (raw === "file" || raw === "redis") {
    return raw;
  }
  console.warn(`Unknown CACHE_BACKEND "${raw}", using file`);
  return "file";
}

/**
 * Build the application configuration from environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return {
    cacheBackend: readBackend(env),
    cacheFile: path.resolve(
      env.CACHE_FILE || path.join(process.cwd(), "geocoding_cache.json")
    ),
    cacheRadiusKm: readNumber(env, "CACHE_RADIUS_KM", 5),
    loadLockTimeoutMs: readNumber(env, "CACHE_LOAD_LOCK_TIMEOUT_MS", 30000),
    saveLockTimeoutMs: readNumber(env, "CACHE_SAVE_LOCK_TIMEOUT_MS", 60000),
    redisHost: env.REDIS_HOST || "localhost",
    redisPort: readNumber(env, "REDIS_PORT", 6379),
    redisCacheKey: env.REDIS_CACHE_KEY || "geocache:entries",
    nominatimBaseUrl:
      env.NOMINATIM_BASE_URL || "https://nominatim.openstreetmap.org",
    userAgent: env.GEOCODER_USER_AGENT || "photo-geotrack/1.0",
    language: env.GEOCODER_LANGUAGE || "en",
    requestTimeoutMs: readNumber(env, "GEOCODER_TIMEOUT_MS", 10000),
    minRequestIntervalMs: readNumber(env, "GEOCODER_MIN_INTERVAL_MS", 1000),
    syncToleranceSeconds: readNumber(env, "SYNC_TOLERANCE_SECONDS", 3600),
    port: readNumber(env, "PORT", 3001),
  };
}
