import fs from "fs";
import path from "path";
import { CacheEntries } from "../models/geo-data";
import { CacheStoreError } from "../models/errors";
import { PlaceRecordUtil } from "./place-record-util";
import { RedisCommands } from "./redis-client";
import { FileLock, RedisLock, ScopedLock } from "./scoped-lock";

/**
 * Persistence behind the spatial cache
 */
export interface CacheStore {
  /**
   * Read every stored entry. Resolves to an empty document when nothing has
   * been stored yet; rejects with CacheStoreError when the store is corrupt.
   */
  read(): Promise<CacheEntries>;
  /**
   * Replace the stored document with `entries`
   */
  write(entries: CacheEntries): Promise<void>;
  /**
   * A new lock guarding read-merge-write cycles on this store
   */
  createLock(): ScopedLock;
  describe(): string;
}

/**
 * Cache kept as a single JSON object on disk, rewritten atomically
 */
export class JsonFileCacheStore implements CacheStore {
  constructor(private readonly filePath: string) {}

  public describe(): string {
    return this.filePath;
  }

  public createLock(): ScopedLock {
    return new FileLock(this.filePath);
  }

  public async read(): Promise<CacheEntries> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    if (raw.trim() === "") {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CacheStoreError(
        `Cache file is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`,
        this.filePath
      );
    }

    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new CacheStoreError("Cache file is not a JSON object", this.filePath);
    }

    const entries: CacheEntries = {};
    for (const [key, value] of Object.entries(parsed)) {
      const stored = PlaceRecordUtil.parseStored(value);
      if (stored) {
        entries[key] = stored;
      } else {
        console.warn(`Skipping malformed cache entry "${key}" in ${this.filePath}`);
      }
    }
    return entries;
  }

  public async write(entries: CacheEntries): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });

    // Write next to the target and rename over it, so readers never see a
    // half-written file
    const tmpPath = `${this.filePath}.${process.pid}.tmp`;
    await fs.promises.writeFile(
      tmpPath,
      JSON.stringify(entries, null, 2),
      "utf-8"
    );
    try {
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }
  }
}

/**
 * Cache kept as one Redis hash: field = cache key, value = JSON record
 */
export class RedisCacheStore implements CacheStore {
  constructor(
    private readonly redis: RedisCommands,
    private readonly hashKey: string
  ) {}

  public describe(): string {
    return `redis hash ${this.hashKey}`;
  }

  public createLock(): ScopedLock {
    return new RedisLock(this.redis, `${this.hashKey}:lock`);
  }

  public async read(): Promise<CacheEntries> {
    const fields = await this.redis.hGetAll(this.hashKey);
    const entries: CacheEntries = {};

    for (const [key, json] of Object.entries(fields)) {
      const stored = PlaceRecordUtil.parseStored(parseJson(json));
      if (stored) {
        entries[key] = stored;
      } else {
        console.warn(`Skipping malformed cache entry "${key}" in ${this.hashKey}`);
      }
    }
    return entries;
  }

  public async write(entries: CacheEntries): Promise<void> {
    const fields: Record<string, string> = {};
    for (const [key, stored] of Object.entries(entries)) {
      fields[key] = JSON.stringify(stored);
    }
    await this.redis.hSetMany(this.hashKey, fields);
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

function parseJson(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return undefined;
  }
}
