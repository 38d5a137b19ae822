import fs from "fs";
import os from "os";
import path from "path";
import { CacheStoreError } from "../../src/models/errors";
import { JsonFileCacheStore, RedisCacheStore } from "../../src/services/cache-store";
import { PlaceRecordUtil } from "../../src/services/place-record-util";
import { SpatialCache } from "../../src/services/spatial-cache";
import { FakeRedis, place } from "../utils/fakes";

const LYON_KEY = "45.764000,4.835700";

describe("JsonFileCacheStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "geocache-"));
    file = path.join(dir, "geocoding_cache.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should read a missing file as an empty cache", async () => {
    await expect(new JsonFileCacheStore(file).read()).resolves.toEqual({});
  });

  it("should read an empty file as an empty cache", async () => {
    fs.writeFileSync(file, "  \n");
    await expect(new JsonFileCacheStore(file).read()).resolves.toEqual({});
  });

  it("should reject a file that is not JSON", async () => {
    fs.writeFileSync(file, "{ not json");
    await expect(new JsonFileCacheStore(file).read()).rejects.toBeInstanceOf(
      CacheStoreError
    );
  });

  it("should reject a JSON document that is not an object", async () => {
    fs.writeFileSync(file, "[1, 2]");
    await expect(new JsonFileCacheStore(file).read()).rejects.toThrow(
      "Cache file is not a JSON object"
    );
  });

  it("should skip malformed entries", async () => {
    fs.writeFileSync(
      file,
      JSON.stringify({
        [LYON_KEY]: PlaceRecordUtil.toStored(place()),
        broken: "not a record",
      })
    );

    const entries = await new JsonFileCacheStore(file).read();
    expect(Object.keys(entries)).toEqual([LYON_KEY]);
  });

  it("should write a pretty-printed document and leave no temporary file", async () => {
    const store = new JsonFileCacheStore(file);
    await store.write({ [LYON_KEY]: PlaceRecordUtil.toStored(place()) });

    const raw = fs.readFileSync(file, "utf-8");
    expect(raw.startsWith('{\n  "45.764000,4.835700": {\n')).toBe(true);
    expect(fs.readdirSync(dir)).toEqual(["geocoding_cache.json"]);
    await expect(store.read()).resolves.toEqual({
      [LYON_KEY]: PlaceRecordUtil.toStored(place()),
    });
  });

  it("should back a spatial cache across instances", async () => {
    const first = new SpatialCache(new JsonFileCacheStore(file));
    await first.load();
    first.add(45.764, 4.8357, place());
    await expect(first.save()).resolves.toBe(true);

    const second = new SpatialCache(new JsonFileCacheStore(file));
    await second.load();
    expect(second.findNearby(45.77, 4.84)).toEqual(place());
  });

  it("should start a spatial cache empty from a corrupt file", async () => {
    fs.writeFileSync(file, "{ not json");

    const cache = new SpatialCache(new JsonFileCacheStore(file));
    const entries = await cache.load();
    expect(entries.size).toBe(0);
  });
});

describe("RedisCacheStore", () => {
  let redis: FakeRedis;
  let store: RedisCacheStore;

  beforeEach(() => {
    redis = new FakeRedis();
    store = new RedisCacheStore(redis, "geocache:entries");
  });

  it("should store each entry as a JSON hash field", async () => {
    await store.write({ [LYON_KEY]: PlaceRecordUtil.toStored(place()) });

    expect(redis.hSetMany).toHaveBeenCalledWith("geocache:entries", {
      [LYON_KEY]: JSON.stringify(PlaceRecordUtil.toStored(place())),
    });
    await expect(store.read()).resolves.toEqual({
      [LYON_KEY]: PlaceRecordUtil.toStored(place()),
    });
  });

  it("should skip fields that are not valid records", async () => {
    redis.hashes.set("geocache:entries", {
      [LYON_KEY]: JSON.stringify(PlaceRecordUtil.toStored(place())),
      broken: "{ not json",
    });

    const entries = await store.read();
    expect(Object.keys(entries)).toEqual([LYON_KEY]);
  });

  it("should save a spatial cache under the Redis lock", async () => {
    const cache = new SpatialCache(store);
    await cache.load();
    cache.add(45.764, 4.8357, place());

    await expect(cache.save()).resolves.toBe(true);
    expect(redis.setIfAbsent).toHaveBeenCalledWith(
      "geocache:entries:lock",
      expect.any(String),
      120000
    );
    // Released again
    expect(redis.strings.has("geocache:entries:lock")).toBe(false);
    expect(Object.keys(redis.hashes.get("geocache:entries") ?? {})).toEqual([
      LYON_KEY,
    ]);
  });
});
