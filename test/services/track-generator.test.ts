import fs from "fs";
import os from "os";
import path from "path";
import { UsageError } from "../../src/models/errors";
import { BatchCoordinator } from "../../src/services/batch-coordinator";
import { GeoResolver } from "../../src/services/geo-resolver";
import { GpxParser } from "../../src/services/gpx-parser";
import { RequestThrottle } from "../../src/services/request-throttle";
import { SpatialCache } from "../../src/services/spatial-cache";
import { TrackGenerator } from "../../src/services/track-generator";
import { FakeProvider, FakeReader, MemoryCacheStore } from "../utils/fakes";

const PHOTOS = {
  "IMG_1.jpg": { lat: 45.77, lon: 4.84, takenAt: new Date("2024-06-01T12:00:00Z") },
  "IMG_2.jpg": {
    lat: 45.764,
    lon: 4.8357,
    altitude: 170,
    takenAt: new Date("2024-06-01T12:30:00Z"),
  },
  "IMG_3.jpg": {},
  "IMG_4.jpg": null,
  "IMG_5.jpg": { lat: 48.1, lon: -1.65 },
};

describe("TrackGenerator", () => {
  let dir: string;
  let photoDir: string;
  let outDir: string;
  let store: MemoryCacheStore;
  let cache: SpatialCache;
  let provider: FakeProvider;
  let generator: TrackGenerator;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "generate-"));
    photoDir = path.join(dir, "trip");
    outDir = path.join(dir, "out");
    fs.mkdirSync(photoDir);
    for (const name of Object.keys(PHOTOS)) {
      fs.writeFileSync(path.join(photoDir, name), "");
    }

    store = new MemoryCacheStore();
    cache = new SpatialCache(store);
    provider = new FakeProvider((lat) =>
      lat > 47
        ? { city: "Rennes", state: "Bretagne", country: "France", countryCode: "FR" }
        : { city: "Lyon", state: "Auvergne-Rhône-Alpes", country: "France", countryCode: "FR" }
    );
    generator = new TrackGenerator(
      new FakeReader(PHOTOS),
      new BatchCoordinator(cache, new GeoResolver(provider, new RequestThrottle(0))),
      cache
    );
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should write a track of the geotagged photos", async () => {
    const summary = await generator.generate({ photoDir, outDir });

    expect(summary).toMatchObject({
      outputFile: path.join(outDir, "gps_track_trip.gpx"),
      photosFound: 5,
      trackPoints: 3,
      skippedNoExif: 1,
      skippedNoGps: 1,
      cacheSaved: true,
    });
    // IMG_2 is within the radius of IMG_1
    expect(provider.reverseCalls).toHaveLength(2);

    const { points, skipped } = await GpxParser.parseFile(summary.outputFile);
    expect(points).toEqual([
      {
        lat: 45.77,
        lon: 4.84,
        time: new Date("2024-06-01T12:00:00Z"),
        name: "IMG_1.jpg",
        city: "Lyon",
        state: "Auvergne-Rhône-Alpes",
        country: "France",
        countryCode: "FR",
      },
      {
        lat: 45.764,
        lon: 4.8357,
        altitude: 170,
        time: new Date("2024-06-01T12:30:00Z"),
        name: "IMG_2.jpg",
        city: "Lyon",
        state: "Auvergne-Rhône-Alpes",
        country: "France",
        countryCode: "FR",
      },
    ]);
    // The undated photo is written last, without a time
    expect(skipped.missingTime).toBe(1);
  });

  it("should save the places it fetched", async () => {
    await generator.generate({ photoDir, outDir });

    expect(Object.keys(store.document).sort()).toEqual([
      "45.770000,4.840000",
      "48.100000,-1.650000",
    ]);
  });

  it("should move anonymized points to the city centre", async () => {
    const summary = await generator.generate({ photoDir, outDir, anonymize: true });

    expect(path.basename(summary.outputFile)).toBe("gps_track_trip_anonymized.gpx");
    const { points } = await GpxParser.parseFile(summary.outputFile);
    expect(points.map((point) => [point.lat, point.lon])).toEqual([
      [45.75, 4.85],
      [45.75, 4.85],
    ]);
  });

  it("should keep photo coordinates in a plain run over anonymized cache entries", async () => {
    await generator.generate({ photoDir, outDir, anonymize: true });
    const plain = await generator.generate({ photoDir, outDir });

    expect(path.basename(plain.outputFile)).toBe("gps_track_trip.gpx");
    const { points } = await GpxParser.parseFile(plain.outputFile);
    expect(points.map((point) => [point.lat, point.lon, point.city])).toEqual([
      [45.77, 4.84, "Lyon"],
      [45.764, 4.8357, "Lyon"],
    ]);
  });

  it("should not overwrite an earlier track", async () => {
    await generator.generate({ photoDir, outDir });
    const second = await generator.generate({ photoDir, outDir });

    expect(second.outputFile).toBe(path.join(outDir, "gps_track_trip_v2.gpx"));
    // Everything came from the cache the second time
    expect(provider.reverseCalls).toHaveLength(2);
  });

  it("should write next to the photos by default", async () => {
    const summary = await generator.generate({ photoDir });

    expect(summary.outputFile).toBe(path.join(photoDir, "gps_track_trip.gpx"));
  });

  it("should fail when no photo has GPS data", async () => {
    const empty = new TrackGenerator(
      new FakeReader({}),
      new BatchCoordinator(cache, new GeoResolver(provider, new RequestThrottle(0))),
      cache
    );

    await expect(empty.generate({ photoDir, outDir })).rejects.toBeInstanceOf(
      UsageError
    );
  });

  it("should fail when the folder does not exist", async () => {
    await expect(
      generator.generate({ photoDir: path.join(dir, "missing") })
    ).rejects.toThrow(UsageError);
  });
});
