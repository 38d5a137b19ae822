import fs from "fs";
import os from "os";
import path from "path";
import { UsageError } from "../../src/models/errors";
import { GpxBuilder } from "../../src/services/gpx-builder";
import { PhotoSync } from "../../src/services/photo-sync";
import { FakeReader, FakeWriter } from "../utils/fakes";

const PHOTOS = {
  "A.NEF": { takenAt: new Date("2024-06-01T12:10:00Z") },
  "B.jpg": { takenAt: new Date("2024-06-01T15:00:00Z") },
  "C.cr2": {},
  "D.arw": { takenAt: new Date("2024-06-01T12:29:00Z") },
};

describe("PhotoSync", () => {
  let dir: string;
  let rawDir: string;
  let trackFile: string;
  let writer: FakeWriter;
  let sync: PhotoSync;

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "sync-"));
    rawDir = path.join(dir, "raw");
    trackFile = path.join(dir, "track.gpx");

    fs.mkdirSync(rawDir);
    for (const name of [...Object.keys(PHOTOS), "E.backup.jpg", "notes.txt"]) {
      fs.writeFileSync(path.join(rawDir, name), `content of ${name}`);
    }

    await GpxBuilder.writeFile(trackFile, [
      {
        lat: 45.764,
        lon: 4.8357,
        time: new Date("2024-06-01T12:00:00Z"),
        city: "Lyon",
        state: "Auvergne-Rhône-Alpes",
        country: "France",
        countryCode: "FR",
      },
      {
        lat: 45.8,
        lon: 4.9,
        altitude: 250,
        time: new Date("2024-06-01T12:30:00Z"),
      },
    ]);

    writer = new FakeWriter(["D.arw"]);
    sync = new PhotoSync(new FakeReader(PHOTOS), writer);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should write the closest track point onto each photo", async () => {
    const summary = await sync.sync({ trackFile, photoDir: rawDir });

    expect(summary).toEqual({
      total: 4,
      synced: 1,
      skippedNoDate: 1,
      skippedTooFar: 1,
      errors: 1,
    });
    expect(writer.written).toEqual([
      {
        file: "A.NEF",
        point: {
          lat: 45.764,
          lon: 4.8357,
          time: new Date("2024-06-01T12:00:00Z"),
          city: "Lyon",
          state: "Auvergne-Rhône-Alpes",
          country: "France",
          countryCode: "FR",
        },
      },
    ]);
  });

  it("should honour a custom tolerance", async () => {
    const summary = await sync.sync({
      trackFile,
      photoDir: rawDir,
      toleranceSeconds: 120,
    });

    // A.NEF is 10 minutes off; D.arw is 1 minute off but fails to write
    expect(summary).toMatchObject({ synced: 0, skippedTooFar: 2, errors: 1 });
  });

  it("should write nothing in dry-run mode", async () => {
    const summary = await sync.sync({ trackFile, photoDir: rawDir, dryRun: true });

    expect(summary).toMatchObject({ synced: 2, errors: 0 });
    expect(writer.written).toEqual([]);
  });

  it("should keep a backup copy before writing", async () => {
    await sync.sync({ trackFile, photoDir: rawDir, backup: true });

    expect(fs.readFileSync(path.join(rawDir, "A.NEF.backup"), "utf-8")).toBe(
      "content of A.NEF"
    );
    expect(fs.existsSync(path.join(rawDir, "B.jpg.backup"))).toBe(false);
  });

  it("should not replace an existing backup", async () => {
    fs.writeFileSync(path.join(rawDir, "A.NEF.backup"), "original");

    await sync.sync({ trackFile, photoDir: rawDir, backup: true });

    expect(fs.readFileSync(path.join(rawDir, "A.NEF.backup"), "utf-8")).toBe(
      "original"
    );
  });

  it("should fail on a track without usable points", async () => {
    await GpxBuilder.writeFile(trackFile, [{ lat: 45.764, lon: 4.8357 }]);

    await expect(
      sync.sync({ trackFile, photoDir: rawDir })
    ).rejects.toThrow(`No GPX points found in ${trackFile}`);
  });

  it("should fail when the track file does not exist", async () => {
    await expect(
      sync.sync({ trackFile: path.join(dir, "missing.gpx"), photoDir: rawDir })
    ).rejects.toBeInstanceOf(UsageError);
  });
});
