import fs from "fs";
import path from "path";
import { IndexedCoordinate, PlaceRecord } from "../models/geo-data";
import { UsageError } from "../models/errors";
import { BatchCoordinator } from "./batch-coordinator";
import { GpxBuilder, GpxWaypoint } from "./gpx-builder";
import { PhotoMetadataReader } from "./photo-metadata";
import { GENERATE_EXTENSIONS, scanPhotos } from "./photo-scanner";
import { SpatialCache } from "./spatial-cache";

export interface GenerateOptions {
  photoDir: string;
  outDir?: string;
  anonymize?: boolean;
}

export interface GenerateSummary {
  outputFile: string;
  photosFound: number;
  trackPoints: number;
  skippedNoExif: number;
  skippedNoGps: number;
  cacheSaved: boolean;
  elapsedSeconds: number;
}

export interface GeotaggedPhoto {
  index: number;
  fileName: string;
  lat: number;
  lon: number;
  altitude?: number;
  takenAt?: Date;
  place?: PlaceRecord;
}

/**
 * Builds a GPX track from the geotagged photos of a folder
 */
export class TrackGenerator {
  constructor(
    private readonly reader: PhotoMetadataReader,
    private readonly batch: BatchCoordinator,
    private readonly cache: SpatialCache
  ) {}

  public async generate(options: GenerateOptions): Promise<GenerateSummary> {
    const startedAt = Date.now();
    const anonymize = options.anonymize ?? false;

    if (!fs.existsSync(options.photoDir)) {
      throw new UsageError(`Folder '${options.photoDir}' does not exist`);
    }
    const outDir = options.outDir ?? options.photoDir;
    await fs.promises.mkdir(outDir, { recursive: true });

    console.log(`Searching for photos in: ${options.photoDir}`);
    const files = await scanPhotos(options.photoDir, GENERATE_EXTENSIONS);
    console.log(`Found ${files.length} photos`);

    // Phase 1: GPS extraction
    const photos: GeotaggedPhoto[] = [];
    let skippedNoExif = 0;
    let skippedNoGps = 0;

    for (const [index, file] of files.entries()) {
      const fileName = path.basename(file);
      const metadata = await this.reader.read(file);
      if (!metadata) {
        console.warn(`No EXIF data: ${fileName}`);
        skippedNoExif++;
        continue;
      }
      if (metadata.lat === undefined || metadata.lon === undefined) {
        console.warn(`No GPS data: ${fileName}`);
        skippedNoGps++;
        continue;
      }

      photos.push({
        index,
        fileName,
        lat: metadata.lat,
        lon: metadata.lon,
        altitude: metadata.altitude,
        takenAt: metadata.takenAt,
      });
    }

    if (photos.length === 0) {
      throw new UsageError("No photos with GPS data found");
    }
    console.log(`${photos.length} photos with GPS found`);

    // Phase 2: reverse geocoding
    const coords: IndexedCoordinate[] = photos.map(({ index, lat, lon }) => ({
      index,
      lat,
      lon,
    }));
    console.log(`Reverse geocoding (${coords.length} potential requests)...`);
    const places = await this.batch.resolveBatch(coords, anonymize);

    // Phase 3: association
    for (const photo of photos) {
      photo.place = places.get(photo.index);
    }
    photos.sort(TrackGenerator.byCaptureTime);

    const cacheSaved = await this.cache.save();

    const folderName = path.basename(path.resolve(options.photoDir));
    const fileName = anonymize
      ? `gps_track_${folderName}_anonymized.gpx`
      : `gps_track_${folderName}.gpx`;
    const outputFile = GpxBuilder.versionedPath(outDir, fileName);
    await GpxBuilder.writeFile(
      outputFile,
      photos.map((photo) => TrackGenerator.toWaypoint(photo, anonymize))
    );
    console.log(`GPX file created: ${outputFile}`);

    return {
      outputFile,
      photosFound: files.length,
      trackPoints: photos.length,
      skippedNoExif,
      skippedNoGps,
      cacheSaved,
      elapsedSeconds: (Date.now() - startedAt) / 1000,
    };
  }

  /**
   * Track point for a photo. The resolved record's coordinates replace the
   * photo's own only in an anonymized run, and only when the record was
   * anonymized.
   */
  static toWaypoint(photo: GeotaggedPhoto, anonymize: boolean): GpxWaypoint {
    const place = photo.place;
    const centre = anonymize && place?.anonymized ? place : undefined;

    return {
      lat: centre ? centre.lat : photo.lat,
      lon: centre ? centre.lon : photo.lon,
      altitude: photo.altitude,
      time: photo.takenAt,
      name: photo.fileName,
      city: place?.city,
      state: place?.state,
      country: place?.country,
      countryCode: place?.countryCode,
    };
  }

  /**
   * Oldest first; photos without a capture time go last
   */
  private static byCaptureTime(a: GeotaggedPhoto, b: GeotaggedPhoto): number {
    if (!a.takenAt && !b.takenAt) return 0;
    if (!a.takenAt) return 1;
    if (!b.takenAt) return -1;
    return a.takenAt.getTime() - b.takenAt.getTime();
  }
}
