import fs from "fs";
import path from "path";
import { TrackPoint } from "../models/geo-data";
import { UsageError } from "../models/errors";
import { GpxParser } from "./gpx-parser";
import { PhotoMetadataReader, PhotoMetadataWriter } from "./photo-metadata";
import { SYNC_EXTENSIONS, scanPhotos } from "./photo-scanner";
import { DEFAULT_TOLERANCE_SECONDS, TemporalMatcher } from "./temporal-matcher";

export interface SyncOptions {
  trackFile: string;
  photoDir: string;
  backup?: boolean;
  dryRun?: boolean;
  toleranceSeconds?: number;
}

export interface SyncSummary {
  total: number;
  synced: number;
  skippedNoDate: number;
  skippedTooFar: number;
  errors: number;
}

/**
 * Copies track locations onto photos taken during the track
 */
export class PhotoSync {
  constructor(
    private readonly reader: PhotoMetadataReader,
    private readonly writer: PhotoMetadataWriter
  ) {}

  /**
   * Load the track points of a GPX file; an empty track is a usage error
   */
  static async loadTrack(trackFile: string): Promise<TrackPoint[]> {
    if (!fs.existsSync(trackFile)) {
      throw new UsageError(`GPX file '${trackFile}' does not exist`);
    }

    const { points, skipped } = await GpxParser.parseFile(trackFile);
    const ignored =
      skipped.missingTime + skipped.invalidTime + skipped.invalidCoordinates;
    if (ignored > 0) {
      console.warn(
        `${ignored} track points ignored (${skipped.missingTime} without time, ${skipped.invalidTime} bad time, ${skipped.invalidCoordinates} bad coordinates)`
      );
    }
    if (points.length === 0) {
      throw new UsageError(`No GPX points found in ${trackFile}`);
    }

    console.log(`${points.length} valid GPX points loaded from ${trackFile}`);
    console.log(
      `Period: ${points[0].time.toISOString()} -> ${points[points.length - 1].time.toISOString()}`
    );
    return points;
  }

  public async sync(options: SyncOptions): Promise<SyncSummary> {
    const points = await PhotoSync.loadTrack(options.trackFile);
    if (!fs.existsSync(options.photoDir)) {
      throw new UsageError(`Folder '${options.photoDir}' does not exist`);
    }
    return this.syncPoints(points, options);
  }

  public async syncPoints(
    points: readonly TrackPoint[],
    options: Omit<SyncOptions, "trackFile">
  ): Promise<SyncSummary> {
    const tolerance = options.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS;

    console.log(`Searching for photos in: ${options.photoDir}`);
    const files = await scanPhotos(options.photoDir, SYNC_EXTENSIONS);
    console.log(`Found ${files.length} photos`);

    const summary: SyncSummary = {
      total: files.length,
      synced: 0,
      skippedNoDate: 0,
      skippedTooFar: 0,
      errors: 0,
    };

    for (const file of files) {
      const fileName = path.basename(file);

      const metadata = await this.reader.read(file);
      const takenAt = metadata?.takenAt;
      if (!takenAt) {
        console.warn(`${fileName}: no EXIF date found, skipped`);
        summary.skippedNoDate++;
        continue;
      }

      const match = TemporalMatcher.closest(takenAt, points, tolerance);
      if (!match.matched) {
        console.warn(
          `${fileName}: closest point is ${(match.deltaSeconds / 60).toFixed(1)} min away, skipped`
        );
        summary.skippedTooFar++;
        continue;
      }

      const { point } = match;
      console.log(
        `${fileName}: match found (${match.deltaSeconds.toFixed(0)}s), ${point.lat.toFixed(6)}, ${point.lon.toFixed(6)}${PhotoSync.describePlace(point)}`
      );

      if (await this.apply(file, point, options)) {
        summary.synced++;
      } else {
        summary.errors++;
      }
    }

    return summary;
  }

  private async apply(
    file: string,
    point: TrackPoint,
    options: Omit<SyncOptions, "trackFile">
  ): Promise<boolean> {
    if (options.dryRun) {
      console.log(`[DRY-RUN] ${path.basename(file)} not modified`);
      return true;
    }

    if (options.backup) {
      const backupPath = `${file}.backup`;
      try {
        if (!fs.existsSync(backupPath)) {
          await fs.promises.copyFile(file, backupPath);
        }
      } catch (error) {
        console.error(`Could not back up ${file}, leaving it untouched:`, error);
        return false;
      }
    }

    return this.writer.write(file, point);
  }

  /**
   * Example: " (Lyon, Auvergne-Rhône-Alpes, France (FR))"
   */
  private static describePlace(point: TrackPoint): string {
    const parts: string[] = [];
    if (point.city) parts.push(point.city);
    if (point.state) parts.push(point.state);
    if (point.country) {
      parts.push(
        point.countryCode ? `${point.country} (${point.countryCode})` : point.country
      );
    }
    return parts.length > 0 ? ` (${parts.join(", ")})` : "";
  }
}
