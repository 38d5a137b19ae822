import exifr from "exifr";
import { PhotoMetadata } from "../models/geo-data";
import { PhotoMetadataReader, parseExifDate } from "./photo-metadata";

const DATE_TAGS = ["DateTimeOriginal", "CreateDate", "ModifyDate"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * EXIF reader backed by exifr
 */
export class ExifrMetadataReader implements PhotoMetadataReader {
  public async read(filePath: string): Promise<PhotoMetadata | null> {
    let tags: unknown;
    try {
      tags = await exifr.parse(filePath, {
        tiff: true,
        exif: true,
        gps: true,
        // Keep dates as written, they are interpreted in parseExifDate
        reviveValues: false,
        translateValues: false,
      });
    } catch (error) {
      console.warn(
        `Could not read EXIF from ${filePath}:`,
        error instanceof Error ? error.message : error
      );
      return null;
    }

    if (!isRecord(tags)) {
      return null;
    }

    const metadata: PhotoMetadata = {};

    const lat =
      toFiniteNumber(tags.latitude) ??
      dmsToDecimal(tags.GPSLatitude, tags.GPSLatitudeRef);
    const lon =
      toFiniteNumber(tags.longitude) ??
      dmsToDecimal(tags.GPSLongitude, tags.GPSLongitudeRef);
    if (lat !== undefined && lon !== undefined) {
      metadata.lat = lat;
      metadata.lon = lon;
    }

    const altitude = toFiniteNumber(tags.GPSAltitude);
    if (altitude !== undefined) {
      metadata.altitude = isBelowSeaLevel(tags.GPSAltitudeRef)
        ? -altitude
        : altitude;
    }

    for (const tag of DATE_TAGS) {
      const takenAt = parseExifDate(tags[tag]);
      if (takenAt) {
        metadata.takenAt = takenAt;
        break;
      }
    }

    return metadata;
  }
}

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value !== "number" && typeof value !== "string") return undefined;
  if (typeof value === "string" && value.trim() === "") return undefined;
  const number = Number(value);
  return Number.isFinite(number) ? number : undefined;
}

/**
 * Raw GPS tag [degrees, minutes, seconds] plus hemisphere reference
 */
function dmsToDecimal(dms: unknown, ref: unknown): number | undefined {
  if (!Array.isArray(dms) || dms.length !== 3) return undefined;

  const [degrees, minutes, seconds] = dms.map((part) => toFiniteNumber(part));
  if (degrees === undefined || minutes === undefined || seconds === undefined) {
    return undefined;
  }

  const decimal = degrees + minutes / 60 + seconds / 3600;
  return ref === "S" || ref === "W" ? -decimal : decimal;
}

/**
 * GPSAltitudeRef is 1 (or a one-byte buffer holding 1) below sea level
 */
function isBelowSeaLevel(ref: unknown): boolean {
  if (typeof ref === "number") return ref === 1;
  if (ref instanceof Uint8Array) return ref[0] === 1;
  if (typeof ref === "string") return ref === "1" || /below/i.test(ref);
  return false;
}
