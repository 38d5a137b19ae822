import { PhotoMetadata, TrackPoint } from "../models/geo-data";

/**
 * Reads GPS position and capture time from a photo. Resolves null when the
 * file has no readable metadata at all.
 */
export interface PhotoMetadataReader {
  read(filePath: string): Promise<PhotoMetadata | null>;
}

/**
 * Writes a track point's position and place names into a photo.
 * Resolves false on failure instead of rejecting.
 */
export interface PhotoMetadataWriter {
  write(filePath: string, point: TrackPoint): Promise<boolean>;
}

// "2024:06:01 12:00:00", optionally with sub-seconds or an offset
const EXIF_DATE =
  /^(\d{4})[:-](\d{2})[:-](\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse an EXIF date/time. EXIF times carry no zone, so the wall-clock value
 * is read as UTC, matching how zone-less GPX times are read.
 */
export function parseExifDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value !== "string") {
    return undefined;
  }

  const match = EXIF_DATE.exec(value.trim());
  if (!match) {
    return undefined;
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1, 7)
    .map((part) => Number(part));
  if (year === 0 || month === 0 || day === 0) {
    // Cameras write "0000:00:00 00:00:00" when the clock was never set
    return undefined;
  }

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return Number.isNaN(date.getTime()) ? undefined : date;
}
