import { ExifTool, WriteTags } from "exiftool-vendored";
import { TrackPoint } from "../models/geo-data";
import { GeoUtil } from "./geo-util";
import { PhotoMetadataWriter } from "./photo-metadata";

/**
 * Writes GPS and place tags with exiftool. Works on JPEG and on the RAW
 * formats exiftool can edit (NEF, CR2, ARW, ...).
 */
export class ExiftoolMetadataWriter implements PhotoMetadataWriter {
  constructor(private readonly exiftool: ExifTool = new ExifTool()) {}

  static buildTags(point: TrackPoint): WriteTags {
    const lat = GeoUtil.toDms(point.lat, "lat");
    const lon = GeoUtil.toDms(point.lon, "lon");

    const tags: WriteTags = {
      GPSLatitude: Math.abs(point.lat),
      GPSLatitudeRef: lat.ref,
      GPSLongitude: Math.abs(point.lon),
      GPSLongitudeRef: lon.ref,
    };

    if (point.altitude !== undefined) {
      tags.GPSAltitude = Math.abs(point.altitude);
      tags.GPSAltitudeRef =
        point.altitude >= 0 ? "Above Sea Level" : "Below Sea Level";
    }

    if (point.city) tags.City = point.city;
    if (point.state) tags.State = point.state;
    if (point.country) tags.Country = point.country;
    if (point.countryCode) tags.CountryCode = point.countryCode;

    return tags;
  }

  public async write(filePath: string, point: TrackPoint): Promise<boolean> {
    try {
      await this.exiftool.write(filePath, ExiftoolMetadataWriter.buildTags(point));
      console.log(
        `GPS ${GeoUtil.formatDms(point.lat, "lat")} ${GeoUtil.formatDms(point.lon, "lon")} and place tags written to ${filePath}`
      );
      return true;
    } catch (error) {
      console.error(`Failed to write metadata to ${filePath}:`, error);
      return false;
    }
  }

  /**
   * Stop the background exiftool process
   */
  public async close(): Promise<void> {
    await this.exiftool.end();
  }
}
