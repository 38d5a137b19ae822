import fs from "fs";
import { XMLParser } from "fast-xml-parser";
import { TrackPoint } from "../models/geo-data";

export interface GpxParseResult {
  points: TrackPoint[];
  skipped: {
    missingTime: number;
    invalidTime: number;
    invalidCoordinates: number;
  };
}

export interface PlaceDescription {
  city?: string;
  state?: string;
  country?: string;
  countryCode?: string;
}

// date, time, fraction, zone
const ISO_TIME =
  /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}:\d{2})(\.\d+)?(Z|[+-]\d{2}:?\d{2})?$/i;

const GPS_LABEL = /^GPS -?\d+(\.\d+)?$/;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toList = (value: unknown): unknown[] => {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
};

const toNumber = (text: string | undefined): number =>
  text ? Number(text) : NaN;

/**
 * Text content of a parsed element, whether or not it carried attributes
 */
const textOf = (value: unknown): string | undefined => {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  if (isRecord(value)) return textOf(value["#text"]);
  return undefined;
};

/**
 * Reads track points out of GPX documents
 */
export class GpxParser {
  private static readonly xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    removeNSPrefix: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });

  static async parseFile(filePath: string): Promise<GpxParseResult> {
    const xml = await fs.promises.readFile(filePath, "utf-8");
    return GpxParser.parse(xml);
  }

  /**
   * Parse every <trkpt> of every track segment, in document order.
   * Points without a usable time or coordinate are skipped and counted.
   */
  static parse(xml: string): GpxParseResult {
    const doc: unknown = GpxParser.xmlParser.parse(xml);
    const result: GpxParseResult = {
      points: [],
      skipped: { missingTime: 0, invalidTime: 0, invalidCoordinates: 0 },
    };

    if (!isRecord(doc) || !isRecord(doc.gpx)) {
      return result;
    }

    for (const trk of toList(doc.gpx.trk)) {
      if (!isRecord(trk)) continue;

      for (const seg of toList(trk.trkseg)) {
        if (!isRecord(seg)) continue;

        for (const trkpt of toList(seg.trkpt)) {
          GpxParser.readPoint(trkpt, result);
        }
      }
    }

    return result;
  }

  /**
   * Parse a GPX time. A time without an offset is read as UTC.
   */
  static parseTime(value: string): Date | null {
    const match = ISO_TIME.exec(value.trim());
    if (!match) return null;

    const [, date, time, fraction = "", zone = "Z"] = match;
    let offset = zone.toUpperCase();
    if (offset !== "Z" && !offset.includes(":")) {
      offset = `${offset.slice(0, 3)}:${offset.slice(3)}`;
    }

    const parsed = new Date(`${date}T${time}${fraction}${offset}`);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }

  /**
   * Parse a point description written as "City, State, Country (CODE)" or
   * "City, Country (CODE)"
   */
  static parseDescription(desc: string): PlaceDescription {
    let rest = desc.trim();
    const place: PlaceDescription = {};

    const open = rest.lastIndexOf("(");
    const close = rest.lastIndexOf(")");
    if (open !== -1 && close > open) {
      const code = rest.slice(open + 1, close).trim();
      if (code) place.countryCode = code;
      rest = rest.slice(0, open).trim().replace(/,$/, "").trim();
    }

    const parts = rest
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part);

    // The GPS fallback label has a comma of its own
    if (parts.length >= 2 && GPS_LABEL.test(parts[0])) {
      parts.splice(0, 2, `${parts[0]}, ${parts[1]}`);
    }

    if (parts.length >= 3) {
      [place.city, place.state, place.country] = parts;
    } else if (parts.length === 2) {
      [place.city, place.country] = parts;
    } else if (parts.length === 1) {
      place.city = parts[0];
    }
    return place;
  }

  private static readPoint(trkpt: unknown, result: GpxParseResult): void {
    if (!isRecord(trkpt)) {
      result.skipped.invalidCoordinates++;
      return;
    }

    const lat = toNumber(textOf(trkpt["@_lat"]));
    const lon = toNumber(textOf(trkpt["@_lon"]));
    if (!Number.isFinite(lat) || !Number.isFinite(lon)) {
      result.skipped.invalidCoordinates++;
      return;
    }

    const timeText = textOf(trkpt.time);
    if (!timeText) {
      if (result.skipped.missingTime < 5) {
        console.warn(`Track point without timestamp skipped: ${lat}, ${lon}`);
      }
      result.skipped.missingTime++;
      return;
    }

    const time = GpxParser.parseTime(timeText);
    if (!time) {
      if (result.skipped.invalidTime < 5) {
        console.warn(`Unreadable track point time "${timeText}" skipped`);
      }
      result.skipped.invalidTime++;
      return;
    }

    const point: TrackPoint = { lat, lon, time };

    const altitude = toNumber(textOf(trkpt.ele));
    if (Number.isFinite(altitude)) point.altitude = altitude;

    const name = textOf(trkpt.name);
    if (name) point.name = name;

    const desc = textOf(trkpt.desc);
    if (desc) {
      Object.assign(point, GpxParser.parseDescription(desc));
    }

    result.points.push(point);
  }
}
