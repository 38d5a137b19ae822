import fs from "fs";
import path from "path";
import { XMLBuilder } from "fast-xml-parser";
import { PlaceRecordUtil } from "./place-record-util";

export const GPX_NAMESPACE = "http://www.topografix.com/GPX/1/1";

export interface GpxWaypoint {
  lat: number;
  lon: number;
  altitude?: number;
  time?: Date;
  name?: string;
  city?: string | null;
  state?: string;
  country?: string;
  countryCode?: string;
}

export interface GpxDocumentOptions {
  creator?: string;
  name?: string;
  description?: string;
  trackName?: string;
}

/**
 * Writes photo tracks as GPX 1.1 documents
 */
export class GpxBuilder {
  private static readonly xmlBuilder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    indentBy: "  ",
    suppressEmptyNode: true,
  });

  /**
   * Example: 2024-06-01T12:00:00.000Z -> "2024-06-01T12:00:00Z"
   */
  static formatTime(time: Date): string {
    return time.toISOString().replace(/\.\d{3}Z$/, "Z");
  }

  static build(points: GpxWaypoint[], options: GpxDocumentOptions = {}): string {
    const trkpt = points.map((point) => {
      const node: Record<string, string> = {
        "@_lat": String(point.lat),
        "@_lon": String(point.lon),
      };
      if (point.altitude !== undefined && Number.isFinite(point.altitude)) {
        node.ele = String(point.altitude);
      }
      if (point.time) {
        node.time = GpxBuilder.formatTime(point.time);
      }
      if (point.name) {
        node.name = point.name;
      }
      if (point.city) {
        node.desc = PlaceRecordUtil.describe(point);
      }
      return node;
    });

    return GpxBuilder.xmlBuilder.build({
      "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
      gpx: {
        "@_version": "1.1",
        "@_creator": options.creator ?? "photo-geotrack",
        "@_xmlns": GPX_NAMESPACE,
        "@_xmlns:xsi": "http://www.w3.org/2001/XMLSchema-instance",
        "@_xsi:schemaLocation": `${GPX_NAMESPACE} ${GPX_NAMESPACE}/gpx.xsd`,
        metadata: {
          name: options.name ?? "GPS Track from photos",
          desc: options.description ?? "Track automatically generated with geolocation",
        },
        trk: {
          name: options.trackName ?? "My photo track",
          trkseg: { trkpt },
        },
      },
    });
  }

  static async writeFile(
    filePath: string,
    points: GpxWaypoint[],
    options: GpxDocumentOptions = {}
  ): Promise<void> {
    await fs.promises.writeFile(
      filePath,
      GpxBuilder.build(points, options),
      "utf-8"
    );
  }

  /**
   * First free file name in `folder`: `base.gpx`, then `base_v2.gpx`,
   * `base_v3.gpx`, ...
   */
  static versionedPath(folder: string, fileName: string): string {
    const first = path.join(folder, fileName);
    if (!fs.existsSync(first)) {
      return first;
    }

    const ext = path.extname(fileName);
    const base = path.basename(fileName, ext);
    for (let version = 2; ; version++) {
      const candidate = path.join(folder, `${base}_v${version}${ext}`);
      if (!fs.existsSync(candidate)) {
        return candidate;
      }
    }
  }
}
