import { Request, Response } from "express";
import { TrackPoint } from "../models/geo-data";
import { GeoUtil } from "../services/geo-util";
import { GpxParser } from "../services/gpx-parser";
import { TemporalMatcher } from "../services/temporal-matcher";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalText = (value: unknown): string | undefined =>
  typeof value === "string" && value !== "" ? value : undefined;

function toTrackPoint(value: unknown): TrackPoint | null {
  if (!isRecord(value)) return null;
  const { lat, lon, time } = value;
  if (typeof lat !== "number" || typeof lon !== "number") return null;
  if (!GeoUtil.isValidCoordinate(lat, lon) || typeof time !== "string") {
    return null;
  }

  const parsed = GpxParser.parseTime(time);
  if (!parsed) return null;

  const point: TrackPoint = { lat, lon, time: parsed };
  if (typeof value.altitude === "number" && Number.isFinite(value.altitude)) {
    point.altitude = value.altitude;
  }
  point.name = optionalText(value.name);
  point.city = optionalText(value.city);
  point.state = optionalText(value.state);
  point.country = optionalText(value.country);
  point.countryCode = optionalText(value.countryCode);
  return point;
}

export class TrackController {
  constructor(private readonly defaultToleranceSeconds: number) {}

  // POST /api/track/match { time, points, toleranceSeconds }
  public match = async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.time !== "string") {
      res.status(400).json({ error: "Body must contain a time string" });
      return;
    }

    const photoTime = GpxParser.parseTime(body.time);
    if (!photoTime) {
      res.status(400).json({ error: `Invalid time: ${body.time}` });
      return;
    }

    if (!Array.isArray(body.points)) {
      res.status(400).json({ error: "Body must contain a points array" });
      return;
    }

    const points: TrackPoint[] = [];
    for (const [index, value] of body.points.entries()) {
      const point = toTrackPoint(value);
      if (!point) {
        res.status(400).json({ error: `Invalid track point at index ${index}` });
        return;
      }
      points.push(point);
    }

    let tolerance = this.defaultToleranceSeconds;
    if (body.toleranceSeconds !== undefined) {
      if (
        typeof body.toleranceSeconds !== "number" ||
        !Number.isFinite(body.toleranceSeconds) ||
        body.toleranceSeconds < 0
      ) {
        res.status(400).json({ error: "toleranceSeconds must be a non-negative number" });
        return;
      }
      tolerance = body.toleranceSeconds;
    }

    const result = TemporalMatcher.closest(photoTime, points, tolerance);
    // Infinity is not representable in JSON
    res.status(200).json(
      Number.isFinite(result.deltaSeconds)
        ? result
        : { matched: false, deltaSeconds: null }
    );
  };
}
