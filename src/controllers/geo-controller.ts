import { Request, Response } from "express";
import { BatchSummary, IndexedCoordinate, PlaceRecord } from "../models/geo-data";
import { BatchCoordinator } from "../services/batch-coordinator";
import { GeoResolver } from "../services/geo-resolver";
import { GeoUtil } from "../services/geo-util";
import { SpatialCache } from "../services/spatial-cache";

export const MAX_BATCH_SIZE = 1000;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function toCoordinate(
  value: unknown,
  index: number
): IndexedCoordinate | null {
  if (!isRecord(value)) return null;
  const lat = toNumber(value.lat);
  const lon = toNumber(value.lon);
  if (lat === null || lon === null || !GeoUtil.isValidCoordinate(lat, lon)) {
    return null;
  }
  return { index, lat, lon };
}

function toNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const number = Number(value);
    return Number.isFinite(number) ? number : null;
  }
  return null;
}

function isTruthyFlag(value: unknown): boolean {
  return value === true || value === "true" || value === "1";
}

interface BatchOutcome {
  results: Map<number, PlaceRecord>;
  summary: BatchSummary;
}

/**
 * Reverse geocoding endpoints over the shared cache and resolver.
 * Batches run one at a time so each request sees its own summary.
 */
export class GeoController {
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly cache: SpatialCache,
    private readonly batch: BatchCoordinator,
    private readonly resolver: GeoResolver
  ) {}

  // GET /api/geo/reverse?lat=..&lon=..&anonymize=true
  public reverse = async (req: Request, res: Response): Promise<void> => {
    const coord = toCoordinate(req.query, 0);
    if (!coord) {
      res.status(400).json({
        error: "Query parameters lat and lon must be valid coordinates",
      });
      return;
    }

    try {
      console.log(`Reverse geocoding ${coord.lat}, ${coord.lon}`);
      const { results } = await this.runBatch(
        [coord],
        isTruthyFlag(req.query.anonymize)
      );

      res.status(200).json(results.get(0));
    } catch (error) {
      console.error("Error processing reverse geocoding request:", error);
      res.status(500).json({ error: "Failed to process reverse geocoding request" });
    }
  };

  // POST /api/geo/batch { coordinates: [{ lat, lon }], anonymize }
  public resolveBatch = async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const coordinates = isRecord(body) ? body.coordinates : undefined;
    if (!Array.isArray(coordinates) || coordinates.length === 0) {
      res.status(400).json({ error: "Body must contain a non-empty coordinates array" });
      return;
    }
    if (coordinates.length > MAX_BATCH_SIZE) {
      res.status(400).json({
        error: `At most ${MAX_BATCH_SIZE} coordinates per request`,
      });
      return;
    }

    const coords: IndexedCoordinate[] = [];
    for (const [index, value] of coordinates.entries()) {
      const coord = toCoordinate(value, index);
      if (!coord) {
        res.status(400).json({ error: `Invalid coordinate at index ${index}` });
        return;
      }
      coords.push(coord);
    }

    try {
      const anonymize = isRecord(body) && isTruthyFlag(body.anonymize);
      const { results, summary } = await this.runBatch(coords, anonymize);

      res.status(200).json({
        results: coords.map((coord) => results.get(coord.index)),
        summary,
      });
    } catch (error) {
      console.error("Error processing batch request:", error);
      res.status(500).json({ error: "Failed to process batch request" });
    }
  };

  // GET /api/geo/cache/stats
  public stats = async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json({
      cache: this.cache.getStats(),
      resolver: this.resolver.getStats(),
      summary: this.cache.formatStats(),
    });
  };

  private runBatch(
    coords: IndexedCoordinate[],
    anonymize: boolean
  ): Promise<BatchOutcome> {
    const run = this.queue.then(() => this.resolveAndSave(coords, anonymize));
    // The failure is reported by the handler awaiting run
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async resolveAndSave(
    coords: IndexedCoordinate[],
    anonymize: boolean
  ): Promise<BatchOutcome> {
    const results = await this.batch.resolveBatch(coords, anonymize);
    const summary = this.batch.getLastSummary();
    if (summary.fetched > 0 || summary.anonymizedHits > 0) {
      await this.cache.save();
    }
    return { results, summary };
  }
}
