import express from "express";
import { GeoController } from "./controllers/geo-controller";
import { TrackController } from "./controllers/track-controller";
import { createGeoRoutes, createTrackRoutes } from "./routes/geo-routes";
import { BatchCoordinator } from "./services/batch-coordinator";
import { GeoResolver } from "./services/geo-resolver";
import { SpatialCache } from "./services/spatial-cache";

export interface AppDependencies {
  cache: SpatialCache;
  resolver: GeoResolver;
  batch: BatchCoordinator;
  toleranceSeconds: number;
}

const hasStatus = (err: unknown): err is { status: number } =>
  typeof err === "object" &&
  err !== null &&
  "status" in err &&
  typeof err.status === "number";

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: "1mb" }));

  // Routes
  app.use(
    "/api/geo",
    createGeoRoutes(new GeoController(deps.cache, deps.batch, deps.resolver))
  );
  app.use(
    "/api/track",
    createTrackRoutes(new TrackController(deps.toleranceSeconds))
  );

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({ status: "UP" });
  });

  // Error handling middleware
  app.use(
    (
      err: unknown,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      // Malformed JSON bodies arrive here with a 4xx status
      if (hasStatus(err) && err.status >= 400 && err.status < 500) {
        res.status(err.status).json({ error: "Invalid request body" });
        return;
      }
      console.error(err instanceof Error ? err.stack : err);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}
