import { Router } from "express";
import { GeoController } from "../controllers/geo-controller";
import { TrackController } from "../controllers/track-controller";

export function createGeoRoutes(controller: GeoController): Router {
  const router = Router();

  // GET /api/geo/reverse?lat=48.8566&lon=2.3522
  router.get("/reverse", controller.reverse);

  // POST /api/geo/batch
  router.post("/batch", controller.resolveBatch);

  router.get("/cache/stats", controller.stats);

  return router;
}

export function createTrackRoutes(controller: TrackController): Router {
  const router = Router();

  // POST /api/track/match
  router.post("/match", controller.match);

  return router;
}
