/**
 * Route Aggregator
 * Combines all routers into a single router.
 */

import { Router } from "express";
import { createHealthRouter } from "./health.js";
import { createMediaRouter } from "./media.js";
import type { MediaControllerDependencies } from "../controllers/mediaController.js";

export function createRouter(deps: MediaControllerDependencies): Router {
  const router = Router();

  /** Register all route modules */
  router.use(createHealthRouter(deps.outputDir));
  router.use(createMediaRouter(deps));

  return router;
}
