/**
 * Media Routes
 * Rendition probes, downloads and retrieval of finished files.
 */

import { Router } from "express";
import { createMediaController, type MediaControllerDependencies } from "../controllers/mediaController.js";
import { validateBody } from "../middlewares/validation.js";
import { infoSchema, downloadSchema } from "../middlewares/schemas/mediaSchemas.js";
import { createApiLimiter, createDownloadLimiter } from "../middlewares/rateLimiting.js";

export function createMediaRouter(deps: MediaControllerDependencies): Router {
  const router = Router();
  const controller = createMediaController(deps);
  const apiLimiter = createApiLimiter();

  /** Cookie file status */
  router.get("/api/auth/status", apiLimiter, controller.getAuthStatus);

  /** List renditions for a URL */
  router.post("/api/info", apiLimiter, validateBody(infoSchema), controller.getInfo);

  /** Download a rendition or its audio */
  router.post("/api/download", apiLimiter, createDownloadLimiter(), validateBody(downloadSchema), controller.download);

  /** Retrieve a finished download */
  router.get("/downloads/:filename", controller.serveDownload);

  return router;
}
