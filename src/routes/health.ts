/**
 * Health Check Routes
 * Infrastructure endpoints for monitoring and orchestration.
 */

import fs from "fs";
import { Router } from "express";

export function createHealthRouter(outputDir: string): Router {
  const healthRouter = Router();

  /** Simple health check endpoint. */
  healthRouter.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  /** Readiness: the output directory must exist before downloads can land. */
  healthRouter.get("/ready", (_req, res) => {
    const ready = fs.existsSync(outputDir);
    res.status(ready ? 200 : 503).json({ ready });
  });

  return healthRouter;
}
