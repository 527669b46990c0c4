import express, { type Express } from "express";
import helmet from "helmet";
import cors from "cors";
import { createRouter } from "./routes/index.js";
import { errorHandler } from "./middlewares/errorHandler.js";
import type { MediaControllerDependencies } from "./controllers/mediaController.js";

export interface AppDependencies extends MediaControllerDependencies {
  /** Directory served at "/" (index.html). Omitted in tests. */
  staticDir?: string;
}

/**
 * Builds the Express application.
 * Configures global middleware and routes around the injected extractor.
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());
  /** Parses JSON request bodies. */
  app.use(express.json({ limit: "100kb" }));

  if (deps.staticDir) {
    app.use(express.static(deps.staticDir));
  }

  /** Application routes. */
  app.use(createRouter(deps));

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}
