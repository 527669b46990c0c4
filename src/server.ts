/**
 * HTTP Server Entry Point
 * Initializes and starts the Express application on a specified port.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { initializeApp } from "./config/init.js";
import {
  PORT,
  NODE_ENV,
  DOWNLOAD_DIR,
  COOKIES_FILE,
  YTDLP_PATH,
  STATIC_DIR,
  DOWNLOAD_RETENTION_HOURS,
} from "./config/env.js";
import { CookieFileGate } from "./services/business/credentialService.js";
import { YtDlpExtractor } from "./services/external/ytdlp.js";

const credentials = new CookieFileGate(COOKIES_FILE);

/** HTTP server instance wrapping the Express application. */
const server = createServer(
  createApp({
    extractor: new YtDlpExtractor(YTDLP_PATH),
    credentials,
    outputDir: DOWNLOAD_DIR,
    staticDir: STATIC_DIR,
  })
);

/**
 * Prepares the output directory, then starts listening.
 */
initializeApp({ outputDir: DOWNLOAD_DIR, retentionHours: DOWNLOAD_RETENTION_HOURS })
  .then(() => {
    server.listen(PORT, "0.0.0.0", () => {
      console.log(`Server running on 0.0.0.0:${PORT} (${NODE_ENV})`);
      if (!credentials.isAuthenticated()) {
        console.warn(`⚠️  No cookies at ${COOKIES_FILE} - downloads will be rejected until it is provided`);
      }
      console.log("✓ Server ready to accept requests\n");
    });
  })
  .catch((error: unknown) => {
    console.error("✗ Initialization failed:", error);
    process.exit(1);
  });

/**
 * Handles graceful shutdown on SIGTERM signal.
 * Closes the server and exits the process cleanly.
 */
process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});
