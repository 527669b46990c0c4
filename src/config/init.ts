/**
 * Application Initialization
 * Prepares the output directory and applies the retention window on startup.
 */

import { ensureOutputDirectory } from "./storage.js";
import { cleanupDownloads } from "../utils/cleanupDownloads.js";

export interface InitOptions {
  outputDir: string;
  retentionHours?: number;
}

/**
 * Initializes application dependencies on startup.
 */
export async function initializeApp({ outputDir, retentionHours }: InitOptions): Promise<void> {
  console.log("Initializing application...");

  try {
    await ensureOutputDirectory(outputDir);

    if (retentionHours !== undefined) {
      await cleanupDownloads(outputDir, retentionHours);
    }

    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}
