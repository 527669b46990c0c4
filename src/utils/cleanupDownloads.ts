/**
 * Cleanup utility for finished downloads
 * Runs on startup when a retention window is configured.
 */

import fs from "fs";
import path from "path";

export interface CleanupSummary {
  removedFiles: number;
  freedMB: number;
}

/**
 * Removes files in the output directory older than maxAgeHours.
 * Also removes leftover .part / .ytdl fragments regardless of age.
 */
export async function cleanupDownloads(
  outputDir: string,
  maxAgeHours: number,
  now: number = Date.now()
): Promise<CleanupSummary> {
  const summary: CleanupSummary = { removedFiles: 0, freedMB: 0 };

  if (!fs.existsSync(outputDir)) {
    console.log("[cleanup] No output directory found, nothing to clean");
    return summary;
  }

  console.log(`[cleanup] Scanning ${outputDir} for files older than ${maxAgeHours}h...`);
  const maxAgeMs = maxAgeHours * 60 * 60 * 1000;
  const entries = await fs.promises.readdir(outputDir, { withFileTypes: true });

  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }

    const filePath = path.join(outputDir, entry.name);
    try {
      const stats = await fs.promises.stat(filePath);
      const ageMs = now - stats.mtimeMs;
      const isFragment = entry.name.endsWith(".part") || entry.name.endsWith(".ytdl");

      if (isFragment || ageMs > maxAgeMs) {
        await fs.promises.unlink(filePath);
        summary.removedFiles++;
        summary.freedMB += stats.size / (1024 * 1024);
        console.log(`[cleanup] Removed ${entry.name} (${(ageMs / 3600000).toFixed(1)}h old)`);
      }
    } catch (err) {
      console.warn(`[cleanup] Failed to process ${entry.name}:`, err);
    }
  }

  console.log(`[cleanup] ✓ Removed ${summary.removedFiles} files, freed ${summary.freedMB.toFixed(0)}MB`);
  return summary;
}
