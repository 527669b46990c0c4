/**
 * Storage Setup
 * Handles the local output directory for finished downloads.
 */

import { mkdir } from "fs/promises";
import path from "path";

/**
 * Creates the output directory if it doesn't already exist.
 * Idempotent operation - safe to call multiple times.
 */
export async function ensureOutputDirectory(outputDir: string): Promise<void> {
  await mkdir(outputDir, { recursive: true });
  console.log(`✓ Output directory ready: ${path.resolve(outputDir)}`);
}

/**
 * Returns true for names that resolve to a file directly inside the output
 * directory (no separators, no "." or "..").
 */
export function isPlainFilename(filename: string): boolean {
  return (
    filename.length > 0 &&
    filename !== "." &&
    filename !== ".." &&
    path.basename(filename) === filename &&
    !filename.includes("\\")
  );
}
