/**
 * Download progress observers.
 */

import path from "path";
import type { ProgressEvent, ProgressObserver } from "../external/extraction.js";

/**
 * Logs each file's status transitions. Repeated events with an unchanged
 * status (per-chunk "downloading" ticks) are logged once.
 */
export class LoggingProgressObserver implements ProgressObserver {
  private readonly lastStatus = new Map<string, string>();

  constructor(private readonly log: (message: string) => void = console.log) {}

  onProgress(event: ProgressEvent): void {
    if (this.lastStatus.get(event.filename) === event.status) {
      return;
    }
    this.lastStatus.set(event.filename, event.status);
    this.log(`[progress] Downloading: ${path.basename(event.filename) || "Unknown"} - ${event.status}`);
  }
}
