import { describe, it, expect, vi } from "vitest";
import { LoggingProgressObserver } from "../../src/services/business/progress.js";

describe("LoggingProgressObserver", () => {
  it("logs each status change once per file", () => {
    const log = vi.fn();
    const observer = new LoggingProgressObserver(log);

    observer.onProgress({ filename: "downloads/Clip.f137.mp4", status: "downloading" });
    observer.onProgress({ filename: "downloads/Clip.f137.mp4", status: "downloading" });
    observer.onProgress({ filename: "downloads/Clip.f137.mp4", status: "finished" });
    observer.onProgress({ filename: "downloads/Clip.f140.m4a", status: "downloading" });

    expect(log.mock.calls).toEqual([
      ["[progress] Downloading: Clip.f137.mp4 - downloading"],
      ["[progress] Downloading: Clip.f137.mp4 - finished"],
      ["[progress] Downloading: Clip.f140.m4a - downloading"],
    ]);
  });
});
