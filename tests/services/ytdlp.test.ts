import { beforeEach, describe, it, expect, vi } from "vitest";

const { execaMock, FakeExecaError } = vi.hoisted(() => {
  class FakeExecaError extends Error {
    constructor(
      public shortMessage: string,
      public exitCode: number | undefined,
      public stderr: string
    ) {
      super(shortMessage);
    }
  }
  return { execaMock: vi.fn(), FakeExecaError };
});

vi.mock("execa", () => ({ execa: execaMock, ExecaError: FakeExecaError }));

import {
  YtDlpExtractor,
  buildFetchArgs,
  buildProbeArgs,
  extractErrorMessage,
  parseInfoJson,
  parseProgressLine,
} from "../../src/services/external/ytdlp.js";
import { ExtractionError, type FetchOptions } from "../../src/services/external/extraction.js";

const SOURCE = "https://video.example.com/watch?v=abc";

const audioOptions: FetchOptions = {
  quiet: false,
  cookieFile: "cookies.txt",
  format: "bestaudio/best",
  outputTemplate: "downloads/%(title)s.%(ext)s",
  postprocessors: [{ key: "FFmpegExtractAudio", preferredCodec: "mp3", preferredQuality: "192" }],
};

describe("buildProbeArgs", () => {
  it("dumps metadata quietly with cookies", () => {
    expect(buildProbeArgs(SOURCE, { quiet: true, cookieFile: "cookies.txt" })).toEqual([
      "--dump-single-json", "--no-playlist", "--quiet", "--cookies", "cookies.txt", "--", SOURCE,
    ]);
  });

  it("omits cookies when none are given", () => {
    expect(buildProbeArgs(SOURCE, { quiet: true })).toEqual([
      "--dump-single-json", "--no-playlist", "--quiet", "--", SOURCE,
    ]);
  });
});

describe("buildFetchArgs", () => {
  it("builds an audio extraction run", () => {
    expect(buildFetchArgs(SOURCE, audioOptions)).toEqual([
      "--dump-single-json", "--no-playlist", "--cookies", "cookies.txt",
      "--no-simulate", "--newline", "--progress",
      "--progress-template", "download:[progress] %(progress.status)s %(progress.filename)s",
      "--format", "bestaudio/best",
      "--output", "downloads/%(title)s.%(ext)s",
      "--extract-audio", "--audio-format", "mp3", "--audio-quality", "192K",
      "--", SOURCE,
    ]);
  });

  it("merges video runs into the requested container", () => {
    const args = buildFetchArgs(SOURCE, {
      ...audioOptions,
      format: "bestvideo[height<=720]+bestaudio/best",
      mergeOutputFormat: "mp4",
      postprocessors: [],
    });

    expect(args).toContain("--merge-output-format");
    expect(args[args.indexOf("--merge-output-format") + 1]).toBe("mp4");
    expect(args).not.toContain("--extract-audio");
  });
});

describe("parseProgressLine", () => {
  it("reads templated progress lines", () => {
    expect(parseProgressLine("[progress] downloading downloads/My Clip.f137.mp4")).toEqual({
      status: "downloading",
      filename: "downloads/My Clip.f137.mp4",
    });
  });

  it("ignores everything else", () => {
    expect(parseProgressLine("[download]  50.0% of 10.00MiB")).toBeNull();
    expect(parseProgressLine('{"title":"x"}')).toBeNull();
  });
});

describe("extractErrorMessage", () => {
  it("keeps only ERROR lines", () => {
    expect(
      extractErrorMessage("WARNING: slow connection\nERROR: [youtube] abc: Video unavailable\n")
    ).toBe("ERROR: [youtube] abc: Video unavailable");
  });

  it("returns undefined without ERROR lines", () => {
    expect(extractErrorMessage("WARNING: only a warning")).toBeUndefined();
  });
});

describe("parseInfoJson", () => {
  it("takes the last JSON line of stdout", () => {
    expect(parseInfoJson('[info] abc: Downloading\n{"title":"Clip","duration":10}\n')).toEqual({
      title: "Clip",
      duration: 10,
    });
  });

  it("rejects output without a metadata document", () => {
    expect(() => parseInfoJson("nothing here")).toThrow(ExtractionError);
    expect(() => parseInfoJson("{truncated")).toThrow("Extractor returned malformed metadata");
  });
});

describe("YtDlpExtractor", () => {
  const extractor = new YtDlpExtractor("/usr/local/bin/yt-dlp");

  beforeEach(() => {
    execaMock.mockReset();
  });

  it("probes through the configured binary", async () => {
    execaMock.mockResolvedValue({ stdout: JSON.stringify({ title: "Clip", formats: [] }) });

    const info = await extractor.probe(SOURCE, { quiet: true });

    expect(info).toEqual({ title: "Clip", formats: [] });
    expect(execaMock).toHaveBeenCalledWith("/usr/local/bin/yt-dlp", [
      "--dump-single-json", "--no-playlist", "--quiet", "--", SOURCE,
    ]);
  });

  it("turns a failed run into an ExtractionError carrying the ERROR lines", async () => {
    execaMock.mockRejectedValue(
      new FakeExecaError(
        "Command failed with exit code 1",
        1,
        "WARNING: retrying\nERROR: [youtube] abc: Sign in to confirm you’re not a bot"
      )
    );

    await expect(extractor.probe(SOURCE, { quiet: true })).rejects.toEqual(
      new ExtractionError("ERROR: [youtube] abc: Sign in to confirm you’re not a bot")
    );
  });

  it("falls back to the short message when stderr has no ERROR line", async () => {
    execaMock.mockRejectedValue(new FakeExecaError("Command failed with exit code 2", 2, ""));

    await expect(extractor.probe(SOURCE, { quiet: true })).rejects.toThrow("Command failed with exit code 2");
  });

  it("lets spawn failures through unchanged", async () => {
    const spawnError = new FakeExecaError("spawn yt-dlp ENOENT", undefined, "");
    execaMock.mockRejectedValue(spawnError);

    await expect(extractor.probe(SOURCE, { quiet: true })).rejects.toBe(spawnError);
  });

  it("forwards progress lines and returns the final metadata", async () => {
    const stdout = JSON.stringify({ title: "Clip", filename: "downloads/Clip.webm" });
    const subprocess = Object.assign(Promise.resolve({ stdout }), {
      iterable: () =>
        (async function* () {
          yield "[youtube] abc: Downloading webpage";
          yield "[progress] downloading downloads/Clip.webm";
          yield "[progress] finished downloads/Clip.webm";
        })(),
    });
    execaMock.mockReturnValue(subprocess);
    const onProgress = vi.fn();

    const info = await extractor.fetch(SOURCE, { ...audioOptions, progress: { onProgress } });

    expect(info).toEqual({ title: "Clip", filename: "downloads/Clip.webm" });
    expect(onProgress.mock.calls).toEqual([
      [{ status: "downloading", filename: "downloads/Clip.webm" }],
      [{ status: "finished", filename: "downloads/Clip.webm" }],
    ]);
    expect(execaMock).toHaveBeenCalledWith(
      "/usr/local/bin/yt-dlp",
      buildFetchArgs(SOURCE, { ...audioOptions, progress: { onProgress } }),
      { all: true }
    );
  });

  it("stops yt-dlp when a progress observer throws", async () => {
    const kill = vi.fn();
    const subprocess = Object.assign(new Promise<never>(() => {}), {
      kill,
      iterable: () =>
        (async function* () {
          yield "[progress] downloading downloads/Clip.webm";
        })(),
    });
    execaMock.mockReturnValue(subprocess);
    const observerError = new Error("observer failed");
    const onProgress = vi.fn(() => {
      throw observerError;
    });

    await expect(extractor.fetch(SOURCE, { ...audioOptions, progress: { onProgress } })).rejects.toBe(
      observerError
    );
    expect(kill).toHaveBeenCalledOnce();
  });

  it("leaves a finished run alone when its output is malformed", async () => {
    const kill = vi.fn();
    const subprocess = Object.assign(Promise.resolve({ stdout: "no metadata" }), {
      kill,
      iterable: () => (async function* () {})(),
    });
    execaMock.mockReturnValue(subprocess);

    await expect(extractor.fetch(SOURCE, audioOptions)).rejects.toThrow("Extractor returned malformed metadata");
    expect(kill).not.toHaveBeenCalled();
  });
});
