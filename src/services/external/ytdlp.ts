/**
 * yt-dlp Extraction Service
 * Runs the yt-dlp binary through execa for metadata probes and downloads.
 */

import { execa, ExecaError } from "execa";
import {
  ExtractionError,
  rawVideoInfoSchema,
  type ExtractionService,
  type FetchOptions,
  type PostProcessor,
  type ProbeOptions,
  type ProgressEvent,
  type RawVideoInfo,
} from "./extraction.js";

export const PROGRESS_PREFIX = "[progress]";

/** One line per progress tick: "[progress] <status> <filename>". */
const PROGRESS_TEMPLATE = `download:${PROGRESS_PREFIX} %(progress.status)s %(progress.filename)s`;

function sharedArgs(options: ProbeOptions): string[] {
  const args = ["--dump-single-json", "--no-playlist"];
  if (options.quiet) args.push("--quiet");
  if (options.cookieFile) args.push("--cookies", options.cookieFile);
  return args;
}

function postProcessorArgs(postprocessor: PostProcessor): string[] {
  switch (postprocessor.key) {
    case "FFmpegExtractAudio":
      return [
        "--extract-audio",
        "--audio-format", postprocessor.preferredCodec,
        "--audio-quality", `${postprocessor.preferredQuality}K`,
      ];
  }
}

/** Arguments for a metadata-only run. */
export function buildProbeArgs(url: string, options: ProbeOptions): string[] {
  return [...sharedArgs(options), "--", url];
}

/**
 * Arguments for a download run. --no-simulate keeps the download going while
 * the final metadata (including the prepared filename) is still printed.
 */
export function buildFetchArgs(url: string, options: FetchOptions): string[] {
  const args = [
    ...sharedArgs(options),
    "--no-simulate",
    "--newline",
    "--progress",
    "--progress-template", PROGRESS_TEMPLATE,
    "--format", options.format,
    "--output", options.outputTemplate,
  ];

  if (options.mergeOutputFormat) {
    args.push("--merge-output-format", options.mergeOutputFormat);
  }
  for (const postprocessor of options.postprocessors) {
    args.push(...postProcessorArgs(postprocessor));
  }

  return [...args, "--", url];
}

export function parseProgressLine(line: string): ProgressEvent | null {
  const match = /^\[progress\] (\S+) (.*)$/.exec(line.trim());
  if (!match) return null;
  return { status: match[1], filename: match[2] };
}

/** Collects yt-dlp's "ERROR:" lines, which carry the user-facing reason. */
export function extractErrorMessage(stderr: string): string | undefined {
  const lines = stderr
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.startsWith("ERROR:"));
  return lines.length > 0 ? lines.join("\n") : undefined;
}

/** Parses the JSON document yt-dlp prints as the last JSON line of stdout. */
export function parseInfoJson(stdout: string): RawVideoInfo {
  const jsonLine = stdout
    .split(/\r?\n/)
    .reverse()
    .find((line) => line.trimStart().startsWith("{"));

  if (jsonLine) {
    try {
      const parsed = rawVideoInfoSchema.safeParse(JSON.parse(jsonLine));
      if (parsed.success) {
        return parsed.data;
      }
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
    }
  }

  throw new ExtractionError("Extractor returned malformed metadata");
}

/**
 * A yt-dlp run that exited with a status is an extractor rejection; spawn
 * failures (binary missing, killed) propagate unchanged.
 */
function toExtractionError(error: unknown): unknown {
  if (error instanceof ExecaError && typeof error.exitCode === "number") {
    const stderr = typeof error.stderr === "string" ? error.stderr : "";
    return new ExtractionError(extractErrorMessage(stderr) ?? error.shortMessage);
  }
  return error;
}

export class YtDlpExtractor implements ExtractionService {
  constructor(private readonly binaryPath: string = "yt-dlp") {}

  async probe(url: string, options: ProbeOptions): Promise<RawVideoInfo> {
    try {
      const { stdout } = await execa(this.binaryPath, buildProbeArgs(url, options));
      return parseInfoJson(stdout);
    } catch (error) {
      throw toExtractionError(error);
    }
  }

  async fetch(url: string, options: FetchOptions): Promise<RawVideoInfo> {
    const subprocess = execa(this.binaryPath, buildFetchArgs(url, options), { all: true });
    let exited = false;
    const completion = subprocess.finally(() => {
      exited = true;
    });

    const forwardProgress = async (): Promise<void> => {
      for await (const line of subprocess.iterable({ from: "all" })) {
        const event = parseProgressLine(line);
        if (event) options.progress?.onProgress(event);
      }
    };

    try {
      const [result] = await Promise.all([completion, forwardProgress()]);
      return parseInfoJson(result.stdout);
    } catch (error) {
      // Progress forwarding can fail while yt-dlp is still downloading
      if (!exited) subprocess.kill();
      throw toExtractionError(error);
    }
  }
}
