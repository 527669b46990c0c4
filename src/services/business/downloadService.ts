/**
 * Download Service
 * Plans and runs a server-side download of one rendition, as MP4 video or MP3 audio.
 */

import path from "path";
import { access, rename } from "fs/promises";
import { sanitizeArtifactName } from "../../utils/sanitizeFilename.js";
import type { CredentialGate } from "./credentialService.js";
import { LoggingProgressObserver } from "./progress.js";
import {
  ExtractionError,
  preparedFilename,
  type ExtractionService,
  type FetchOptions,
  type ProgressObserver,
} from "../external/extraction.js";
import {
  authenticationRequired,
  extractionFailed,
  fail,
  internalError,
  ok,
  type MediaError,
  type Result,
} from "./mediaErrors.js";

export type DownloadRequest =
  | { source: string; formatClass: "video"; targetHeight: number }
  | { source: string; formatClass: "audio" };

export interface DownloadResult {
  artifactFilename: string;
  success: true;
}

export type DownloadPlan = Omit<FetchOptions, "progress">;

export interface DownloadDependencies {
  extractor: ExtractionService;
  credentials: CredentialGate;
  outputDir: string;
  progress?: ProgressObserver;
}

/** MP3 bitrate in kbps for audio extraction. */
export const AUDIO_QUALITY = "192";

/**
 * Builds extractor options for a request. Output files are named after the
 * source's own title; the reported name is sanitized after the download.
 */
export function buildDownloadPlan(
  request: DownloadRequest,
  { outputDir, cookieFile }: { outputDir: string; cookieFile: string }
): DownloadPlan {
  const base = {
    quiet: false,
    cookieFile,
    outputTemplate: path.join(outputDir, "%(title)s.%(ext)s"),
  };

  if (request.formatClass === "video") {
    return {
      ...base,
      format: `bestvideo[height<=${request.targetHeight}]+bestaudio/best`,
      mergeOutputFormat: "mp4",
      postprocessors: [],
    };
  }

  return {
    ...base,
    format: "bestaudio/best",
    postprocessors: [
      { key: "FFmpegExtractAudio", preferredCodec: "mp3", preferredQuality: AUDIO_QUALITY },
    ],
  };
}

function replaceExtension(filePath: string, extension: string): string {
  const current = path.extname(filePath);
  return filePath.slice(0, filePath.length - current.length) + extension;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch (error) {
    if (isMissingFile(error)) return false;
    throw error;
  }
}

/**
 * Moves the downloaded file to its sanitized name inside the output
 * directory so the reported name is the one that can be retrieved.
 */
async function finalizeArtifact(downloadedPath: string, outputDir: string): Promise<string> {
  const artifactFilename = sanitizeArtifactName(path.basename(downloadedPath));
  const target = path.join(outputDir, artifactFilename);

  try {
    await access(downloadedPath);
    if (path.resolve(downloadedPath) !== path.resolve(target)) {
      await rename(downloadedPath, target);
    }
  } catch (error) {
    if (!isMissingFile(error)) throw error;
    // A concurrent download of the same title already moved its file into place
    if (await fileExists(target)) return artifactFilename;
    throw new Error(`Download completed but file not found: ${downloadedPath}`);
  }

  return artifactFilename;
}

/**
 * Downloads one rendition. Requires the cookie file up front; the extractor
 * is not contacted without it.
 */
export async function executeDownload(
  request: DownloadRequest,
  { extractor, credentials, outputDir, progress = new LoggingProgressObserver() }: DownloadDependencies
): Promise<Result<DownloadResult, MediaError>> {
  if (!credentials.isAuthenticated()) {
    console.warn(`[download] Rejected ${request.source}: no cookie file at ${credentials.cookieFile}`);
    return fail(authenticationRequired(credentials.cookieFile));
  }

  const plan = buildDownloadPlan(request, { outputDir, cookieFile: credentials.cookieFile });
  console.log(`[download] ${request.formatClass} ${request.source} (format: ${plan.format})`);

  try {
    const info = await extractor.fetch(request.source, { ...plan, progress });

    const prepared = preparedFilename(info);
    if (!prepared) {
      throw new Error("Extractor did not report an output filename");
    }

    // The audio post-processor leaves an .mp3 beside the original download
    const downloadedPath = request.formatClass === "audio" ? replaceExtension(prepared, ".mp3") : prepared;
    const artifactFilename = await finalizeArtifact(downloadedPath, outputDir);

    console.log(`[download] ✓ Download completed: ${artifactFilename}`);
    return ok<DownloadResult>({ artifactFilename, success: true });
  } catch (error) {
    if (error instanceof ExtractionError) {
      console.error(`[download] Download error: ${error.message}`);
      return fail(extractionFailed(error.message));
    }

    console.error(`[download] Unexpected error during download of ${request.source}:`, error);
    return fail(internalError());
  }
}
