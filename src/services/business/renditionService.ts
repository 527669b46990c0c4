/**
 * Rendition Service
 * Probes a video URL and reduces its format catalog to one MP4 rendition per height.
 */

import { formatSize } from "../../utils/formatSize.js";
import type { CredentialGate } from "./credentialService.js";
import {
  ExtractionError,
  parseFormats,
  type ExtractionService,
  type RawFormat,
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

export interface RenditionDescriptor {
  height: number;
  fileSizeBytes: number | null;
  /** Human-readable size, e.g. "12.40 MB". */
  fileSize: string;
  formatId: string;
}

export interface VideoMetadata {
  title: string;
  durationSeconds: number;
  thumbnailUrl: string;
  renditions: RenditionDescriptor[];
}

export interface RenditionDependencies {
  extractor: ExtractionService;
  credentials: CredentialGate;
}

/** Messages YouTube uses when it wants a signed-in session. */
const BOT_CHALLENGE_SIGNATURES = ["sign in to confirm you're not a bot"];

export function isBotChallenge(message: string): boolean {
  const normalized = message.replace(/[‘’]/g, "'").toLowerCase();
  return BOT_CHALLENGE_SIGNATURES.some((signature) => normalized.includes(signature));
}

function isRendition(format: RawFormat): format is RawFormat & { height: number; vcodec: string } {
  return (
    format.ext === "mp4" &&
    typeof format.vcodec === "string" &&
    format.vcodec !== "none" &&
    typeof format.height === "number" &&
    Number.isInteger(format.height) &&
    format.height > 0
  );
}

/**
 * Filters, dedupes and ranks a raw catalog. The first entry seen at a height
 * wins, even if a later one at the same height is larger.
 */
export function selectRenditions(formats: RawFormat[]): RenditionDescriptor[] {
  const byHeight = new Map<number, RenditionDescriptor>();

  for (const format of formats) {
    if (!isRendition(format) || byHeight.has(format.height)) {
      continue;
    }
    // An absent size counts as zero bytes; an explicit null is unknown
    const bytes = format.filesize === undefined ? 0 : format.filesize;
    byHeight.set(format.height, {
      height: format.height,
      fileSizeBytes: bytes,
      fileSize: formatSize(bytes),
      formatId: format.format_id,
    });
  }

  return [...byHeight.values()].sort((a, b) => b.height - a.height);
}

/**
 * Resolves a source URL into its metadata and available renditions.
 * Attaches the cookie file when present; unauthenticated probes still run.
 */
export async function resolveRenditions(
  source: string,
  { extractor, credentials }: RenditionDependencies
): Promise<Result<VideoMetadata, MediaError>> {
  try {
    const info = await extractor.probe(source, {
      quiet: true,
      cookieFile: credentials.isAuthenticated() ? credentials.cookieFile : undefined,
    });

    const renditions = selectRenditions(parseFormats(info));
    console.log(`[info] ${info.title || source}: ${renditions.length} rendition(s)`);

    return ok({
      title: info.title ?? "",
      durationSeconds: info.duration ?? 0,
      thumbnailUrl: info.thumbnail ?? "",
      renditions,
    });
  } catch (error) {
    if (error instanceof ExtractionError) {
      if (isBotChallenge(error.message)) {
        console.warn(`[info] Bot challenge for ${source}`);
        return fail(authenticationRequired(credentials.cookieFile));
      }
      return fail(extractionFailed(error.message));
    }

    console.error(`[info] Error extracting video info for ${source}:`, error);
    return fail(internalError());
  }
}
