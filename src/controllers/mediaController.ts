/**
 * Media Controller
 * Handles HTTP requests for rendition probes, downloads and artifact retrieval.
 */

import path from "path";
import { Request, Response, NextFunction } from "express";
import type { InfoBody, DownloadBody } from "../middlewares/schemas/mediaSchemas.js";
import type { CredentialGate } from "../services/business/credentialService.js";
import type { ExtractionService, ProgressObserver } from "../services/external/extraction.js";
import { resolveRenditions, type VideoMetadata } from "../services/business/renditionService.js";
import { executeDownload, type DownloadRequest } from "../services/business/downloadService.js";
import { isPlainFilename } from "../config/storage.js";
import { NotFoundError, toAppError } from "../utils/errors.js";

export interface MediaControllerDependencies {
  extractor: ExtractionService;
  credentials: CredentialGate;
  outputDir: string;
  progress?: ProgressObserver;
}

/** Wire format of POST /api/info. */
export interface InfoResponse {
  title: string;
  duration: number;
  thumbnail: string;
  formats: Array<{ height: number; filesize: string; format_id: string }>;
}

export function toInfoResponse(metadata: VideoMetadata): InfoResponse {
  return {
    title: metadata.title,
    duration: metadata.durationSeconds,
    thumbnail: metadata.thumbnailUrl,
    formats: metadata.renditions.map((rendition) => ({
      height: rendition.height,
      filesize: rendition.fileSize,
      format_id: rendition.formatId,
    })),
  };
}

function toDownloadRequest(body: DownloadBody): DownloadRequest {
  return body.type === "video"
    ? { source: body.url, formatClass: "video", targetHeight: body.resolution }
    : { source: body.url, formatClass: "audio" };
}

export function createMediaController(deps: MediaControllerDependencies) {
  /**
   * POST /api/info - Lists the downloadable renditions of a video
   */
  async function getInfo(req: Request<{}, unknown, InfoBody>, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await resolveRenditions(req.body.url, deps);
      if (!result.ok) {
        throw toAppError(result.error, "info");
      }
      res.json(toInfoResponse(result.value));
    } catch (error) {
      next(error);
    }
  }

  /**
   * POST /api/download - Downloads a rendition (video) or its audio track (MP3)
   */
  async function download(req: Request<{}, unknown, DownloadBody>, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await executeDownload(toDownloadRequest(req.body), deps);
      if (!result.ok) {
        throw toAppError(result.error, "download");
      }
      res.json({
        success: result.value.success,
        message: "Download completed",
        filename: result.value.artifactFilename,
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /downloads/:filename - Streams a finished download as an attachment
   */
  function serveDownload(req: Request<{ filename: string }>, res: Response, next: NextFunction): void {
    const { filename } = req.params;
    if (!isPlainFilename(filename)) {
      next(new NotFoundError("File", filename));
      return;
    }

    res.download(filename, filename, { root: path.resolve(deps.outputDir) }, (error) => {
      if (!error) return;
      if (res.headersSent) {
        console.error(`[downloads] Transfer of ${filename} failed:`, error);
        return;
      }
      const missing = ("code" in error && error.code === "ENOENT") || ("status" in error && error.status === 404);
      next(missing ? new NotFoundError("File", filename) : error);
    });
  }

  /**
   * GET /api/auth/status - Reports whether a usable cookie file is present
   */
  function getAuthStatus(_req: Request, res: Response): void {
    res.json({ authenticated: deps.credentials.isAuthenticated() });
  }

  return { getInfo, download, serveDownload, getAuthStatus };
}
