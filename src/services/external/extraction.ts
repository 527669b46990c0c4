/**
 * Extraction Service Contract
 * Boundary to the media extractor: option shapes, the raw metadata schema,
 * and the error raised when the extractor rejects a source.
 */

import { z } from "zod";

export interface ProgressEvent {
  filename: string;
  status: string;
}

/** Receives progress events synchronously while a fetch is running. */
export interface ProgressObserver {
  onProgress(event: ProgressEvent): void;
}

export interface PostProcessor {
  key: "FFmpegExtractAudio";
  preferredCodec: string;
  preferredQuality: string;
}

export interface ProbeOptions {
  quiet: boolean;
  cookieFile?: string;
}

export interface FetchOptions extends ProbeOptions {
  /** Format selection expression, e.g. "bestaudio/best". */
  format: string;
  /** Output path template with %(field)s placeholders. */
  outputTemplate: string;
  mergeOutputFormat?: string;
  postprocessors: PostProcessor[];
  progress?: ProgressObserver;
}

/**
 * Raised when the extractor itself fails on a source (unsupported URL,
 * private video, bot challenge, ...). Anything else thrown by an
 * ExtractionService is an unexpected failure.
 */
export class ExtractionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ExtractionError";
  }
}

export interface ExtractionService {
  /** Metadata only; no media bytes are fetched. */
  probe(url: string, options: ProbeOptions): Promise<RawVideoInfo>;
  /** Downloads and post-processes, resolving with the final metadata. */
  fetch(url: string, options: FetchOptions): Promise<RawVideoInfo>;
}

export const rawFormatSchema = z.object({
  format_id: z.string(),
  ext: z.string(),
  vcodec: z.string().nullable().optional(),
  height: z.number().nullable().optional(),
  filesize: z.number().nullable().optional(),
});

export type RawFormat = z.infer<typeof rawFormatSchema>;

export const rawVideoInfoSchema = z.object({
  title: z.string().nullable().optional(),
  duration: z.number().nullable().optional(),
  thumbnail: z.string().nullable().optional(),
  formats: z.array(z.unknown()).nullable().optional(),
  /** Prepared output path, reported after a download. */
  filename: z.string().nullable().optional(),
  _filename: z.string().nullable().optional(),
});

export type RawVideoInfo = z.infer<typeof rawVideoInfoSchema>;

/**
 * Validates format entries one by one; malformed entries are dropped rather
 * than failing the whole catalog.
 */
export function parseFormats(info: RawVideoInfo): RawFormat[] {
  const formats: RawFormat[] = [];
  for (const entry of info.formats ?? []) {
    const parsed = rawFormatSchema.safeParse(entry);
    if (parsed.success) {
      formats.push(parsed.data);
    }
  }
  return formats;
}

/** Path the extractor prepared for the downloaded file, if reported. */
export function preparedFilename(info: RawVideoInfo): string | undefined {
  return info.filename ?? info._filename ?? undefined;
}
