/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a numeric variable is malformed.
 */

/** Server configuration */
export const PORT = getIntEnv("PORT", 3000);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** Directory that receives finished downloads. */
export const DOWNLOAD_DIR = process.env.DOWNLOAD_DIR || "downloads";

/** Netscape-format cookie file supplied by the operator for authenticated extraction. */
export const COOKIES_FILE = process.env.COOKIES_FILE || "cookies.txt";

/** yt-dlp binary, resolved through PATH unless absolute. */
export const YTDLP_PATH = process.env.YTDLP_PATH || "yt-dlp";

/** Static frontend assets. */
export const STATIC_DIR = process.env.STATIC_DIR || "public";

/** When set, downloads older than this many hours are removed at startup. */
export const DOWNLOAD_RETENTION_HOURS = getOptionalIntEnv("DOWNLOAD_RETENTION_HOURS");

function getIntEnv(key: string, fallback: number): number {
  return getOptionalIntEnv(key) ?? fallback;
}

/**
 * Parses an optional integer variable.
 * Throws immediately if the variable is set but not a non-negative integer.
 */
function getOptionalIntEnv(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`Invalid integer for environment variable ${key}: ${value}`);
  }
  return parsed;
}
