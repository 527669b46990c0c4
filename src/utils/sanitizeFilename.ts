/**
 * Filename Sanitizer
 * Turns arbitrary video titles into names that are safe on any filesystem.
 */

import path from "path";

/** Characters stripped before the generic transform runs. */
const BLOCKED_CHARACTERS = /[<>:"/\\|?*]/g;

const UNSAFE_CHARACTERS = /[^A-Za-z0-9_.-]/g;
const WINDOWS_DEVICE_NAMES = /^(CON|PRN|AUX|NUL|COM[1-9]|LPT[1-9])$/i;

export const MAX_FILENAME_LENGTH = 200;
// Titles with no ASCII left (e.g. all-CJK) share this name and overwrite each other on disk
export const FALLBACK_FILENAME = "download";

/**
 * Secure-filename transform: ASCII only, whitespace runs become "_",
 * anything outside [A-Za-z0-9_.-] is dropped.
 */
function secureFilename(name: string): string {
  let result = name
    .normalize("NFKD")
    .replace(/[^\x00-\x7F]/g, "")
    .trim()
    .split(/\s+/)
    .join("_")
    .replace(UNSAFE_CHARACTERS, "")
    .replace(/^[._]+|[._]+$/g, "");

  if (WINDOWS_DEVICE_NAMES.test(result.split(".")[0])) {
    result = `_${result}`;
  }

  return result.slice(0, MAX_FILENAME_LENGTH).replace(/[._]+$/, "");
}

/**
 * Sanitizes a title for use as a filename. Never returns an empty string.
 *
 * @example sanitizeFilename('My "Video" <2024>') // "My_Video_2024"
 */
export function sanitizeFilename(rawName: string): string {
  const stripped = rawName.replace(BLOCKED_CHARACTERS, "");
  return secureFilename(stripped) || FALLBACK_FILENAME;
}

/**
 * Sanitizes the stem and extension of a file basename separately so the
 * extension survives even when the stem is entirely unsafe.
 */
export function sanitizeArtifactName(basename: string): string {
  const extension = path.extname(basename);
  const stem = basename.slice(0, basename.length - extension.length);
  const safeExtension = extension.replace(UNSAFE_CHARACTERS, "").replace(/^\.*/, "");

  return safeExtension
    ? `${sanitizeFilename(stem)}.${safeExtension}`
    : sanitizeFilename(basename);
}
