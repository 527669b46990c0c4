/**
 * Media Errors
 * Tagged failures returned by the rendition and download services.
 */

import path from "path";
import { GENERIC_ERROR_MESSAGE } from "../../utils/errors.js";

export type MediaError =
  | { kind: "AuthenticationRequired"; message: string; hint: string }
  | { kind: "ExtractionFailed"; message: string }
  | { kind: "InternalError"; message: string };

export type Result<T, E = MediaError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = MediaError>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function authenticationRequired(cookieFile: string): MediaError {
  return {
    kind: "AuthenticationRequired",
    message: "Authentication required",
    hint: `Please provide YouTube cookies in ${path.basename(cookieFile)} file`,
  };
}

export function extractionFailed(message: string): MediaError {
  return { kind: "ExtractionFailed", message };
}

export function internalError(): MediaError {
  return { kind: "InternalError", message: GENERIC_ERROR_MESSAGE };
}
