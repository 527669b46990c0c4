/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

import type { MediaError } from "../services/business/mediaErrors.js";

/** Message returned for any failure whose details must stay server-side. */
export const GENERIC_ERROR_MESSAGE = "An unexpected error occurred";

/**
 * Base application error class.
 * All domain errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public hint?: string,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string, hint?: string) {
    super(message, 400, hint);
  }
}

/**
 * Missing or rejected credential (401).
 */
export class UnauthorizedError extends AppError {
  constructor(message: string, hint?: string) {
    super(message, 401, hint);
  }
}

/**
 * Internal failure (500). The message is always the generic one.
 */
export class InternalServerError extends AppError {
  constructor() {
    super(GENERIC_ERROR_MESSAGE, 500, undefined, false);
  }
}

/**
 * Maps a business-layer failure to its HTTP error.
 * Probing reports a bot challenge as a bad request, while a download without
 * a credential is unauthorized.
 */
export function toAppError(error: MediaError, operation: "info" | "download"): AppError {
  switch (error.kind) {
    case "AuthenticationRequired":
      return operation === "download"
        ? new UnauthorizedError(error.message, error.hint)
        : new BadRequestError(error.message, error.hint);
    case "ExtractionFailed":
      return new BadRequestError(error.message);
    case "InternalError":
      return new InternalServerError();
  }
}
