/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction } from "express";
import { AppError, GENERIC_ERROR_MESSAGE } from "../utils/errors.js";

interface ErrorResponse {
  error: string;
  message?: string;
}

/** Client errors raised by Express itself (e.g. malformed JSON bodies). */
function isExposedHttpError(error: Error): error is Error & { statusCode: number } {
  return (
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode < 500 &&
    "expose" in error &&
    error.expose === true
  );
}

/**
 * Global error handler middleware.
 * Unexpected errors are logged in full and answered with a generic message.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  let statusCode = 500;
  const response: ErrorResponse = { error: GENERIC_ERROR_MESSAGE };

  if (error instanceof AppError) {
    statusCode = error.statusCode;
    if (error.isOperational) {
      response.error = error.message;
      if (error.hint) response.message = error.hint;
    }
  } else if (isExposedHttpError(error)) {
    statusCode = error.statusCode;
    response.error = error.message;
  }

  const log = statusCode >= 500 ? console.error : console.warn;
  log(`[Error] ${statusCode} - ${error.message}`, {
    error: error.name,
    stack: statusCode >= 500 ? error.stack : undefined,
    path: req.path,
    method: req.method,
  });

  res.status(statusCode).json(response);
}
