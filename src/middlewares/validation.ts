/**
 * Validation Middleware
 * Validates request bodies against Zod schemas.
 */

import { Request, Response, NextFunction } from "express";
import type { ZodTypeAny } from "zod";

/**
 * Validates request body against a Zod schema and replaces it with the parsed value.
 * Returns 400 with validation errors if invalid.
 */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      res.status(400).json({
        error: "Validation failed",
        details: result.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
      return;
    }

    req.body = result.data;
    next();
  };
}
