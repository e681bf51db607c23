/**
 * Validation Middleware
 * Validates request bodies and query strings against Zod schemas.
 */

import { Request, Response, NextFunction } from "express";
import { ZodError, type ZodType } from "zod";
import { ValidationError, type ValidationIssue } from "../utils/errors.js";

/**
 * Validates request body against a Zod schema.
 * Returns 400 with validation errors if invalid.
 */
export function validateBody<T>(schema: ZodType<T>) {
  return (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = schema.parse(req.body);
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        res.status(400).json({
          error: "Validation failed",
          details: toIssues(error),
        });
      } else {
        next(error);
      }
    }
  };
}

/**
 * Parses a query string inside a handler. Throws ValidationError (400) if invalid.
 */
export function parseQuery<T>(schema: ZodType<T>, query: unknown): T {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError(toIssues(parsed.error));
  }
  return parsed.data;
}

function toIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));
}
