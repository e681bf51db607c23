/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction } from "express";
import { AppError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponseBody {
  error: string;
  details?: unknown;
  stack?: string;
}

/**
 * Global error handler middleware.
 * Catches all errors and returns appropriate responses.
 * MUST be registered last in middleware chain.
 */
export function errorHandler(
  error: Error | AppError,
  req: Request,
  res: Response,
  // Express recognizes error handlers by their four parameters.
  _next: NextFunction
): void {
  // Default to 500 if not an AppError
  const statusCode = error instanceof AppError ? error.statusCode : 500;
  const message = error.message || "Internal server error";

  console.error(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    stack: statusCode >= 500 ? error.stack : undefined,
    path: req.path,
    method: req.method,
  });

  if (res.headersSent) {
    res.end();
    return;
  }

  const response: ErrorResponseBody = {
    error: message,
  };

  const details = error instanceof AppError ? error.details : undefined;
  if (details !== undefined) {
    response.details = details;
  }

  // Include stack trace in development
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
