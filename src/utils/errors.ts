/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

import type { ErrorRecord, TaskStatus } from "../types/task.js";

/**
 * Base application error class.
 * All HTTP-facing errors should extend this.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /** Extra payload for the error response body. */
  get details(): unknown {
    return undefined;
  }
}

/**
 * Resource not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with id '${identifier}' not found`
      : `${resource} not found`;
    super(message, 404);
  }
}

/**
 * Bad request error (400).
 */
export class BadRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/**
 * Request failed schema validation (400).
 */
export class ValidationError extends BadRequestError {
  constructor(public issues: ValidationIssue[]) {
    super("Validation failed");
  }

  override get details(): unknown {
    return this.issues;
  }
}

/**
 * Task exists but is not in a state that allows the operation (409).
 */
export class TaskNotReadyError extends AppError {
  constructor(taskId: string, public status: TaskStatus) {
    super(`Task '${taskId}' is not completed yet (current status: ${status})`, 409);
  }

  override get details(): unknown {
    return { status: this.status };
  }
}

/**
 * The download engine failed while serving a synchronous request (502).
 * Carries the classified record so clients get the same hints a failed task exposes.
 */
export class EngineRequestError extends AppError {
  constructor(public record: ErrorRecord) {
    super(record.message, 502);
  }

  override get details(): unknown {
    return {
      kind: this.record.kind,
      retryPossible: this.record.retryPossible,
      suggestions: this.record.suggestions,
    };
  }
}

/**
 * yt-dlp exited unsuccessfully. Not HTTP-facing: the classifier turns it into an ErrorRecord.
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public stderr: string,
    public exitCode: number | null = null,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "EngineError";
  }
}
