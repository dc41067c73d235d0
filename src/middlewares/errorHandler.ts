/**
 * Error Handler Middleware
 * Centralized error handling for Express application.
 */

import { Request, Response, NextFunction } from "express";
import { AppError, PipelineError } from "../utils/errors.js";
import { NODE_ENV } from "../config/env.js";

interface ErrorResponse {
  error: string;
  kind?: string;
  recording_id?: string;
  stage?: string;
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
  // Express recognizes error handlers by their four parameters
  _next: NextFunction
): void {
  // Default to 500 if not an AppError
  const statusCode = error instanceof AppError ? error.statusCode : 500;
  const message = error.message || "Internal server error";

  console.error(`[Error] ${statusCode} - ${message}`, {
    error: error.name,
    stack: error.stack,
    path: req.path,
    method: req.method,
  });

  const response: ErrorResponse = {
    error: message,
  };

  if (error instanceof PipelineError) {
    response.kind = error.kind;
    response.recording_id = error.recordingId;
    response.stage = error.stage;
  }

  // Include stack trace in development
  if (NODE_ENV !== "production") {
    response.stack = error.stack;
  }

  res.status(statusCode).json(response);
}
