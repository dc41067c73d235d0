/**
 * Custom Application Errors
 * Domain-specific error classes for better error handling.
 */

/**
 * Base application error class.
 * All domain errors should extend this.
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

export type PipelineErrorKind =
  | "BoundaryNotFound"
  | "ExtractionFailed"
  | "InvalidComparisonScope";

export type PipelineStage =
  | "parse"
  | "boundary"
  | "extract"
  | "normalize"
  | "score"
  | "track";

export interface PipelineErrorContext {
  recordingId: string;
  stage: PipelineStage;
  reason: string;
}

/**
 * Failure of one pipeline stage for one recording.
 * Carries enough context for an operator alert.
 */
export class PipelineError extends AppError {
  readonly recordingId: string;
  readonly stage: PipelineStage;
  readonly reason: string;

  constructor(
    readonly kind: PipelineErrorKind,
    context: PipelineErrorContext,
    readonly retryable: boolean,
    statusCode: number = 422,
    isOperational: boolean = true
  ) {
    super(`${kind} [recording=${context.recordingId} stage=${context.stage}]: ${context.reason}`, statusCode, isOperational);
    this.recordingId = context.recordingId;
    this.stage = context.stage;
    this.reason = context.reason;
  }
}

/**
 * No homily range could be located. Input is deterministic, so never retried.
 */
export class BoundaryNotFoundError extends PipelineError {
  constructor(recordingId: string, reason: string) {
    super("BoundaryNotFound", { recordingId, stage: "boundary", reason }, false);
  }
}

/**
 * Audio for the requested range could not be read or written.
 * Retryable on the next job attempt.
 */
export class ExtractionFailedError extends PipelineError {
  constructor(recordingId: string, reason: string, originalError?: unknown) {
    super("ExtractionFailed", { recordingId, stage: "extract", reason }, true, 502);
    if (originalError instanceof Error && originalError.stack) {
      this.stack = originalError.stack;
    }
  }
}

/**
 * Caller asked to compare recordings outside one weekend group. Always a programming error.
 */
export class InvalidComparisonScopeError extends PipelineError {
  constructor(recordingId: string, reason: string) {
    super("InvalidComparisonScope", { recordingId, stage: "score", reason }, false, 400, false);
  }
}
