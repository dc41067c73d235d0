/**
 * Error Message Utility
 * Converts technical errors into operator-friendly messages
 */

import { PipelineError } from "./errors.js";

/**
 * Converts technical error to generic operator-friendly message
 */
export function getGenericErrorMessage(error: unknown): string {
  if (error instanceof PipelineError) {
    switch (error.kind) {
      case "BoundaryNotFound":
        return "Homily not found in transcript";
      case "ExtractionFailed":
        return "Audio extraction failed";
      case "InvalidComparisonScope":
        return "Invalid comparison";
    }
  }

  const errorStr = String(error).toLowerCase();

  if (errorStr.includes("enoent") || errorStr.includes("no such file")) {
    return "File missing";
  }
  if (errorStr.includes("ffmpeg") || errorStr.includes("ffprobe") || errorStr.includes("audio")) {
    return "Audio processing failed";
  }
  if (errorStr.includes("transcript") || errorStr.includes("webvtt")) {
    return "Transcript unreadable";
  }
  if (errorStr.includes("timeout") || errorStr.includes("timed out")) {
    return "Processing timeout";
  }
  if (errorStr.includes("supabase") || errorStr.includes("failed to")) {
    return "Database error";
  }

  return "Processing failed";
}

/**
 * Pipeline errors declare their own retry policy; anything else may be transient.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof PipelineError) {
    return error.retryable;
  }
  return true;
}
