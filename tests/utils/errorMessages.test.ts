import { describe, it, expect } from "vitest";
import { getGenericErrorMessage, isRetryable } from "../../src/utils/errorMessages.js";
import {
  BoundaryNotFoundError,
  ExtractionFailedError,
  InvalidComparisonScopeError,
} from "../../src/utils/errors.js";

describe("pipeline errors", () => {
  it("carries recording, stage and reason in the message", () => {
    const error = new BoundaryNotFoundError("rec-1", "no_introduction_marker");
    expect(error.message).toBe("BoundaryNotFound [recording=rec-1 stage=boundary]: no_introduction_marker");
    expect(error.name).toBe("BoundaryNotFoundError");
    expect(error.statusCode).toBe(422);
  });

  it("retries only extraction failures", () => {
    expect(isRetryable(new ExtractionFailedError("rec-1", "disk full"))).toBe(true);
    expect(isRetryable(new BoundaryNotFoundError("rec-1", "zero_duration"))).toBe(false);
    expect(isRetryable(new InvalidComparisonScopeError("rec-1", "self"))).toBe(false);
    expect(isRetryable(new Error("connection reset"))).toBe(true);
  });
});

describe("getGenericErrorMessage", () => {
  it("maps pipeline errors by kind", () => {
    expect(getGenericErrorMessage(new BoundaryNotFoundError("rec-1", "zero_duration"))).toBe(
      "Homily not found in transcript"
    );
    expect(getGenericErrorMessage(new ExtractionFailedError("rec-1", "disk full"))).toBe("Audio extraction failed");
  });

  it("maps other errors by their text", () => {
    expect(getGenericErrorMessage(new Error("ENOENT: no such file or directory"))).toBe("File missing");
    expect(getGenericErrorMessage(new Error("ffprobe exited with code 1"))).toBe("Audio processing failed");
    expect(getGenericErrorMessage("something odd")).toBe("Processing failed");
  });
});
