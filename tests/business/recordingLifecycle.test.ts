import { describe, it, expect } from "vitest";
import { assertTransition, canTransition, isTerminal } from "../../src/services/business/recordingLifecycle.js";
import { AppError } from "../../src/utils/errors.js";

describe("recording lifecycle", () => {
  it("allows the forward pipeline steps", () => {
    expect(canTransition("ingested", "transcribed")).toBe(true);
    expect(canTransition("transcribed", "boundary_detected")).toBe(true);
    expect(canTransition("boundary_detected", "extracted")).toBe(true);
    expect(canTransition("boundary_detected", "boundary_failed")).toBe(true);
    expect(canTransition("extracted", "normalized")).toBe(true);
    expect(canTransition("normalized", "scored")).toBe(true);
    expect(canTransition("scored", "finalized")).toBe(true);
  });

  it("rejects skipped steps", () => {
    expect(canTransition("transcribed", "extracted")).toBe(false);
    expect(canTransition("normalized", "finalized")).toBe(false);
  });

  it("allows re-analysis from any processed status", () => {
    expect(canTransition("finalized", "transcribed")).toBe(true);
    expect(canTransition("scored", "transcribed")).toBe(true);
    expect(canTransition("transcribed", "transcribed")).toBe(true);
  });

  it("keeps boundary_failed terminal", () => {
    expect(isTerminal("boundary_failed")).toBe(true);
    expect(canTransition("boundary_failed", "transcribed")).toBe(false);
    expect(() => assertTransition("rec-1", "boundary_failed", "transcribed")).toThrow(AppError);
  });
});
