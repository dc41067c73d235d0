/**
 * Recording Lifecycle
 * Allowed status transitions of a recording through the homily pipeline.
 */

import type { RecordingStatus } from "../../types/homily.js";
import { AppError } from "../../utils/errors.js";

const FORWARD: Record<RecordingStatus, readonly RecordingStatus[]> = {
  ingested: ["transcribed"],
  transcribed: ["boundary_detected"],
  boundary_detected: ["extracted", "boundary_failed"],
  boundary_failed: [],
  extracted: ["normalized"],
  normalized: ["scored"],
  scored: ["finalized"],
  finalized: [],
};

export const TERMINAL_STATUSES: readonly RecordingStatus[] = ["boundary_failed"];

export function isTerminal(status: RecordingStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

/**
 * Forward steps, plus a restart at "transcribed" from any non-terminal
 * status past ingestion (re-analysis of an already processed recording).
 */
export function canTransition(from: RecordingStatus, to: RecordingStatus): boolean {
  if (FORWARD[from].includes(to)) {
    return true;
  }
  return to === "transcribed" && from !== "ingested" && !isTerminal(from);
}

export function assertTransition(recordingId: string, from: RecordingStatus, to: RecordingStatus): void {
  if (!canTransition(from, to)) {
    throw new AppError(`Recording ${recordingId} cannot move from ${from} to ${to}`, 409);
  }
}
