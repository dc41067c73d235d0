/**
 * Store Interfaces
 * Persistence contracts the homily pipeline depends on.
 * Implemented by the Supabase repositories and by the in-memory stores.
 */

import type {
  ComparisonResult,
  HomilySegment,
  PairKey,
  Recording,
  RecordingStatus,
} from "../types/homily.js";

export interface RecordingStore {
  findById(id: string): Promise<Recording | null>;
  updateStatus(id: string, status: RecordingStatus, errorMessage?: string | null): Promise<Recording>;
}

export interface HomilySegmentStore {
  /** Inserts or replaces the single segment of a recording. */
  upsert(segment: HomilySegment): Promise<HomilySegment>;
  findByRecordingId(recordingId: string): Promise<HomilySegment | null>;
  findByWeekendGroup(weekendGroupId: string): Promise<HomilySegment[]>;
}

export interface InsertOutcome {
  result: ComparisonResult;
  /** False when another run stored the pair first. */
  inserted: boolean;
}

export interface ComparisonStore {
  find(key: PairKey): Promise<ComparisonResult | null>;
  /**
   * Inserts the result unless the pair already has one, in a single atomic step.
   * Returns whichever row is stored afterwards.
   */
  insertIfAbsent(result: ComparisonResult): Promise<InsertOutcome>;
  findByWeekendGroup(weekendGroupId: string): Promise<ComparisonResult[]>;
  /** Flagged results whose notice has not been delivered yet. */
  findPendingNotifications(weekendGroupId?: string): Promise<ComparisonResult[]>;
  markNotified(key: PairKey): Promise<ComparisonResult | null>;
}
